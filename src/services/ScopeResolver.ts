/**
 * Scope Resolver
 * Maps a logical rule scope plus a zone to the remote collection holding its rules
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import type { FirewallProvider } from '../providers/base/FirewallProvider.js';
import type { RuleCollection, RuleScope } from '../types/index.js';

export class ScopeResolver {
  private readonly logger: Logger;

  constructor(private readonly provider: FirewallProvider) {
    this.logger = createChildLogger({ service: 'ScopeResolver' });
  }

  /**
   * Zone scope needs no remote call. Organization scope costs exactly one
   * zone details fetch; failures propagate unretried.
   */
  async resolve(scope: RuleScope, zoneId: string): Promise<RuleCollection> {
    switch (scope) {
      case 'zone':
        return { kind: 'zone', collectionId: zoneId };

      case 'organization': {
        const zone = await this.provider.zoneDetails(zoneId);
        this.logger.debug({ zoneId, organizationId: zone.ownerId }, 'Resolved owning organization');
        return { kind: 'organization', collectionId: zone.ownerId };
      }
    }
  }

  async zoneIdByName(zoneName: string): Promise<string> {
    return this.provider.zoneIdByName(zoneName);
  }
}
