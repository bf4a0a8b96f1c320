/**
 * Resource wiring
 */
import { ConfigManager, getConfig } from '../config/ConfigManager.js';
import { eventBus as defaultEventBus, type EventBus } from '../core/EventBus.js';
import { ValidationError } from '../core/errors.js';
import { createProvider } from '../providers/ProviderFactory.js';
import type { FirewallProvider } from '../providers/base/FirewallProvider.js';
import { LookupCache } from '../services/LookupCache.js';
import { RuleLocator } from '../services/RuleLocator.js';
import { ScopeResolver } from '../services/ScopeResolver.js';
import { AccessRuleResource } from './AccessRuleResource.js';
import { VirtualDNSResource } from './VirtualDNSResource.js';

export {
  AccessRuleResource,
  NO_ORGANIZATION,
  collectionOf,
  parseImportId,
  validateAccessRuleInput,
  type AccessRuleResourceDeps,
  type ParsedImportId,
} from './AccessRuleResource.js';
export { VirtualDNSResource, validateVirtualDnsInput, type VirtualDNSResourceDeps } from './VirtualDNSResource.js';

export interface FirewallResources {
  provider: FirewallProvider;
  cache: LookupCache;
  resolver: ScopeResolver;
  locator: RuleLocator;
  accessRules: AccessRuleResource;
  /** Virtual DNS clusters need an organization ID; null without one */
  virtualDns: VirtualDNSResource | null;
}

export interface CreateFirewallResourcesOptions {
  config?: ConfigManager;
  /** Overrides the Cloudflare provider built from config */
  provider?: FirewallProvider;
  events?: EventBus;
}

/**
 * Build one isolated set of resources sharing a provider and a lookup cache
 */
export function createFirewallResources(options: CreateFirewallResourcesOptions = {}): FirewallResources {
  const config = options.config ?? getConfig();
  const events = options.events ?? defaultEventBus;
  const provider = options.provider ?? createProvider(config.cloudflare, config.lookup);

  const cache = new LookupCache(events);
  const resolver = new ScopeResolver(provider);
  const locator = new RuleLocator(provider, cache, { maxPages: config.lookup.maxPages, events });
  const accessRules = new AccessRuleResource({ provider, resolver, locator, cache, events });

  const organizationId = config.cloudflare.organizationId;
  const virtualDns = organizationId ? new VirtualDNSResource({ provider, organizationId, events }) : null;

  return { provider, cache, resolver, locator, accessRules, virtualDns };
}

/**
 * The virtual DNS resource, failing fast when no organization is configured
 */
export function requireVirtualDns(resources: FirewallResources): VirtualDNSResource {
  if (!resources.virtualDns) {
    throw new ValidationError('CLOUDFLARE_ORGANIZATION_ID is required to manage virtual DNS clusters');
  }
  return resources.virtualDns;
}
