/**
 * Rule Locator
 *
 * The listing endpoint cannot filter by rule ID, so finding one rule means
 * scanning its whole collection. The scan result is kept in the LookupCache
 * so later lookups against the same collection make no remote calls.
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { eventBus as defaultEventBus, EventTypes, type EventBus } from '../core/EventBus.js';
import { NotFoundError, UpstreamError } from '../core/errors.js';
import type { FirewallProvider } from '../providers/base/FirewallProvider.js';
import type { AccessRule, RuleCollection } from '../types/index.js';
import { collectionKey, LookupCache } from './LookupCache.js';

export interface RuleLocatorOptions {
  /** Upper bound on pages fetched in one scan */
  maxPages?: number;
  events?: EventBus;
}

export class RuleLocator {
  private readonly logger: Logger;
  private readonly maxPages: number;
  private readonly events: EventBus;

  constructor(
    private readonly provider: FirewallProvider,
    private readonly cache: LookupCache = new LookupCache(),
    options: RuleLocatorOptions = {}
  ) {
    this.maxPages = options.maxPages ?? 500;
    this.events = options.events ?? defaultEventBus;
    this.logger = createChildLogger({ service: 'RuleLocator' });
  }

  /**
   * Find a rule by ID.
   * @throws NotFoundError when the rule is not in the collection
   * @throws UpstreamError when any page fetch fails
   */
  async find(collection: RuleCollection, ruleId: string): Promise<AccessRule> {
    const rules = await this.cache.getOrLoad(collection, () => this.scan(collection));

    const rule = rules.get(ruleId);
    if (!rule) {
      throw new NotFoundError(collection, ruleId);
    }
    return rule;
  }

  /**
   * Walk every page of a collection, starting at page 1
   */
  async scan(collection: RuleCollection): Promise<Map<string, AccessRule>> {
    const key = collectionKey(collection);
    const rules = new Map<string, AccessRule>();
    let page = 1;

    for (;;) {
      if (page > this.maxPages) {
        throw new UpstreamError(`Access rule listing for ${key} exceeded ${this.maxPages} pages`);
      }

      const response = await this.provider.listAccessRules(collection, page);

      if (response.page !== page) {
        throw new UpstreamError(
          `Access rule listing for ${key} returned page ${response.page} when page ${page} was requested`
        );
      }

      for (const rule of response.results) {
        rules.set(rule.id, rule);
      }

      this.logger.debug(
        { collection: key, page, totalPages: response.totalPages, count: response.results.length },
        'Scanned access rule page'
      );

      // A total that shrinks below the current page also ends the scan
      if (response.totalPages === 0 || page >= response.totalPages) {
        break;
      }
      page += 1;
    }

    this.events.publish(EventTypes.LOOKUP_CACHE_POPULATED, { collection: key, ruleCount: rules.size, pages: page });
    return rules;
  }
}
