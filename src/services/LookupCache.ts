/**
 * Lookup cache for access rule collections
 *
 * Holds one complete Map<ruleId, AccessRule> per collection, populated by a
 * single full scan. Concurrent loads of the same collection share one
 * in-flight scan; a failed scan leaves nothing behind. Writes made while a
 * scan is in flight are replayed onto its result before it is stored.
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { eventBus as defaultEventBus, EventTypes, type EventBus } from '../core/EventBus.js';
import type { AccessRule, RuleCollection } from '../types/index.js';

export type RuleMap = ReadonlyMap<string, AccessRule>;

type RuleWrite = (rules: Map<string, AccessRule>) => void;

interface InflightScan {
  promise: Promise<Map<string, AccessRule>>;
  state: ScanState;
}

interface ScanState {
  writes: RuleWrite[];
  /** Set by invalidate()/clear(); the result is returned but not stored */
  stale: boolean;
}

export function collectionKey(collection: RuleCollection): string {
  return `${collection.kind}:${collection.collectionId}`;
}

export class LookupCache {
  private entries = new Map<string, Map<string, AccessRule>>();
  private inflight = new Map<string, InflightScan>();
  private readonly logger: Logger;

  constructor(private readonly events: EventBus = defaultEventBus) {
    this.logger = createChildLogger({ service: 'LookupCache' });
  }

  /**
   * Cached rules for a collection, or undefined when it has not been scanned
   */
  get(collection: RuleCollection): RuleMap | undefined {
    return this.entries.get(collectionKey(collection));
  }

  has(collection: RuleCollection): boolean {
    return this.entries.has(collectionKey(collection));
  }

  /**
   * Return the cached rules, running `load` at most once per collection even
   * when called concurrently.
   */
  async getOrLoad(
    collection: RuleCollection,
    load: () => Promise<Map<string, AccessRule>>
  ): Promise<RuleMap> {
    const key = collectionKey(collection);

    const cached = this.entries.get(key);
    if (cached) {
      this.logger.trace({ collection: key }, 'Cache hit');
      return cached;
    }

    const pending = this.inflight.get(key);
    if (pending) {
      this.logger.debug({ collection: key }, 'Waiting for in-flight scan');
      return pending.promise;
    }

    this.logger.debug({ collection: key }, 'Cache miss');
    const state: ScanState = { writes: [], stale: false };
    const promise = this.runScan(key, state, load);
    this.inflight.set(key, { promise, state });
    return promise;
  }

  private async runScan(
    key: string,
    state: ScanState,
    load: () => Promise<Map<string, AccessRule>>
  ): Promise<Map<string, AccessRule>> {
    try {
      const rules = await load();
      for (const write of state.writes) {
        write(rules);
      }
      if (!state.stale) {
        this.entries.set(key, rules);
      }
      return rules;
    } finally {
      if (this.inflight.get(key)?.state === state) {
        this.inflight.delete(key);
      }
    }
  }

  /**
   * Write-through for this process's own creates and updates.
   * Cold collections are left cold; a scan in flight gets the write replayed.
   */
  upsert(collection: RuleCollection, rule: AccessRule): void {
    this.write(collection, (rules) => {
      rules.set(rule.id, rule);
    });
  }

  remove(collection: RuleCollection, ruleId: string): void {
    this.write(collection, (rules) => {
      rules.delete(ruleId);
    });
  }

  private write(collection: RuleCollection, apply: RuleWrite): void {
    const key = collectionKey(collection);
    const rules = this.entries.get(key);
    if (rules) {
      apply(rules);
      return;
    }
    this.inflight.get(key)?.state.writes.push(apply);
  }

  invalidate(collection: RuleCollection): void {
    const key = collectionKey(collection);
    this.entries.delete(key);
    this.markStale(key);
    this.logger.debug({ collection: key }, 'Cache entry invalidated');
    this.events.publish(EventTypes.LOOKUP_CACHE_INVALIDATED, { collection: key });
  }

  clear(): void {
    this.entries.clear();
    for (const key of [...this.inflight.keys()]) {
      this.markStale(key);
    }
    this.events.publish(EventTypes.LOOKUP_CACHE_INVALIDATED, { collection: null });
  }

  private markStale(key: string): void {
    const pending = this.inflight.get(key);
    if (pending) {
      pending.state.stale = true;
      this.inflight.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
