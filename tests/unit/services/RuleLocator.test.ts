/**
 * RuleLocator unit tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { RuleLocator } from '../../../src/services/RuleLocator.js';
import { LookupCache } from '../../../src/services/LookupCache.js';
import { EventBus, EventTypes } from '../../../src/core/EventBus.js';
import { NotFoundError, UpstreamError } from '../../../src/core/errors.js';
import type { RuleCollection } from '../../../src/types/index.js';
import { FakeFirewallProvider, makeRule } from '../../helpers/FakeFirewallProvider.js';

const Z1: RuleCollection = { kind: 'zone', collectionId: 'Z1' };
const Z2: RuleCollection = { kind: 'zone', collectionId: 'Z2' };
const ORG: RuleCollection = { kind: 'organization', collectionId: 'org-1' };

describe('RuleLocator', () => {
  let provider: FakeFirewallProvider;
  let cache: LookupCache;
  let events: EventBus;
  let locator: RuleLocator;

  beforeEach(() => {
    provider = new FakeFirewallProvider();
    events = new EventBus();
    cache = new LookupCache(events);
    locator = new RuleLocator(provider, cache, { events });
  });

  describe('find', () => {
    it('should scan both pages on a cold cache and serve the next lookup from cache', async () => {
      provider.setRules(Z1, [[makeRule('A', { mode: 'block' })], [makeRule('B', { mode: 'challenge' })]]);

      const b = await locator.find(Z1, 'B');
      expect(b.mode).toBe('challenge');
      expect(provider.listCalls).toHaveLength(2);

      const a = await locator.find(Z1, 'A');
      expect(a.mode).toBe('block');
      expect(provider.listCalls).toHaveLength(2);
    });

    it('should return NotFoundError after exactly one fetch for an empty collection', async () => {
      await expect(locator.find(Z2, 'X')).rejects.toBeInstanceOf(NotFoundError);
      expect(provider.listCalls).toEqual([{ collection: Z2, page: 1 }]);
    });

    it('should report the collection and rule on NotFoundError', async () => {
      provider.setRules(Z1, [[makeRule('A')]]);

      await expect(locator.find(Z1, 'missing')).rejects.toThrow(
        'cannot find zone firewall access rule for ID missing'
      );
    });

    it('should fetch exactly as many pages as the collection reports', async () => {
      provider.setRules(Z1, [
        [makeRule('r1'), makeRule('r2')],
        [makeRule('r3'), makeRule('r4')],
        [makeRule('r5')],
      ]);

      const rule = await locator.find(Z1, 'r1');

      expect(rule.id).toBe('r1');
      expect(provider.listCalls.map((c) => c.page)).toEqual([1, 2, 3]);
    });

    it('should return identical results for repeated lookups without further calls', async () => {
      provider.setRules(Z1, [[makeRule('A')], [makeRule('B')]]);

      const first = await locator.find(Z1, 'A');
      const second = await locator.find(Z1, 'A');

      expect(second).toBe(first);
      expect(provider.listCalls).toHaveLength(2);
    });

    it('should keep the last rule seen when an ID appears twice', async () => {
      provider.setRules(Z1, [[makeRule('A', { notes: 'first' })], [makeRule('A', { notes: 'second' })]]);

      const rule = await locator.find(Z1, 'A');

      expect(rule.notes).toBe('second');
    });

    it('should give NotFoundError from a warm cache without fetching', async () => {
      provider.setRules(Z1, [[makeRule('A')]]);
      await locator.find(Z1, 'A');

      await expect(locator.find(Z1, 'nope')).rejects.toBeInstanceOf(NotFoundError);
      expect(provider.listCalls).toHaveLength(1);
    });
  });

  describe('scope routing', () => {
    it('should only issue zone listings for zone collections', async () => {
      provider.setRules(Z1, [[makeRule('A')]]);

      await locator.find(Z1, 'A');

      expect(provider.listCalls.every((c) => c.collection.kind === 'zone')).toBe(true);
    });

    it('should only issue organization listings for organization collections', async () => {
      provider.setRules(ORG, [[makeRule('O1')], [makeRule('O2')]]);

      const rule = await locator.find(ORG, 'O2');

      expect(rule.id).toBe('O2');
      expect(provider.listCalls.map((c) => c.collection.kind)).toEqual(['organization', 'organization']);
    });

    it('should cache zone and organization collections separately', async () => {
      provider.setRules({ kind: 'zone', collectionId: 'same' }, [[makeRule('Z')]]);
      provider.setRules({ kind: 'organization', collectionId: 'same' }, [[makeRule('O')]]);

      await locator.find({ kind: 'zone', collectionId: 'same' }, 'Z');
      await expect(locator.find({ kind: 'organization', collectionId: 'same' }, 'Z')).rejects.toBeInstanceOf(
        NotFoundError
      );
      expect(provider.listCalls).toHaveLength(2);
    });
  });

  describe('pagination termination', () => {
    it('should stop when the current page equals the total page count', async () => {
      provider.setPages(Z1, [
        { results: [makeRule('a')], page: 1, totalPages: 3 },
        { results: [makeRule('b')], page: 2, totalPages: 3 },
        { results: [makeRule('c')], page: 3, totalPages: 3 },
        { results: [makeRule('d')], page: 4, totalPages: 3 },
      ]);

      await expect(locator.find(Z1, 'd')).rejects.toBeInstanceOf(NotFoundError);
      expect(provider.listCalls).toHaveLength(3);
    });

    it('should stop when the reported total shrinks below the current page', async () => {
      provider.setPages(Z1, [
        { results: [makeRule('a')], page: 1, totalPages: 4 },
        { results: [makeRule('b')], page: 2, totalPages: 4 },
        { results: [makeRule('c')], page: 3, totalPages: 2 },
        { results: [makeRule('d')], page: 4, totalPages: 2 },
      ]);

      const rule = await locator.find(Z1, 'c');

      expect(rule.id).toBe('c');
      expect(provider.listCalls).toHaveLength(3);
    });

    it('should abort when the page cap is exceeded', async () => {
      const capped = new RuleLocator(provider, cache, { maxPages: 2, events });
      provider.setRules(Z1, [[makeRule('a')], [makeRule('b')], [makeRule('c')]]);

      await expect(capped.find(Z1, 'a')).rejects.toThrow('Access rule listing for zone:Z1 exceeded 2 pages');
      expect(provider.listCalls).toHaveLength(2);
      expect(cache.has(Z1)).toBe(false);
    });

    it('should abort when the listing does not advance', async () => {
      provider.setPages(Z1, [
        { results: [makeRule('a')], page: 1, totalPages: 5 },
        { results: [makeRule('a')], page: 1, totalPages: 5 },
      ]);

      await expect(locator.find(Z1, 'a')).rejects.toThrow(
        'Access rule listing for zone:Z1 returned page 1 when page 2 was requested'
      );
      expect(cache.has(Z1)).toBe(false);
    });
  });

  describe('failures', () => {
    it('should propagate the upstream error and cache nothing', async () => {
      provider.setRules(Z1, [[makeRule('A')], [makeRule('B')]]);
      provider.failListingOnCall = 2;

      await expect(locator.find(Z1, 'A')).rejects.toBeInstanceOf(UpstreamError);
      expect(cache.has(Z1)).toBe(false);

      const rule = await locator.find(Z1, 'A');
      expect(rule.id).toBe('A');
      expect(provider.listCalls).toHaveLength(4);
    });
  });

  describe('events', () => {
    it('should publish cache population with rule and page counts', async () => {
      const populated: Array<{ collection: string; ruleCount: number; pages: number }> = [];
      events.subscribe(EventTypes.LOOKUP_CACHE_POPULATED, (data) => {
        populated.push(data);
      });
      provider.setRules(Z1, [[makeRule('A'), makeRule('B')], [makeRule('C')]]);

      await locator.find(Z1, 'A');

      expect(populated).toEqual([{ collection: 'zone:Z1', ruleCount: 3, pages: 2 }]);
    });
  });
});
