/**
 * Services module exports
 */
export { LookupCache, collectionKey, type RuleMap } from './LookupCache.js';
export { RuleLocator, type RuleLocatorOptions } from './RuleLocator.js';
export { ScopeResolver } from './ScopeResolver.js';
