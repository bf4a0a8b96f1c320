/**
 * Core type definitions for firewall-resources
 */

// Access Rule Types
export type AccessRuleMode = 'block' | 'challenge' | 'whitelist' | 'js_challenge';

export type AccessRuleTarget = 'ip' | 'ip_range' | 'asn' | 'country';

export type RuleScope = 'zone' | 'organization';

export interface AccessRuleConfiguration {
  target: AccessRuleTarget;
  value: string;
}

export interface AccessRule {
  id: string;
  mode: AccessRuleMode;
  configuration: AccessRuleConfiguration;
  notes: string;
  createdOn?: Date;
  modifiedOn?: Date;
}

/**
 * Rule body sent on create/update. The ID is assigned remotely.
 */
export type AccessRuleInput = Omit<AccessRule, 'id' | 'createdOn' | 'modifiedOn'>;

/**
 * Remote collection that access rules are listed under.
 * The kind carries the routing: zone collections live under /zones,
 * organization collections under /accounts.
 */
export type RuleCollection =
  | { kind: 'zone'; collectionId: string }
  | { kind: 'organization'; collectionId: string };

export interface AccessRulePage {
  results: AccessRule[];
  page: number;
  totalPages: number;
}

// Zone Types
export interface ZoneDetails {
  id: string;
  name: string;
  ownerId: string;
}

// Virtual DNS Types
export interface VirtualDNSCluster {
  id: string;
  name: string;
  originIps: string[];
  virtualDnsIps: string[];
  minimumCacheTtl: number;
  maximumCacheTtl: number;
  deprecateAnyRequests: boolean;
  ecsFallback: boolean;
  ratelimit: number;
  modifiedOn?: string;
}

export type VirtualDNSClusterInput = Omit<VirtualDNSCluster, 'id' | 'virtualDnsIps' | 'modifiedOn'> & {
  virtualDnsIps?: string[];
};

// Resource State Types
export interface AccessRuleState {
  id: string;
  zone: string;
  zoneId: string;
  /** Owner organization ID, or 'N/A' for zone-scoped rules */
  orgId: string;
  scope: RuleScope;
  mode: AccessRuleMode;
  target: AccessRuleTarget;
  value: string;
  notes: string;
}
