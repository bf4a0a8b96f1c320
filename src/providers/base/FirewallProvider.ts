/**
 * Remote API surface used by the lookup and resource layers.
 * Implementations wrap every remote failure into an UpstreamError.
 */
import type {
  AccessRule,
  AccessRuleInput,
  AccessRulePage,
  RuleCollection,
  VirtualDNSCluster,
  VirtualDNSClusterInput,
  ZoneDetails,
} from '../../types/index.js';

export interface FirewallProvider {
  /**
   * Resolve a zone name (example.com) to its zone ID
   */
  zoneIdByName(zoneName: string): Promise<string>;

  zoneDetails(zoneId: string): Promise<ZoneDetails>;

  /**
   * Fetch one 1-indexed page of the access rules listed under a collection
   */
  listAccessRules(collection: RuleCollection, page: number): Promise<AccessRulePage>;

  createAccessRule(collection: RuleCollection, rule: AccessRuleInput): Promise<AccessRule>;

  updateAccessRule(collection: RuleCollection, ruleId: string, rule: AccessRuleInput): Promise<AccessRule>;

  deleteAccessRule(collection: RuleCollection, ruleId: string): Promise<void>;

  listVirtualDNS(organizationId: string): Promise<VirtualDNSCluster[]>;

  getVirtualDNS(organizationId: string, clusterId: string): Promise<VirtualDNSCluster>;

  createVirtualDNS(organizationId: string, cluster: VirtualDNSClusterInput): Promise<VirtualDNSCluster>;

  updateVirtualDNS(organizationId: string, clusterId: string, cluster: VirtualDNSClusterInput): Promise<VirtualDNSCluster>;

  deleteVirtualDNS(organizationId: string, clusterId: string): Promise<void>;
}
