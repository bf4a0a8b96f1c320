/**
 * Cloudflare v4 API payload schemas and their mapping to domain types
 */
import { z } from 'zod';
import { accessRuleModeSchema, accessRuleTargetSchema } from '../../config/schema.js';
import type {
  AccessRule,
  AccessRuleInput,
  AccessRulePage,
  RuleCollection,
  VirtualDNSCluster,
  VirtualDNSClusterInput,
  ZoneDetails,
} from '../../types/index.js';

export const cloudflareAccessRuleSchema = z.object({
  id: z.string(),
  mode: accessRuleModeSchema,
  configuration: z.object({
    target: accessRuleTargetSchema,
    value: z.string(),
  }),
  notes: z.string().nullish(),
  created_on: z.string().nullish(),
  modified_on: z.string().nullish(),
});

export const accessRuleEnvelopeSchema = z.object({
  result: cloudflareAccessRuleSchema,
});

export const accessRuleListEnvelopeSchema = z.object({
  result: z.array(cloudflareAccessRuleSchema).nullable(),
  result_info: z
    .object({
      page: z.number().int(),
      total_pages: z.number().int(),
    })
    .passthrough(),
});

export const zoneSchema = z.object({
  id: z.string(),
  name: z.string(),
  owner: z.object({ id: z.string().nullish() }).passthrough().nullish(),
  account: z.object({ id: z.string().nullish() }).passthrough().nullish(),
});

export const cloudflareVirtualDnsSchema = z.object({
  id: z.string(),
  name: z.string(),
  origin_ips: z.array(z.string()),
  virtual_dns_ips: z.array(z.string()).nullish(),
  minimum_cache_ttl: z.number().int(),
  maximum_cache_ttl: z.number().int(),
  deprecate_any_requests: z.boolean(),
  ecs_fallback: z.boolean(),
  ratelimit: z.number().int(),
  modified_on: z.string().nullish(),
});

export const virtualDnsEnvelopeSchema = z.object({
  result: cloudflareVirtualDnsSchema,
});

export const virtualDnsListEnvelopeSchema = z.object({
  result: z.array(cloudflareVirtualDnsSchema).nullable(),
});

type CloudflareAccessRule = z.infer<typeof cloudflareAccessRuleSchema>;
type CloudflareVirtualDNS = z.infer<typeof cloudflareVirtualDnsSchema>;

/**
 * Base path of the access rule collection for a zone or organization
 */
export function accessRulesPath(collection: RuleCollection): string {
  switch (collection.kind) {
    case 'zone':
      return `/zones/${collection.collectionId}/firewall/access_rules/rules`;
    case 'organization':
      return `/accounts/${collection.collectionId}/firewall/access_rules/rules`;
  }
}

export function virtualDnsPath(organizationId: string, clusterId?: string): string {
  const base = `/accounts/${organizationId}/virtual_dns`;
  return clusterId ? `${base}/${clusterId}` : base;
}

export function convertAccessRule(rule: CloudflareAccessRule): AccessRule {
  return {
    id: rule.id,
    mode: rule.mode,
    configuration: {
      target: rule.configuration.target,
      value: rule.configuration.value,
    },
    notes: rule.notes ?? '',
    createdOn: rule.created_on ? new Date(rule.created_on) : undefined,
    modifiedOn: rule.modified_on ? new Date(rule.modified_on) : undefined,
  };
}

export function convertAccessRulePage(envelope: z.infer<typeof accessRuleListEnvelopeSchema>): AccessRulePage {
  return {
    results: (envelope.result ?? []).map(convertAccessRule),
    page: envelope.result_info.page,
    totalPages: envelope.result_info.total_pages,
  };
}

export function toAccessRuleBody(rule: AccessRuleInput): Record<string, unknown> {
  return {
    mode: rule.mode,
    configuration: {
      target: rule.configuration.target,
      value: rule.configuration.value,
    },
    notes: rule.notes,
  };
}

/**
 * Zones moved from organizations to accounts; either field names the owner
 */
export function convertZone(zone: z.infer<typeof zoneSchema>): ZoneDetails | null {
  const ownerId = zone.owner?.id ?? zone.account?.id;
  if (!ownerId) {
    return null;
  }
  return { id: zone.id, name: zone.name, ownerId };
}

export function convertVirtualDNS(cluster: CloudflareVirtualDNS): VirtualDNSCluster {
  return {
    id: cluster.id,
    name: cluster.name,
    originIps: cluster.origin_ips,
    virtualDnsIps: cluster.virtual_dns_ips ?? [],
    minimumCacheTtl: cluster.minimum_cache_ttl,
    maximumCacheTtl: cluster.maximum_cache_ttl,
    deprecateAnyRequests: cluster.deprecate_any_requests,
    ecsFallback: cluster.ecs_fallback,
    ratelimit: cluster.ratelimit,
    modifiedOn: cluster.modified_on ?? undefined,
  };
}

export function toVirtualDnsBody(cluster: VirtualDNSClusterInput, clusterId?: string): Record<string, unknown> {
  const body: Record<string, unknown> = {
    name: cluster.name,
    origin_ips: cluster.originIps,
    minimum_cache_ttl: cluster.minimumCacheTtl,
    maximum_cache_ttl: cluster.maximumCacheTtl,
    deprecate_any_requests: cluster.deprecateAnyRequests,
    ecs_fallback: cluster.ecsFallback,
    ratelimit: cluster.ratelimit,
  };

  if (clusterId) {
    body['id'] = clusterId;
  }
  if (cluster.virtualDnsIps && cluster.virtualDnsIps.length > 0) {
    body['virtual_dns_ips'] = cluster.virtualDnsIps;
  }

  return body;
}
