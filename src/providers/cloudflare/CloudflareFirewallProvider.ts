/**
 * Cloudflare firewall provider
 * Using the official cloudflare npm package
 */
import Cloudflare from 'cloudflare';
import type { Logger } from 'pino';
import type { z } from 'zod';
import { createChildLogger } from '../../core/Logger.js';
import { UpstreamError } from '../../core/errors.js';
import type { FirewallProvider } from '../base/FirewallProvider.js';
import type {
  AccessRule,
  AccessRuleInput,
  AccessRulePage,
  RuleCollection,
  VirtualDNSCluster,
  VirtualDNSClusterInput,
  ZoneDetails,
} from '../../types/index.js';
import {
  accessRuleEnvelopeSchema,
  accessRuleListEnvelopeSchema,
  accessRulesPath,
  convertAccessRule,
  convertAccessRulePage,
  convertVirtualDNS,
  convertZone,
  toAccessRuleBody,
  toVirtualDnsBody,
  virtualDnsEnvelopeSchema,
  virtualDnsListEnvelopeSchema,
  virtualDnsPath,
  zoneSchema,
} from './wire.js';

export interface CloudflareFirewallProviderOptions {
  apiToken: string;
  baseUrl?: string;
  maxRetries?: number;
  timeout?: number;
  /** Page size used when listing access rules */
  perPage?: number;
}

/**
 * HTTP status of a failed SDK call, when it got that far
 */
export function statusOf(error: unknown): number | undefined {
  return error instanceof Cloudflare.APIError ? error.status : undefined;
}

export class CloudflareFirewallProvider implements FirewallProvider {
  private readonly client: Cloudflare;
  private readonly logger: Logger;
  private readonly perPage: number;

  constructor(options: CloudflareFirewallProviderOptions) {
    this.client = new Cloudflare({
      apiToken: options.apiToken,
      baseURL: options.baseUrl,
      maxRetries: options.maxRetries,
      timeout: options.timeout,
    });
    this.perPage = options.perPage ?? 50;
    this.logger = createChildLogger({ service: 'CloudflareFirewallProvider' });
  }

  async zoneIdByName(zoneName: string): Promise<string> {
    const zones = await this.call(`Failed to look up zone ${zoneName}`, () =>
      this.client.zones.list({ name: zoneName })
    );

    const zoneId = zones.result[0]?.id;
    if (!zoneId) {
      throw new UpstreamError(`Zone not found: ${zoneName}`, 404);
    }

    this.logger.debug({ zone: zoneName, zoneId }, 'Zone ID retrieved');
    return zoneId;
  }

  async zoneDetails(zoneId: string): Promise<ZoneDetails> {
    const zone = await this.call(`Failed to fetch zone details for ${zoneId}`, () =>
      this.client.zones.get({ zone_id: zoneId })
    );

    const details = convertZone(this.parse(zoneSchema, zone, `zone ${zoneId}`));
    if (!details) {
      throw new UpstreamError(`Zone ${zoneId} has no owning organization`);
    }
    return details;
  }

  async listAccessRules(collection: RuleCollection, page: number): Promise<AccessRulePage> {
    const body = await this.call(`Failed to list ${collection.kind} access rules (page ${page})`, () =>
      this.client.get(accessRulesPath(collection), {
        query: {
          page,
          per_page: this.perPage,
          scope_type: collection.kind,
        },
      })
    );

    const result = convertAccessRulePage(this.parse(accessRuleListEnvelopeSchema, body, 'access rule listing'));
    this.logger.trace(
      { collection: collection.collectionId, page: result.page, totalPages: result.totalPages, count: result.results.length },
      'Access rule page fetched'
    );
    return result;
  }

  async createAccessRule(collection: RuleCollection, rule: AccessRuleInput): Promise<AccessRule> {
    const body = await this.call(`Failed to create ${collection.kind} access rule`, () =>
      this.client.post(accessRulesPath(collection), { body: toAccessRuleBody(rule) })
    );
    return convertAccessRule(this.parse(accessRuleEnvelopeSchema, body, 'access rule').result);
  }

  async updateAccessRule(collection: RuleCollection, ruleId: string, rule: AccessRuleInput): Promise<AccessRule> {
    const body = await this.call(`Failed to update ${collection.kind} access rule ${ruleId}`, () =>
      this.client.patch(`${accessRulesPath(collection)}/${ruleId}`, { body: toAccessRuleBody(rule) })
    );
    return convertAccessRule(this.parse(accessRuleEnvelopeSchema, body, 'access rule').result);
  }

  async deleteAccessRule(collection: RuleCollection, ruleId: string): Promise<void> {
    await this.call(`Failed to delete ${collection.kind} access rule ${ruleId}`, () =>
      this.client.delete(`${accessRulesPath(collection)}/${ruleId}`)
    );
  }

  async listVirtualDNS(organizationId: string): Promise<VirtualDNSCluster[]> {
    const body = await this.call('Failed to list virtual DNS clusters', () =>
      this.client.get(virtualDnsPath(organizationId))
    );
    const envelope = this.parse(virtualDnsListEnvelopeSchema, body, 'virtual DNS listing');
    return (envelope.result ?? []).map(convertVirtualDNS);
  }

  async getVirtualDNS(organizationId: string, clusterId: string): Promise<VirtualDNSCluster> {
    const body = await this.call(`Failed to fetch virtual DNS cluster ${clusterId}`, () =>
      this.client.get(virtualDnsPath(organizationId, clusterId))
    );
    return convertVirtualDNS(this.parse(virtualDnsEnvelopeSchema, body, 'virtual DNS cluster').result);
  }

  async createVirtualDNS(organizationId: string, cluster: VirtualDNSClusterInput): Promise<VirtualDNSCluster> {
    const body = await this.call('Failed to create virtual DNS cluster', () =>
      this.client.post(virtualDnsPath(organizationId), { body: toVirtualDnsBody(cluster) })
    );
    return convertVirtualDNS(this.parse(virtualDnsEnvelopeSchema, body, 'virtual DNS cluster').result);
  }

  async updateVirtualDNS(
    organizationId: string,
    clusterId: string,
    cluster: VirtualDNSClusterInput
  ): Promise<VirtualDNSCluster> {
    const body = await this.call(`Failed to update virtual DNS cluster ${clusterId}`, () =>
      this.client.put(virtualDnsPath(organizationId, clusterId), { body: toVirtualDnsBody(cluster, clusterId) })
    );
    return convertVirtualDNS(this.parse(virtualDnsEnvelopeSchema, body, 'virtual DNS cluster').result);
  }

  async deleteVirtualDNS(organizationId: string, clusterId: string): Promise<void> {
    await this.call(`Failed to delete virtual DNS cluster ${clusterId}`, () =>
      this.client.delete(virtualDnsPath(organizationId, clusterId))
    );
  }

  /**
   * Run one SDK call, wrapping any failure into an UpstreamError
   */
  private async call<T>(message: string, request: () => PromiseLike<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      const status = statusOf(error);
      this.logger.debug({ status, error }, message);
      throw UpstreamError.from(error, message, status);
    }
  }

  private parse<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.output<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const detail = parsed.error.errors
        .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
        .join('; ');
      throw new UpstreamError(`Malformed ${what} response: ${detail}`);
    }
    return parsed.data;
  }
}
