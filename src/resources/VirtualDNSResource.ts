/**
 * Virtual DNS cluster resource (organization-owned DNS firewall clusters)
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { eventBus as defaultEventBus, EventTypes, type EventBus } from '../core/EventBus.js';
import { UpstreamError, ValidationError } from '../core/errors.js';
import {
  virtualDnsInputSchema,
  type VirtualDNSResourceConfig,
  type VirtualDNSResourceInput,
} from '../config/schema.js';
import type { FirewallProvider } from '../providers/base/FirewallProvider.js';
import type { VirtualDNSCluster } from '../types/index.js';

export interface VirtualDNSResourceDeps {
  provider: FirewallProvider;
  organizationId: string;
  events?: EventBus;
}

export function validateVirtualDnsInput(input: VirtualDNSResourceInput): VirtualDNSResourceConfig {
  const parsed = virtualDnsInputSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod('virtual DNS cluster', parsed.error);
  }
  return parsed.data;
}

export class VirtualDNSResource {
  private readonly logger: Logger;
  private readonly provider: FirewallProvider;
  private readonly organizationId: string;
  private readonly events: EventBus;

  constructor(deps: VirtualDNSResourceDeps) {
    this.provider = deps.provider;
    this.organizationId = deps.organizationId;
    this.events = deps.events ?? defaultEventBus;
    this.logger = createChildLogger({ service: 'VirtualDNSResource', organizationId: deps.organizationId });
  }

  async create(input: VirtualDNSResourceInput): Promise<VirtualDNSCluster> {
    const config = validateVirtualDnsInput(input);
    this.logger.debug({ name: config.name, originIps: config.originIps }, 'Creating virtual DNS cluster');

    const created = await this.provider.createVirtualDNS(this.organizationId, config);
    if (!created.id) {
      throw new UpstreamError('failed to find id in create response; resource was empty');
    }

    this.logger.info({ name: created.name, id: created.id }, 'Virtual DNS cluster created');
    this.events.publish(EventTypes.VIRTUAL_DNS_CREATED, { clusterId: created.id, name: created.name });

    return this.readAfterWrite(created.id);
  }

  /**
   * Returns null when the cluster no longer exists
   */
  async read(clusterId: string): Promise<VirtualDNSCluster | null> {
    try {
      return await this.provider.getVirtualDNS(this.organizationId, clusterId);
    } catch (error) {
      if (error instanceof UpstreamError && error.isNotFound()) {
        this.logger.info({ id: clusterId }, 'Virtual DNS cluster no longer exists');
        this.events.publish(EventTypes.VIRTUAL_DNS_GONE, { clusterId });
        return null;
      }
      const status = error instanceof UpstreamError ? error.status : undefined;
      const detail = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`Error reading VirtualDNS from API for resource ${clusterId}: ${detail}`, status, {
        cause: error,
      });
    }
  }

  async update(clusterId: string, input: VirtualDNSResourceInput): Promise<VirtualDNSCluster> {
    const config = validateVirtualDnsInput(input);
    this.logger.debug({ id: clusterId, name: config.name }, 'Updating virtual DNS cluster');

    await this.provider.updateVirtualDNS(this.organizationId, clusterId, config);

    this.logger.info({ name: config.name, id: clusterId }, 'Virtual DNS cluster updated');
    this.events.publish(EventTypes.VIRTUAL_DNS_UPDATED, { clusterId, name: config.name });

    return this.readAfterWrite(clusterId);
  }

  async delete(clusterId: string): Promise<void> {
    this.logger.info({ id: clusterId }, 'Deleting virtual DNS cluster');
    await this.provider.deleteVirtualDNS(this.organizationId, clusterId);
    this.events.publish(EventTypes.VIRTUAL_DNS_DELETED, { clusterId });
  }

  /**
   * Import by cluster ID; same as read()
   */
  async import(clusterId: string): Promise<VirtualDNSCluster | null> {
    return this.read(clusterId);
  }

  async list(): Promise<VirtualDNSCluster[]> {
    return this.provider.listVirtualDNS(this.organizationId);
  }

  private async readAfterWrite(clusterId: string): Promise<VirtualDNSCluster> {
    const cluster = await this.read(clusterId);
    if (!cluster) {
      throw new UpstreamError(`Virtual DNS cluster ${clusterId} cannot be read back after write`, 404);
    }
    return cluster;
  }
}
