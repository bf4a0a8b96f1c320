/**
 * Firewall access rule resource
 * Create/read/update/delete/import of IP, IP range, ASN and country rules
 * scoped to a zone or to the organization that owns it
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { eventBus as defaultEventBus, EventTypes, type EventBus } from '../core/EventBus.js';
import { ImportIdError, NotFoundError, UpstreamError, ValidationError } from '../core/errors.js';
import {
  accessRuleInputSchema,
  ruleScopeSchema,
  type AccessRuleResourceConfig,
  type AccessRuleResourceInput,
} from '../config/schema.js';
import type { FirewallProvider } from '../providers/base/FirewallProvider.js';
import type { LookupCache } from '../services/LookupCache.js';
import type { RuleLocator } from '../services/RuleLocator.js';
import type { ScopeResolver } from '../services/ScopeResolver.js';
import type { AccessRule, AccessRuleInput, AccessRuleState, RuleCollection } from '../types/index.js';

/** org_id recorded for zone-scoped rules */
export const NO_ORGANIZATION = 'N/A';

export interface AccessRuleResourceDeps {
  provider: FirewallProvider;
  resolver: ScopeResolver;
  locator: RuleLocator;
  cache: LookupCache;
  events?: EventBus;
}

export interface ParsedImportId {
  scope: AccessRuleState['scope'];
  zoneName: string;
  ruleId: string;
}

/**
 * Split a `scope/zoneName/ruleID` import ID. The rule ID keeps any further slashes.
 */
export function parseImportId(importId: string): ParsedImportId {
  const first = importId.indexOf('/');
  const second = first === -1 ? -1 : importId.indexOf('/', first + 1);
  if (second === -1) {
    throw new ImportIdError(importId);
  }

  const scope = ruleScopeSchema.safeParse(importId.slice(0, first));
  const zoneName = importId.slice(first + 1, second);
  const ruleId = importId.slice(second + 1);
  if (!scope.success || !zoneName || !ruleId) {
    throw new ImportIdError(importId);
  }

  return { scope: scope.data, zoneName, ruleId };
}

export function validateAccessRuleInput(input: AccessRuleResourceInput): AccessRuleResourceConfig {
  const parsed = accessRuleInputSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod('access rule', parsed.error);
  }
  return parsed.data;
}

/**
 * Collection the state's rule lives in, from the IDs recorded at create/import
 */
export function collectionOf(state: Pick<AccessRuleState, 'scope' | 'zoneId' | 'orgId'>): RuleCollection {
  switch (state.scope) {
    case 'zone':
      return { kind: 'zone', collectionId: state.zoneId };
    case 'organization':
      return { kind: 'organization', collectionId: state.orgId };
  }
}

function toRuleInput(config: AccessRuleResourceConfig): AccessRuleInput {
  return {
    mode: config.mode,
    configuration: { target: config.target, value: config.value },
    notes: config.notes,
  };
}

function withRule(state: AccessRuleState, rule: AccessRule): AccessRuleState {
  return {
    ...state,
    mode: rule.mode,
    target: rule.configuration.target,
    value: rule.configuration.value,
    notes: rule.notes,
  };
}

export class AccessRuleResource {
  private readonly logger: Logger;
  private readonly provider: FirewallProvider;
  private readonly resolver: ScopeResolver;
  private readonly locator: RuleLocator;
  private readonly cache: LookupCache;
  private readonly events: EventBus;

  constructor(deps: AccessRuleResourceDeps) {
    this.provider = deps.provider;
    this.resolver = deps.resolver;
    this.locator = deps.locator;
    this.cache = deps.cache;
    this.events = deps.events ?? defaultEventBus;
    this.logger = createChildLogger({ service: 'AccessRuleResource' });
  }

  async create(input: AccessRuleResourceInput): Promise<AccessRuleState> {
    const config = validateAccessRuleInput(input);

    const zoneId = await this.resolver.zoneIdByName(config.zone);
    const collection = await this.resolver.resolve(config.scope, zoneId);
    const orgId = collection.kind === 'organization' ? collection.collectionId : NO_ORGANIZATION;

    const created = await this.provider.createAccessRule(collection, toRuleInput(config));
    if (!created.id) {
      throw new UpstreamError('failed to find ID in Create response; resource was empty');
    }
    this.cache.upsert(collection, created);

    this.logger.info(
      { ruleId: created.id, scope: config.scope, zone: config.zone, mode: config.mode },
      'Access rule created'
    );
    this.events.publish(EventTypes.ACCESS_RULE_CREATED, {
      ruleId: created.id,
      scope: config.scope,
      collectionId: collection.collectionId,
      mode: config.mode,
      target: config.target,
      value: config.value,
    });

    const state: AccessRuleState = {
      id: created.id,
      zone: config.zone,
      zoneId,
      orgId,
      scope: config.scope,
      mode: config.mode,
      target: config.target,
      value: config.value,
      notes: config.notes,
    };

    return this.readBack(state, 'created');
  }

  /**
   * Refresh state from the remote rule. Returns null when the rule no longer
   * exists, so the caller can drop it from local state.
   */
  async read(state: AccessRuleState): Promise<AccessRuleState | null> {
    const collection = collectionOf(state);

    let rule: AccessRule;
    try {
      rule = await this.locator.find(collection, state.id);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn({ ruleId: state.id, scope: state.scope, zone: state.zone }, 'Access rule no longer exists');
        this.events.publish(EventTypes.ACCESS_RULE_GONE, {
          ruleId: state.id,
          scope: state.scope,
          collectionId: collection.collectionId,
        });
        return null;
      }
      throw error;
    }

    return withRule(state, rule);
  }

  /**
   * Apply changed mode/target/value/notes in place. Zone or scope changes
   * need a new rule; see requiresReplacement().
   */
  async update(state: AccessRuleState, input: AccessRuleResourceInput): Promise<AccessRuleState> {
    const config = validateAccessRuleInput(input);
    if (this.requiresReplacement(state, config)) {
      throw new ValidationError('zone and scope cannot be changed in place; replace the rule instead');
    }

    const collection = collectionOf(state);
    const updated = await this.provider.updateAccessRule(collection, state.id, toRuleInput(config));
    this.cache.upsert(collection, { ...updated, id: state.id });

    this.logger.info({ ruleId: state.id, scope: state.scope, mode: config.mode }, 'Access rule updated');
    this.events.publish(EventTypes.ACCESS_RULE_UPDATED, {
      ruleId: state.id,
      scope: state.scope,
      collectionId: collection.collectionId,
      mode: config.mode,
    });

    return this.readBack(state, 'updated');
  }

  async delete(state: AccessRuleState): Promise<void> {
    const collection = collectionOf(state);
    await this.provider.deleteAccessRule(collection, state.id);
    this.cache.remove(collection, state.id);

    this.logger.info({ ruleId: state.id, scope: state.scope, zone: state.zone }, 'Access rule deleted');
    this.events.publish(EventTypes.ACCESS_RULE_DELETED, {
      ruleId: state.id,
      scope: state.scope,
      collectionId: collection.collectionId,
    });
  }

  /**
   * Import an existing rule from a `scope/zoneName/ruleID` ID
   */
  async import(importId: string): Promise<AccessRuleState | null> {
    const { scope, zoneName, ruleId } = parseImportId(importId);

    const zoneId = await this.resolver.zoneIdByName(zoneName);
    const collection = await this.resolver.resolve(scope, zoneId);

    this.logger.debug({ ruleId, scope, zone: zoneName }, 'Importing access rule');

    return this.read({
      id: ruleId,
      zone: zoneName,
      zoneId,
      orgId: collection.kind === 'organization' ? collection.collectionId : NO_ORGANIZATION,
      scope,
      mode: 'block',
      target: 'ip',
      value: '',
      notes: '',
    });
  }

  /**
   * Read back a rule this process just wrote. Not finding it is a remote
   * contract violation, not an out-of-band deletion.
   */
  private async readBack(state: AccessRuleState, action: 'created' | 'updated'): Promise<AccessRuleState> {
    try {
      const rule = await this.locator.find(collectionOf(state), state.id);
      return withRule(state, rule);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new UpstreamError(`Access rule ${state.id} was ${action} but cannot be found in its collection`, undefined, {
          cause: error,
        });
      }
      throw error;
    }
  }

  /**
   * Zone and scope force a new resource
   */
  requiresReplacement(state: AccessRuleState, input: Pick<AccessRuleResourceInput, 'zone' | 'scope'>): boolean {
    return state.zone !== input.zone || state.scope !== input.scope;
  }
}
