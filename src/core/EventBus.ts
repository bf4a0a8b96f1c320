/**
 * Typed Event Bus for resource lifecycle and cache events
 */
import { EventEmitter } from 'events';
import { logger } from './Logger.js';
import type { RuleScope } from '../types/index.js';

export const EventTypes = {
  // Access rule lifecycle
  ACCESS_RULE_CREATED: 'access-rule:created',
  ACCESS_RULE_UPDATED: 'access-rule:updated',
  ACCESS_RULE_DELETED: 'access-rule:deleted',
  ACCESS_RULE_GONE: 'access-rule:gone',

  // Virtual DNS lifecycle
  VIRTUAL_DNS_CREATED: 'virtual-dns:created',
  VIRTUAL_DNS_UPDATED: 'virtual-dns:updated',
  VIRTUAL_DNS_DELETED: 'virtual-dns:deleted',
  VIRTUAL_DNS_GONE: 'virtual-dns:gone',

  // Lookup cache
  LOOKUP_CACHE_POPULATED: 'lookup:cache:populated',
  LOOKUP_CACHE_INVALIDATED: 'lookup:cache:invalidated',
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

interface AccessRuleEvent {
  ruleId: string;
  scope: RuleScope;
  collectionId: string;
}

export interface EventPayloadMap {
  [EventTypes.ACCESS_RULE_CREATED]: AccessRuleEvent & { mode: string; target: string; value: string };
  [EventTypes.ACCESS_RULE_UPDATED]: AccessRuleEvent & { mode: string };
  [EventTypes.ACCESS_RULE_DELETED]: AccessRuleEvent;
  [EventTypes.ACCESS_RULE_GONE]: AccessRuleEvent;
  [EventTypes.VIRTUAL_DNS_CREATED]: { clusterId: string; name: string };
  [EventTypes.VIRTUAL_DNS_UPDATED]: { clusterId: string; name: string };
  [EventTypes.VIRTUAL_DNS_DELETED]: { clusterId: string };
  [EventTypes.VIRTUAL_DNS_GONE]: { clusterId: string };
  [EventTypes.LOOKUP_CACHE_POPULATED]: { collection: string; ruleCount: number; pages: number };
  [EventTypes.LOOKUP_CACHE_INVALIDATED]: { collection: string | null };
}

type EventHandler<T extends EventType> = (data: EventPayloadMap[T]) => void | Promise<void>;

export class EventBus {
  private emitter: EventEmitter;
  private subscriberCounts: Map<EventType, number>;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(50);
    this.subscriberCounts = new Map();
  }

  /**
   * Subscribe to an event; returns the unsubscribe function
   */
  subscribe<T extends EventType>(eventType: T, handler: EventHandler<T>): () => void {
    const wrappedHandler = (data: EventPayloadMap[T]): void => {
      this.invoke(eventType, handler, data);
    };
    this.emitter.on(eventType, wrappedHandler);

    const currentCount = this.subscriberCounts.get(eventType) ?? 0;
    this.subscriberCounts.set(eventType, currentCount + 1);
    logger.debug({ eventType, subscribers: currentCount + 1 }, 'Subscribed to event');

    return (): void => {
      this.emitter.off(eventType, wrappedHandler);
      const count = this.subscriberCounts.get(eventType) ?? 1;
      this.subscriberCounts.set(eventType, count - 1);
    };
  }

  once<T extends EventType>(eventType: T, handler: EventHandler<T>): void {
    const currentCount = this.subscriberCounts.get(eventType) ?? 0;
    this.subscriberCounts.set(eventType, currentCount + 1);

    const wrappedHandler = (data: EventPayloadMap[T]): void => {
      const count = this.subscriberCounts.get(eventType) ?? 1;
      this.subscriberCounts.set(eventType, count - 1);
      this.invoke(eventType, handler, data);
    };

    this.emitter.once(eventType, wrappedHandler);
  }

  publish<T extends EventType>(eventType: T, data: EventPayloadMap[T]): void {
    const subscriberCount = this.subscriberCounts.get(eventType) ?? 0;
    if (subscriberCount > 0) {
      logger.trace({ eventType, subscribers: subscriberCount }, 'Publishing event');
      this.emitter.emit(eventType, data);
    }
  }

  /**
   * Handlers run synchronously; a rejected async handler is logged
   */
  private invoke<T extends EventType>(eventType: T, handler: EventHandler<T>, data: EventPayloadMap[T]): void {
    const logFailure = (error: unknown): void => {
      logger.error({ eventType, error }, 'Event handler failed');
    };
    try {
      const result = handler(data);
      if (result instanceof Promise) {
        void result.catch(logFailure);
      }
    } catch (error) {
      logFailure(error);
    }
  }

  getSubscriberCount(eventType: EventType): number {
    return this.subscriberCounts.get(eventType) ?? 0;
  }

  removeAllListeners(eventType?: EventType): void {
    if (eventType) {
      this.emitter.removeAllListeners(eventType);
      this.subscriberCounts.set(eventType, 0);
    } else {
      this.emitter.removeAllListeners();
      this.subscriberCounts.clear();
    }
  }
}

// Export singleton instance
export const eventBus = new EventBus();
