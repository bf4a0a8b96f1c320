/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, type LogLevel } from './Logger.js';
export { EventBus, eventBus, EventTypes, type EventType, type EventPayloadMap } from './EventBus.js';
export {
  FirewallResourceError,
  UpstreamError,
  NotFoundError,
  ValidationError,
  ImportIdError,
  type FirewallErrorCode,
} from './errors.js';
