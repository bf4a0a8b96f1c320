/**
 * firewall-resources
 *
 * Declarative Cloudflare firewall access rules and virtual DNS clusters
 */
export * from './types/index.js';
export * from './core/index.js';
export { ConfigManager, getConfig, resetConfig } from './config/ConfigManager.js';
export {
  accessRuleInputSchema,
  virtualDnsInputSchema,
  isValidIpRange,
  type AppConfig,
  type CloudflareConfig,
  type LookupConfig,
  type AccessRuleResourceInput,
  type VirtualDNSResourceInput,
} from './config/schema.js';
export * from './providers/index.js';
export * from './services/index.js';
export * from './resources/index.js';
