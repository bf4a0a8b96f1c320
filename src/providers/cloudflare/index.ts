/**
 * Cloudflare provider exports
 */
export {
  CloudflareFirewallProvider,
  statusOf,
  type CloudflareFirewallProviderOptions,
} from './CloudflareFirewallProvider.js';
export { accessRulesPath, virtualDnsPath } from './wire.js';
