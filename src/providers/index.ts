/**
 * Providers module exports
 */
export type { FirewallProvider } from './base/index.js';
export { CloudflareFirewallProvider, type CloudflareFirewallProviderOptions } from './cloudflare/index.js';
export { createProvider } from './ProviderFactory.js';
