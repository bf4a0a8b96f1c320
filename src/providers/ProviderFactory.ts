/**
 * Firewall Provider Factory
 * Creates the remote API provider from configuration
 */
import { logger } from '../core/Logger.js';
import type { CloudflareConfig, LookupConfig } from '../config/schema.js';
import type { FirewallProvider } from './base/FirewallProvider.js';
import { CloudflareFirewallProvider } from './cloudflare/CloudflareFirewallProvider.js';

export function createProvider(cloudflare: CloudflareConfig, lookup: Pick<LookupConfig, 'perPage'>): FirewallProvider {
  logger.debug({ baseUrl: cloudflare.baseUrl, perPage: lookup.perPage }, 'Creating Cloudflare firewall provider');

  return new CloudflareFirewallProvider({
    apiToken: cloudflare.apiToken,
    baseUrl: cloudflare.baseUrl,
    maxRetries: cloudflare.maxRetries,
    timeout: cloudflare.timeout,
    perPage: lookup.perPage,
  });
}
