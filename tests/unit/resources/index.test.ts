/**
 * Resource wiring unit tests
 */
import { describe, it, expect } from 'vitest';
import { createFirewallResources, requireVirtualDns } from '../../../src/resources/index.js';
import { ConfigManager } from '../../../src/config/ConfigManager.js';
import { EventBus } from '../../../src/core/EventBus.js';
import { CloudflareFirewallProvider } from '../../../src/providers/cloudflare/CloudflareFirewallProvider.js';
import { FakeFirewallProvider, makeRule } from '../../helpers/FakeFirewallProvider.js';

const env = { LOG_LEVEL: 'silent', CLOUDFLARE_API_TOKEN: 'test-token' };

describe('createFirewallResources', () => {
  it('should build the Cloudflare provider from config', () => {
    const resources = createFirewallResources({ config: new ConfigManager(env), events: new EventBus() });

    expect(resources.provider).toBeInstanceOf(CloudflareFirewallProvider);
  });

  it('should leave virtual DNS unavailable without an organization', () => {
    const resources = createFirewallResources({
      config: new ConfigManager(env),
      provider: new FakeFirewallProvider(),
      events: new EventBus(),
    });

    expect(resources.virtualDns).toBeNull();
    expect(() => requireVirtualDns(resources)).toThrow(
      'CLOUDFLARE_ORGANIZATION_ID is required to manage virtual DNS clusters'
    );
  });

  it('should scope virtual DNS to the configured organization', async () => {
    const provider = new FakeFirewallProvider();
    const resources = createFirewallResources({
      config: new ConfigManager({ ...env, CLOUDFLARE_ORGANIZATION_ID: 'org-9' }),
      provider,
      events: new EventBus(),
    });

    await requireVirtualDns(resources).list();

    expect(provider.calls).toEqual(['listVirtualDNS:org-9']);
  });

  it('should apply the configured page cap to lookups', async () => {
    const provider = new FakeFirewallProvider().setRules({ kind: 'zone', collectionId: 'zone-1' }, [
      [makeRule('a')],
      [makeRule('b')],
    ]);
    const resources = createFirewallResources({
      config: new ConfigManager({ ...env, ACCESS_RULES_MAX_PAGES: '1' }),
      provider,
      events: new EventBus(),
    });

    await expect(resources.locator.find({ kind: 'zone', collectionId: 'zone-1' }, 'a')).rejects.toThrow(
      'Access rule listing for zone:zone-1 exceeded 1 pages'
    );
  });

  it('should give each set its own lookup cache', () => {
    const config = new ConfigManager(env);
    const provider = new FakeFirewallProvider();

    const first = createFirewallResources({ config, provider, events: new EventBus() });
    const second = createFirewallResources({ config, provider, events: new EventBus() });

    expect(first.cache).not.toBe(second.cache);
  });
});
