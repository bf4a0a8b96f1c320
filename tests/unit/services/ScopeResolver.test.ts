/**
 * ScopeResolver unit tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { ScopeResolver } from '../../../src/services/ScopeResolver.js';
import { UpstreamError } from '../../../src/core/errors.js';
import { FakeFirewallProvider } from '../../helpers/FakeFirewallProvider.js';

describe('ScopeResolver', () => {
  let provider: FakeFirewallProvider;
  let resolver: ScopeResolver;

  beforeEach(() => {
    provider = new FakeFirewallProvider().addZone({ id: 'zone-1', name: 'example.com', ownerId: 'org-9' });
    resolver = new ScopeResolver(provider);
  });

  it('should use the zone ID itself for zone scope without remote calls', async () => {
    const collection = await resolver.resolve('zone', 'zone-1');

    expect(collection).toEqual({ kind: 'zone', collectionId: 'zone-1' });
    expect(provider.calls).toEqual([]);
  });

  it('should resolve the owning organization with one zone details call', async () => {
    const collection = await resolver.resolve('organization', 'zone-1');

    expect(collection).toEqual({ kind: 'organization', collectionId: 'org-9' });
    expect(provider.calls).toEqual(['zoneDetails:zone-1']);
  });

  it('should not cache organization resolution', async () => {
    await resolver.resolve('organization', 'zone-1');
    await resolver.resolve('organization', 'zone-1');

    expect(provider.calls).toEqual(['zoneDetails:zone-1', 'zoneDetails:zone-1']);
  });

  it('should propagate zone details failures unchanged', async () => {
    await expect(resolver.resolve('organization', 'unknown-zone')).rejects.toBeInstanceOf(UpstreamError);
    expect(provider.calls).toEqual(['zoneDetails:unknown-zone']);
  });

  it('should look up zone IDs by name', async () => {
    await expect(resolver.zoneIdByName('example.com')).resolves.toBe('zone-1');
    await expect(resolver.zoneIdByName('missing.example')).rejects.toThrow('Zone not found: missing.example');
  });
});
