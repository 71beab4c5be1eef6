import { ConflictError } from '@sms-gateway/core';
import { describe, expect, it } from 'vitest';

import { createFakeChannel } from '../test-utils/channel-stubs';
import { ChannelRegistry } from './channel-registry';
import { DryRunChannel } from './dryrun-channel';

describe('ChannelRegistry', () => {
  it('resolves the first channel of the default type', () => {
    const primary = createFakeChannel({ providerName: 'Primary' }).channel;
    const backup = createFakeChannel({ providerName: 'Backup' }).channel;
    const registry = new ChannelRegistry().register(new DryRunChannel()).register(primary).register(backup);

    expect(registry.defaultType).toBe('HTTP');
    expect(registry.resolve()).toBe(primary);
  });

  it('narrows by provider name without regard to case', () => {
    const primary = createFakeChannel({ providerName: 'Primary' }).channel;
    const backup = createFakeChannel({ providerName: 'Backup' }).channel;
    const registry = new ChannelRegistry().register(primary).register(backup);

    expect(registry.resolve({ providerName: ' backup ' })).toBe(backup);
    expect(registry.resolve({ providerName: 'missing' })).toBeNull();
  });

  it('resolves by explicit type', () => {
    const dryRun = new DryRunChannel();
    const registry = new ChannelRegistry('DRYRUN').register(createFakeChannel().channel).register(dryRun);

    expect(registry.resolve()).toBe(dryRun);
    expect(registry.resolve({ channelType: 'SMPP' })).toBeNull();
  });

  it('refuses duplicate registrations', () => {
    const registry = new ChannelRegistry().register(createFakeChannel({ providerName: 'Acme' }).channel);

    expect(() => registry.register(createFakeChannel({ providerName: 'ACME' }).channel)).toThrow(ConflictError);
  });

  it('allows one provider name across different types', () => {
    const registry = new ChannelRegistry()
      .register(createFakeChannel({ providerName: 'shared' }).channel)
      .register(new DryRunChannel('shared'));

    expect(registry.list()).toHaveLength(2);
  });

  it('finds channels by provider name for webhooks', () => {
    const acme = createFakeChannel({ providerName: 'Acme' }).channel;
    const registry = new ChannelRegistry().register(acme);

    expect(registry.findByProviderName('acme')).toBe(acme);
    expect(registry.findByProviderName('other')).toBeNull();
  });

  it('describes channel health, treating health check failures as unhealthy', async () => {
    const healthy = createFakeChannel({ providerName: 'Healthy', expectsDeliveryReceipts: true });
    const broken = createFakeChannel({ providerName: 'Broken' });
    broken.isHealthy.mockRejectedValueOnce(new Error('health check crashed'));
    const registry = new ChannelRegistry().register(healthy.channel).register(broken.channel);

    await expect(registry.describe()).resolves.toEqual([
      { channelType: 'HTTP', providerName: 'Healthy', expectsDeliveryReceipts: true, healthy: true },
      { channelType: 'HTTP', providerName: 'Broken', expectsDeliveryReceipts: false, healthy: false },
    ]);
  });
});
