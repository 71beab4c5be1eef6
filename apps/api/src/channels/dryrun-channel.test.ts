import { describe, expect, it } from 'vitest';

import { DryRunChannel } from './dryrun-channel';

describe('DryRunChannel', () => {
  it('accepts messages with a unique synthetic id', async () => {
    const channel = new DryRunChannel();

    const first = await channel.send({ recipient: '+15551234567', content: 'Hello' });
    const second = await channel.send({ recipient: '+15551234567', content: 'Hello' });

    if (!first.success || !second.success) {
      throw new Error('expected dry-run sends to succeed');
    }
    expect(first.providerMessageId).toMatch(/^dryrun_[0-9a-f-]{36}$/);
    expect(first.providerMessageId).not.toBe(second.providerMessageId);
    expect(first.channelData).toMatchObject({ providerName: 'dryrun', dryrun: 'true', responseTimeMs: 0 });
  });

  it('rejects blank input', async () => {
    const result = await new DryRunChannel('sandbox').send({ recipient: '+15551234567', content: ' ' });

    expect(result).toMatchObject({
      success: false,
      errorMessage: 'Phone number and content are required',
      channelData: { providerName: 'sandbox' },
    });
  });

  it('never asks for receipts and is always healthy', async () => {
    const channel = new DryRunChannel();

    expect(channel.channelType).toBe('DRYRUN');
    expect(channel.expectsDeliveryReceipts).toBe(false);
    expect(channel.webhookSecret).toBeNull();
    await expect(channel.isHealthy()).resolves.toBe(true);
  });
});
