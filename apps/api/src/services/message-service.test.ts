import { MessageStatus, NotFoundError, ValidationError } from '@sms-gateway/core';
import {
  createMultipartSendSuccess,
  createSendFailure,
  createSendSuccess,
  type DeliveryReceipt,
} from '@sms-gateway/contracts';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { ChannelRegistry } from '../channels/channel-registry';
import { DryRunChannel } from '../channels/dryrun-channel';
import { InMemoryMessageStore } from '../data/message-store';
import { createFakeChannel, createTestLogger } from '../test-utils/channel-stubs';
import { MessageService, buildTimeoutDeliveryStatus } from './message-service';

const SENT_AT = new Date('2026-04-01T08:00:00.000Z');

const receipt = (overrides: Partial<DeliveryReceipt> = {}): DeliveryReceipt => ({
  providerMessageId: 'provider-1',
  status: 'DELIVRD',
  errorCode: null,
  receivedAt: new Date('2026-04-01T08:00:30.000Z'),
  receiptText: 'id:provider-1 stat:DELIVRD err:000',
  ...overrides,
});

describe('MessageService', () => {
  let store: InMemoryMessageStore;
  let registry: ChannelRegistry;
  let logger: ReturnType<typeof createTestLogger>;

  const createService = () => new MessageService({ store, channels: registry, logger, now: () => SENT_AT });

  beforeEach(() => {
    store = new InMemoryMessageStore(() => SENT_AT);
    registry = new ChannelRegistry();
    logger = createTestLogger();
  });

  describe('sendMessage', () => {
    it('stores a SENT message with the provider id', async () => {
      const fake = createFakeChannel({
        providerName: 'Acme',
        result: createSendSuccess('SM123', { httpStatusCode: 201 }),
      });
      registry.register(fake.channel);

      const message = await createService().sendMessage({ recipient: ' +15551234567 ', content: 'Hello' });

      expect(message).toMatchObject({
        recipient: '+15551234567',
        channelType: 'HTTP',
        status: MessageStatus.SENT,
        providerMessageId: 'SM123',
        providerName: 'Acme',
        sentAt: SENT_AT,
        channelData: { httpStatusCode: 201 },
      });
      expect(fake.send).toHaveBeenCalledWith({ id: message.id, recipient: '+15551234567', content: 'Hello' });
      await expect(store.getById(message.id)).resolves.toEqual(message);
    });

    it('records failures with their codes and message', async () => {
      const fake = createFakeChannel({
        providerName: 'Acme',
        result: createSendFailure('HTTP API error: 500', { errorCode: 500, networkErrorCode: 500 }, { rawResponse: 'boom' }),
      });
      registry.register(fake.channel);

      const message = await createService().sendMessage({ recipient: '+15551234567', content: 'Hello' });

      expect(message).toMatchObject({
        status: MessageStatus.FAILED,
        providerName: 'Acme',
        providerMessageId: null,
        sentAt: null,
        errorCode: 500,
        networkErrorCode: 500,
        channelData: { rawResponse: 'boom', errorMessage: 'HTTP API error: 500' },
      });
    });

    it('stores null codes when the failure carries none', async () => {
      registry.register(createFakeChannel({ result: createSendFailure('HTTP request timed out', { networkErrorCode: 408 }) }).channel);

      const message = await createService().sendMessage({ recipient: '+15551234567', content: 'Hello' });

      expect(message.errorCode).toBeNull();
      expect(message.networkErrorCode).toBe(408);
    });

    it('fails the message when no channel matches', async () => {
      const message = await createService().sendMessage({
        recipient: '+15551234567',
        content: 'Hello',
        channelType: 'SMPP',
      });

      expect(message.status).toBe(MessageStatus.FAILED);
      expect(message.channelData).toEqual({ errorMessage: 'No channel available for SMPP' });
    });

    it('routes by channel type and provider name', async () => {
      const primary = createFakeChannel({ providerName: 'Primary' });
      const backup = createFakeChannel({ providerName: 'Backup' });
      registry.register(primary.channel).register(backup.channel).register(new DryRunChannel());

      const routed = await createService().sendMessage({
        recipient: '+15551234567',
        content: 'Hello',
        channelName: 'backup',
      });
      const dryRun = await createService().sendMessage({
        recipient: '+15551234567',
        content: 'Hello',
        channelType: 'DRYRUN',
      });

      expect(routed.providerName).toBe('Backup');
      expect(primary.send).not.toHaveBeenCalled();
      expect(dryRun).toMatchObject({ channelType: 'DRYRUN', providerName: 'dryrun', status: MessageStatus.SENT });
    });

    it('records a channel that rejects as an unexpected error', async () => {
      const fake = createFakeChannel({ providerName: 'Acme' });
      fake.send.mockRejectedValueOnce(new Error('channel bug'));
      registry.register(fake.channel);

      const message = await createService().sendMessage({ recipient: '+15551234567', content: 'Hello' });

      expect(message).toMatchObject({
        status: MessageStatus.FAILED,
        providerName: 'Acme',
        channelData: { errorMessage: 'Unexpected error: channel bug' },
      });
    });

    it.each([
      ['an empty recipient', { recipient: '  ', content: 'Hello' }],
      ['empty content', { recipient: '+15551234567', content: '' }],
      ['oversized content', { recipient: '+15551234567', content: 'x'.repeat(10_001) }],
    ])('rejects %s before storing anything', async (_label, input) => {
      registry.register(createFakeChannel().channel);

      await expect(createService().sendMessage(input)).rejects.toBeInstanceOf(ValidationError);
      await expect(store.list()).resolves.toHaveLength(0);
    });
  });

  describe('getMessage', () => {
    it('throws NotFoundError for unknown ids', async () => {
      await expect(createService().getMessage('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('applyDeliveryReceipt', () => {
    const sendThrough = async (expectsDeliveryReceipts = true) => {
      registry.register(createFakeChannel({ providerName: 'Acme', expectsDeliveryReceipts, result: createSendSuccess('provider-1') }).channel);
      const service = createService();
      const message = await service.sendMessage({ recipient: '+15551234567', content: 'Hello' });
      return { service, message };
    };

    it('settles a SENT message as delivered', async () => {
      const { service, message } = await sendThrough();

      const updated = await service.applyDeliveryReceipt(receipt(), 'Acme');

      expect(updated).toMatchObject({
        id: message.id,
        status: MessageStatus.DELIVERED,
        deliveryStatus: 'DELIVRD',
        deliveryReceiptText: 'id:provider-1 stat:DELIVRD err:000',
        deliveredAt: new Date('2026-04-01T08:00:30.000Z'),
        errorCode: null,
      });
    });

    it('records undelivered receipts with their error code', async () => {
      const { service } = await sendThrough();

      const updated = await service.applyDeliveryReceipt(receipt({ status: 'UNDELIV', errorCode: 34 }), 'Acme');

      expect(updated).toMatchObject({ status: MessageStatus.UNDELIVERED, errorCode: 34, deliveredAt: null });
    });

    it('keeps intermediate receipts in SENT', async () => {
      const { service } = await sendThrough();

      const updated = await service.applyDeliveryReceipt(receipt({ status: 'ENROUTE' }), 'Acme');

      expect(updated).toMatchObject({ status: MessageStatus.SENT, deliveryStatus: 'ENROUTE' });
    });

    it('lets a late receipt settle an assumed delivery', async () => {
      const { service, message } = await sendThrough();
      await store.update(message.id, { status: MessageStatus.ASSUMED_DELIVERED });

      const updated = await service.applyDeliveryReceipt(receipt({ status: 'REJECTD' }), 'Acme');

      expect(updated?.status).toBe(MessageStatus.REJECTED);
    });

    it('returns null for unknown provider ids', async () => {
      const { service } = await sendThrough();

      await expect(service.applyDeliveryReceipt(receipt({ providerMessageId: 'other' }), 'Acme')).resolves.toBeNull();
      expect(logger.warn).toHaveBeenCalledWith(
        '[MessageService] Receipt for unknown message',
        expect.objectContaining({ providerMessageId: 'other' })
      );
    });

    it('ignores receipts reported by a different provider', async () => {
      const { service, message } = await sendThrough();
      registry.register(createFakeChannel({ providerName: 'Other' }).channel);

      await expect(service.applyDeliveryReceipt(receipt(), 'Other')).resolves.toBeNull();
      await expect(store.getById(message.id)).resolves.toMatchObject({ status: MessageStatus.SENT });
    });

    it('ignores receipts that would move a settled message', async () => {
      const { service } = await sendThrough();
      await service.applyDeliveryReceipt(receipt(), 'Acme');

      const unchanged = await service.applyDeliveryReceipt(receipt({ status: 'EXPIRED' }), 'Acme');

      expect(unchanged).toMatchObject({ status: MessageStatus.DELIVERED, deliveryStatus: 'DELIVRD' });
    });
  });

  describe('multi-part messages', () => {
    const sendInParts = async () => {
      registry.register(
        createFakeChannel({
          channelType: 'SMPP',
          providerName: 'SMPP',
          result: createMultipartSendSuccess(['part-1', 'part-2', 'part-3'], { messageParts: 3 }),
        }).channel
      );
      const service = createService();
      const message = await service.sendMessage({ recipient: '+15551234567', content: 'Hello', channelType: 'SMPP' });
      return { service, message };
    };

    const partReceipt = (providerMessageId: string, status: string): DeliveryReceipt =>
      receipt({ providerMessageId, status, receiptText: `id:${providerMessageId} stat:${status}` });

    it('tracks one part per provider id', async () => {
      const { message } = await sendInParts();

      expect(message.providerMessageId).toBe('part-1');
      expect(message.parts.map((part) => [part.partNumber, part.totalParts, part.providerMessageId, part.status])).toEqual([
        [1, 3, 'part-1', MessageStatus.SENT],
        [2, 3, 'part-2', MessageStatus.SENT],
        [3, 3, 'part-3', MessageStatus.SENT],
      ]);
    });

    it('rolls part receipts up into the message status', async () => {
      const { service, message } = await sendInParts();

      const first = await service.applyDeliveryReceipt(partReceipt('part-2', 'DELIVRD'), 'SMPP');
      expect(first?.status).toBe(MessageStatus.PARTIALLY_DELIVERED);
      expect(first?.deliveredAt).toBeNull();
      expect(first?.parts[1]).toMatchObject({ status: MessageStatus.DELIVERED, deliveryStatus: 'DELIVRD' });

      await service.applyDeliveryReceipt(partReceipt('part-1', 'DELIVRD'), 'SMPP');
      const last = await service.applyDeliveryReceipt(partReceipt('part-3', 'DELIVRD'), 'SMPP');

      expect(last).toMatchObject({
        id: message.id,
        status: MessageStatus.DELIVERED,
        deliveredAt: new Date('2026-04-01T08:00:30.000Z'),
      });
    });

    it('marks a message undelivered when every part fails differently', async () => {
      const { service } = await sendInParts();

      await service.applyDeliveryReceipt(partReceipt('part-1', 'EXPIRED'), 'SMPP');
      await service.applyDeliveryReceipt(partReceipt('part-2', 'REJECTD'), 'SMPP');
      const pending = await service.applyDeliveryReceipt(partReceipt('part-3', 'ENROUTE'), 'SMPP');
      expect(pending?.status).toBe(MessageStatus.SENT);

      const settled = await service.applyDeliveryReceipt(partReceipt('part-3', 'UNDELIV'), 'SMPP');
      expect(settled?.status).toBe(MessageStatus.UNDELIVERED);
    });

    it('ignores a part receipt that would move a settled part', async () => {
      const { service } = await sendInParts();
      await service.applyDeliveryReceipt(partReceipt('part-1', 'DELIVRD'), 'SMPP');

      const unchanged = await service.applyDeliveryReceipt(partReceipt('part-1', 'EXPIRED'), 'SMPP');

      expect(unchanged?.parts[0]?.status).toBe(MessageStatus.DELIVERED);
      expect(logger.warn).toHaveBeenCalledWith(
        '[MessageService] Ignoring part receipt with illegal transition',
        expect.objectContaining({ partNumber: 1, from: MessageStatus.DELIVERED, to: MessageStatus.EXPIRED })
      );
    });
  });

  describe('expireAwaitingReceipts', () => {
    const HOUR = 60 * 60 * 1_000;

    it('moves messages from receipt-less channels into the timeout status', async () => {
      registry.register(createFakeChannel({ providerName: 'Quiet', expectsDeliveryReceipts: false }).channel);
      const service = createService();
      const message = await service.sendMessage({ recipient: '+15551234567', content: 'Hello' });
      const now = new Date(SENT_AT.getTime() + HOUR);

      const count = await service.expireAwaitingReceipts({
        now,
        timeoutMs: HOUR,
        timeoutStatus: MessageStatus.ASSUMED_DELIVERED,
      });

      expect(count).toBe(1);
      await expect(store.getById(message.id)).resolves.toMatchObject({
        status: MessageStatus.ASSUMED_DELIVERED,
        deliveryStatus: 'TIMEOUT_ASSUMED_DELIVERED',
        updatedAt: now,
      });
    });

    it('leaves messages that are still within the wait', async () => {
      registry.register(createFakeChannel({ providerName: 'Quiet' }).channel);
      const service = createService();
      await service.sendMessage({ recipient: '+15551234567', content: 'Hello' });

      const count = await service.expireAwaitingReceipts({
        now: new Date(SENT_AT.getTime() + HOUR - 1),
        timeoutMs: HOUR,
        timeoutStatus: MessageStatus.ASSUMED_DELIVERED,
      });

      expect(count).toBe(0);
    });

    it('waits for receipts from channels that send them', async () => {
      registry.register(createFakeChannel({ providerName: 'Loud', expectsDeliveryReceipts: true }).channel);
      const service = createService();
      const message = await service.sendMessage({ recipient: '+15551234567', content: 'Hello' });

      const count = await service.expireAwaitingReceipts({
        now: new Date(SENT_AT.getTime() + 2 * HOUR),
        timeoutMs: HOUR,
        timeoutStatus: MessageStatus.DELIVERY_UNKNOWN,
      });

      expect(count).toBe(0);
      await expect(store.getById(message.id)).resolves.toMatchObject({ status: MessageStatus.SENT });
    });

    it('leaves a message that settled after the sweep read it', async () => {
      registry.register(createFakeChannel({ providerName: 'Quiet', expectsDeliveryReceipts: false }).channel);
      const service = createService();
      const message = await service.sendMessage({ recipient: '+15551234567', content: 'Hello' });
      const now = new Date(SENT_AT.getTime() + HOUR);
      const snapshot = await store.findAwaitingReceipt(now);
      await store.update(message.id, { status: MessageStatus.DELIVERED, deliveryStatus: 'DELIVRD' });
      vi.spyOn(store, 'findAwaitingReceipt').mockResolvedValueOnce(snapshot);

      const count = await service.expireAwaitingReceipts({
        now,
        timeoutMs: HOUR,
        timeoutStatus: MessageStatus.ASSUMED_DELIVERED,
      });

      expect(count).toBe(0);
      await expect(store.getById(message.id)).resolves.toMatchObject({
        status: MessageStatus.DELIVERED,
        deliveryStatus: 'DELIVRD',
      });
    });

    it('skips messages whose channel is gone', async () => {
      const service = createService();
      const orphan = await store.create({ recipient: '+15551234567', content: 'Hello', channelType: 'HTTP' });
      await store.update(orphan.id, { status: MessageStatus.SENT, sentAt: SENT_AT, providerName: 'Retired' });

      const count = await service.expireAwaitingReceipts({
        now: new Date(SENT_AT.getTime() + 2 * HOUR),
        timeoutMs: HOUR,
        timeoutStatus: MessageStatus.DELIVERY_UNKNOWN,
      });

      expect(count).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(
        '[MessageService] No channel found for message awaiting receipt',
        expect.objectContaining({ messageId: orphan.id, providerName: 'Retired' })
      );
    });
  });

  it('formats timeout delivery statuses', () => {
    expect(buildTimeoutDeliveryStatus(MessageStatus.DELIVERY_UNKNOWN)).toBe('TIMEOUT_DELIVERY_UNKNOWN');
  });
});
