import {
  MAX_MESSAGE_CONTENT_LENGTH,
  MessageStatus,
  NotFoundError,
  ValidationError,
  canTransition,
  mapDeliveryReceiptStatus,
  rollUpPartStatuses,
  type ChannelType,
  type Message,
  type MessagePart,
} from '@sms-gateway/core';
import type { DeliveryReceipt, SendResult, SendSuccess } from '@sms-gateway/contracts';

import type { ChannelRegistry } from '../channels/channel-registry';
import { logger as defaultLogger } from '../config/logger';
import type { ListMessagesFilter, MessageStore } from '../data/message-store';
import { recordDeliveryReceipt } from '../metrics/channel-metrics';
import type { Logger } from '../types/logger';

const LOG_PREFIX = '[MessageService]';

export type SendMessageInput = {
  recipient: string;
  content: string;
  channelType?: ChannelType | null;
  channelName?: string | null;
};

export type ReceiptTimeoutStatus = MessageStatus.ASSUMED_DELIVERED | MessageStatus.DELIVERY_UNKNOWN;

export type ExpireAwaitingReceiptsOptions = {
  now: Date;
  timeoutMs: number;
  timeoutStatus: ReceiptTimeoutStatus;
};

export type MessageServiceDependencies = {
  store: MessageStore;
  channels: ChannelRegistry;
  logger?: Logger;
  now?: () => Date;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const buildTimeoutDeliveryStatus = (status: ReceiptTimeoutStatus): string => `TIMEOUT_${status.toUpperCase()}`;

const buildParts = (result: SendSuccess, sentAt: Date): MessagePart[] => {
  const ids = result.providerMessageIds ?? [];
  if (ids.length < 2) {
    return [];
  }
  return ids.map((providerMessageId, index) => ({
    providerMessageId,
    partNumber: index + 1,
    totalParts: ids.length,
    status: MessageStatus.SENT,
    deliveredAt: null,
    deliveryStatus: null,
    deliveryReceiptText: null,
    errorCode: null,
    updatedAt: sentAt,
  }));
};

export class MessageService {
  private readonly store: MessageStore;
  private readonly channels: ChannelRegistry;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor({ store, channels, logger, now }: MessageServiceDependencies) {
    this.store = store;
    this.channels = channels;
    this.logger = logger ?? defaultLogger;
    this.now = now ?? (() => new Date());
  }

  /**
   * Creates the message, dispatches it through the selected channel and stores the outcome.
   * Channel failures are recorded on the message, never thrown.
   */
  async sendMessage(input: SendMessageInput): Promise<Message> {
    const recipient = input.recipient.trim();
    if (!recipient || !input.content.trim()) {
      throw new ValidationError('Phone number and content are required');
    }
    if (input.content.length > MAX_MESSAGE_CONTENT_LENGTH) {
      throw new ValidationError(`content cannot exceed ${MAX_MESSAGE_CONTENT_LENGTH} characters`, {
        length: input.content.length,
      });
    }

    const channelType = input.channelType ?? this.channels.defaultType;
    const message = await this.store.create({ recipient, content: input.content, channelType });
    const channel = this.channels.resolve({ channelType, providerName: input.channelName });

    if (!channel) {
      const errorMessage = `No channel available for ${channelType}`;
      this.logger.error(`${LOG_PREFIX} ${errorMessage}`, {
        messageId: message.id,
        channelType,
        channelName: input.channelName ?? null,
      });
      return this.store.update(message.id, {
        status: MessageStatus.FAILED,
        channelData: { errorMessage },
      });
    }

    let result: SendResult;
    try {
      result = await channel.send({ id: message.id, recipient: message.recipient, content: message.content });
    } catch (error) {
      // Channels resolve their faults; a rejection here is a bug in the channel.
      this.logger.error(`${LOG_PREFIX} Channel rejected instead of resolving`, {
        messageId: message.id,
        providerName: channel.providerName,
        error: describeError(error),
      });
      return this.store.update(message.id, {
        status: MessageStatus.FAILED,
        providerName: channel.providerName,
        channelData: { errorMessage: `Unexpected error: ${describeError(error)}` },
      });
    }

    if (result.success) {
      const sentAt = this.now();
      const parts = buildParts(result, sentAt);
      this.logger.info(`${LOG_PREFIX} Message sent`, {
        messageId: message.id,
        providerName: channel.providerName,
        providerMessageId: result.providerMessageId,
        parts: parts.length || 1,
      });
      return this.store.update(message.id, {
        status: MessageStatus.SENT,
        sentAt,
        providerMessageId: result.providerMessageId,
        providerName: channel.providerName,
        channelData: result.channelData,
        parts,
      });
    }

    this.logger.warn(`${LOG_PREFIX} Message send failed`, {
      messageId: message.id,
      providerName: channel.providerName,
      errorMessage: result.errorMessage,
    });
    return this.store.update(message.id, {
      status: MessageStatus.FAILED,
      providerName: channel.providerName,
      errorCode: result.errorCode ?? null,
      networkErrorCode: result.networkErrorCode ?? null,
      channelData: { ...result.channelData, errorMessage: result.errorMessage },
    });
  }

  async getMessage(id: string): Promise<Message> {
    const message = await this.store.getById(id);
    if (!message) {
      throw new NotFoundError('Message', id);
    }
    return message;
  }

  async listMessages(filter: ListMessagesFilter = {}): Promise<Message[]> {
    return this.store.list(filter);
  }

  /**
   * Settles a message from a receipt reported by `providerName`. Only messages sent through that
   * provider match; anything else returns null. A receipt that would move a message backwards is
   * logged and ignored.
   */
  async applyDeliveryReceipt(receipt: DeliveryReceipt, providerName: string): Promise<Message | null> {
    const message = await this.store.findByProviderMessageId(receipt.providerMessageId, providerName);
    if (!message) {
      this.logger.warn(`${LOG_PREFIX} Receipt for unknown message`, {
        providerMessageId: receipt.providerMessageId,
        providerName,
      });
      return null;
    }

    const nextStatus = mapDeliveryReceiptStatus(receipt.status);
    recordDeliveryReceipt(providerName, nextStatus);

    const partIndex = message.parts.findIndex((part) => part.providerMessageId === receipt.providerMessageId);
    if (partIndex >= 0) {
      return this.applyPartReceipt(message, partIndex, receipt, nextStatus);
    }

    if (!canTransition(message.status, nextStatus)) {
      this.logger.warn(`${LOG_PREFIX} Ignoring receipt with illegal transition`, {
        messageId: message.id,
        from: message.status,
        to: nextStatus,
        receiptStatus: receipt.status,
      });
      return message;
    }

    this.logger.info(`${LOG_PREFIX} Delivery receipt applied`, {
      messageId: message.id,
      from: message.status,
      to: nextStatus,
    });

    return this.store.update(message.id, {
      status: nextStatus,
      deliveryStatus: receipt.status,
      deliveryReceiptText: receipt.receiptText,
      errorCode: receipt.errorCode,
      deliveredAt: nextStatus === MessageStatus.DELIVERED ? receipt.receivedAt : message.deliveredAt,
    });
  }

  private async applyPartReceipt(
    message: Message,
    partIndex: number,
    receipt: DeliveryReceipt,
    partStatus: MessageStatus
  ): Promise<Message> {
    const target = message.parts[partIndex];
    if (!target || !canTransition(target.status, partStatus)) {
      this.logger.warn(`${LOG_PREFIX} Ignoring part receipt with illegal transition`, {
        messageId: message.id,
        partNumber: target?.partNumber ?? null,
        from: target?.status ?? null,
        to: partStatus,
      });
      return message;
    }

    const parts = message.parts.map((part, index) =>
      index === partIndex
        ? {
            ...part,
            status: partStatus,
            deliveryStatus: receipt.status,
            deliveryReceiptText: receipt.receiptText,
            errorCode: receipt.errorCode,
            deliveredAt: partStatus === MessageStatus.DELIVERED ? receipt.receivedAt : part.deliveredAt,
            updatedAt: this.now(),
          }
        : part
    );
    const overall = rollUpPartStatuses(parts.map((part) => part.status));

    this.logger.info(`${LOG_PREFIX} Part receipt applied`, {
      messageId: message.id,
      partNumber: target.partNumber,
      totalParts: target.totalParts,
      partStatus,
      overall,
    });

    if (!canTransition(message.status, overall)) {
      // The message already settled (for example on a receipt timeout); keep the part history only.
      return this.store.update(message.id, { parts });
    }

    return this.store.update(message.id, {
      parts,
      status: overall,
      deliveryStatus: receipt.status,
      deliveryReceiptText: receipt.receiptText,
      errorCode: receipt.errorCode,
      deliveredAt: overall === MessageStatus.DELIVERED ? (message.deliveredAt ?? receipt.receivedAt) : message.deliveredAt,
    });
  }

  /**
   * Moves SENT messages whose channel never reports delivery into the configured heuristic state
   * once they have waited `timeoutMs`. The write only lands while the message is still SENT, so a
   * receipt arriving during the sweep wins. Returns the number of messages updated.
   */
  async expireAwaitingReceipts({ now, timeoutMs, timeoutStatus }: ExpireAwaitingReceiptsOptions): Promise<number> {
    const threshold = new Date(now.getTime() - timeoutMs);
    const candidates = await this.store.findAwaitingReceipt(threshold);
    let updated = 0;

    for (const message of candidates) {
      const channel = message.providerName ? this.channels.findByProviderName(message.providerName) : null;
      if (!channel) {
        this.logger.warn(`${LOG_PREFIX} No channel found for message awaiting receipt`, {
          messageId: message.id,
          providerName: message.providerName,
        });
        continue;
      }
      if (channel.expectsDeliveryReceipts) {
        continue;
      }

      const expired = await this.store.updateIfStatus(message.id, MessageStatus.SENT, {
        status: timeoutStatus,
        deliveryStatus: buildTimeoutDeliveryStatus(timeoutStatus),
        updatedAt: now,
      });
      if (!expired) {
        this.logger.debug(`${LOG_PREFIX} Message settled during the receipt sweep`, { messageId: message.id });
        continue;
      }
      updated += 1;
    }

    if (updated > 0) {
      this.logger.info(`${LOG_PREFIX} Receipt wait expired`, { count: updated, timeoutStatus, timeoutMs });
    } else {
      this.logger.debug(`${LOG_PREFIX} No messages past the receipt wait`);
    }

    return updated;
  }
}
