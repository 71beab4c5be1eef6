import type { ChannelType, OutboundMessage } from '@sms-gateway/core';
import type { DeliveryReceipt, SendResult } from '@sms-gateway/contracts';

/**
 * A pluggable delivery mechanism. `send` resolves every outcome to a SendResult and never rejects.
 */
export interface MessageChannel {
  readonly channelType: ChannelType;
  readonly providerName: string;
  /** Whether the provider reports delivery back through a webhook. */
  readonly expectsDeliveryReceipts: boolean;
  /** Shared secret used to verify delivery receipt callbacks, if the provider signs them. */
  readonly webhookSecret: string | null;
  send(message: OutboundMessage): Promise<SendResult>;
  isHealthy(): Promise<boolean>;
}

export type DeliveryReceiptListener = (receipt: DeliveryReceipt) => void;

/** A channel that reports delivery over its own connection rather than through a webhook. */
export interface ReceiptSource {
  /** Registers a listener and returns a function that removes it. */
  onDeliveryReceipt(listener: DeliveryReceiptListener): () => void;
}

export const isReceiptSource = (channel: MessageChannel): channel is MessageChannel & ReceiptSource =>
  'onDeliveryReceipt' in channel && typeof channel.onDeliveryReceipt === 'function';
