import { randomUUID } from 'node:crypto';

import type { OutboundMessage } from '@sms-gateway/core';
import { createSendFailure, createSendSuccess, type SendResult } from '@sms-gateway/contracts';

import type { MessageChannel } from './types';

export const DRYRUN_PROVIDER_NAME = 'dryrun';

/** Accepts every well-formed message without touching the network. */
export class DryRunChannel implements MessageChannel {
  readonly channelType = 'DRYRUN' as const;
  readonly expectsDeliveryReceipts = false;
  readonly webhookSecret = null;

  constructor(readonly providerName: string = DRYRUN_PROVIDER_NAME) {}

  async send(message: OutboundMessage): Promise<SendResult> {
    const completedAt = new Date();

    if (!message.recipient.trim() || !message.content.trim()) {
      return createSendFailure('Phone number and content are required', {}, {
        providerName: this.providerName,
        completedAt,
      });
    }

    return createSendSuccess(`dryrun_${randomUUID()}`, {
      providerName: this.providerName,
      completedAt,
      responseTimeMs: 0,
      dryrun: 'true',
    });
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }
}
