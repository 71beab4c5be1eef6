import { vi } from 'vitest';
import type { OutboundMessage } from '@sms-gateway/core';
import { createSendSuccess, type SendResult } from '@sms-gateway/contracts';

import {
  validateHttpChannelConfig,
  type HttpChannelConfig,
  type HttpChannelConfigInput,
} from '../channels/http/http-channel-config';
import type {
  HttpTransport,
  TransportCallOptions,
  TransportRequest,
  TransportResponse,
} from '../channels/http/transport';
import type { MessageChannel } from '../channels/types';
import type { Logger } from '../types/logger';

export type StubReply =
  | TransportResponse
  | Error
  | ((request: TransportRequest) => TransportResponse | Promise<TransportResponse>);

/**
 * Replays queued replies in order; the last reply repeats once the queue is down to one.
 */
export class StubTransport implements HttpTransport {
  readonly calls: Array<{ request: TransportRequest; options: TransportCallOptions }> = [];
  private readonly replies: StubReply[];

  constructor(...replies: StubReply[]) {
    this.replies = replies;
  }

  async send(request: TransportRequest, options: TransportCallOptions): Promise<TransportResponse> {
    this.calls.push({ request, options });
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];

    if (!reply) {
      throw new Error('StubTransport has no reply queued');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === 'function') {
      return reply(request);
    }
    return reply;
  }
}

export const jsonResponse = (status: number, body: unknown): TransportResponse => ({
  status,
  statusText: '',
  headers: { 'content-type': 'application/json' },
  body: typeof body === 'string' ? body : JSON.stringify(body),
});

export const textResponse = (status: number, body: string): TransportResponse => ({
  status,
  statusText: '',
  headers: { 'content-type': 'text/plain' },
  body,
});

export const createTestLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}) satisfies Logger;

export const buildHttpChannelConfig = (overrides: HttpChannelConfigInput = {}): HttpChannelConfig =>
  validateHttpChannelConfig({
    providerName: 'TestProvider',
    apiUrl: 'https://sms.test/messages',
    apiKey: 'test-secret',
    maxRetryAttempts: 0,
    timeoutMs: 1_000,
    ...overrides,
  });

type FakeChannelOptions = {
  channelType?: MessageChannel['channelType'];
  providerName?: string;
  expectsDeliveryReceipts?: boolean;
  webhookSecret?: string | null;
  result?: SendResult;
};

/** A channel whose send outcome is fixed up front. */
export const createFakeChannel = ({
  channelType = 'HTTP',
  providerName = 'FakeProvider',
  expectsDeliveryReceipts = false,
  webhookSecret = null,
  result = createSendSuccess('provider-1'),
}: FakeChannelOptions = {}) => {
  const send = vi.fn(async (_message: OutboundMessage): Promise<SendResult> => result);
  const isHealthy = vi.fn(async (): Promise<boolean> => true);

  const channel: MessageChannel = {
    channelType,
    providerName,
    expectsDeliveryReceipts,
    webhookSecret,
    send,
    isHealthy,
  };

  return { channel, send, isHealthy };
};
