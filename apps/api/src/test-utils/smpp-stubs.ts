import { vi } from 'vitest';

import type { InboundDeliverSm } from '../channels/smpp/delivery-receipt';
import type { SmppSession, SubmitSmRequest, SubmitSmResponse } from '../channels/smpp/session';
import {
  validateSmppChannelConfig,
  type SmppChannelConfig,
  type SmppChannelConfigInput,
} from '../channels/smpp/smpp-channel-config';

/** `'hang'` leaves the submit unanswered. */
export type FakeSubmitReply = SubmitSmResponse | Error | 'hang';

/**
 * An in-memory bound session. Unscripted submits are accepted as `msg-<n>`, counting every submit the
 * session has seen.
 */
export class FakeSmppSession implements SmppSession {
  bound = true;
  closed = false;
  enquireLinkError: Error | null = null;
  readonly submitted: SubmitSmRequest[] = [];
  private readonly listeners: Array<(pdu: InboundDeliverSm) => void> = [];
  private readonly replies: FakeSubmitReply[];

  constructor(...replies: FakeSubmitReply[]) {
    this.replies = replies;
  }

  async submit(request: SubmitSmRequest): Promise<SubmitSmResponse> {
    this.submitted.push(request);
    const reply = this.replies.shift() ?? { commandStatus: 0, messageId: `msg-${this.submitted.length}` };
    if (reply === 'hang') {
      return new Promise<SubmitSmResponse>(() => undefined);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  async enquireLink(): Promise<void> {
    if (this.enquireLinkError) {
      throw this.enquireLinkError;
    }
  }

  onDeliverSm(listener: (pdu: InboundDeliverSm) => void): void {
    this.listeners.push(listener);
  }

  /** Plays an inbound deliver_sm to every listener, as the SMSC would. */
  deliver(pdu: InboundDeliverSm): void {
    for (const listener of this.listeners) {
      listener(pdu);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.bound = false;
  }
}

/** Hands out the given sessions in order, then refuses to connect. */
export const createSessionFactory = (...sessions: FakeSmppSession[]) => {
  const queue = [...sessions];
  return vi.fn(async (): Promise<SmppSession> => {
    const session = queue.shift();
    if (!session) {
      throw new Error('connection refused');
    }
    return session;
  });
};

export const receiptPdu = (text: string, overrides: Partial<InboundDeliverSm> = {}): InboundDeliverSm => ({
  esmClass: 0x04,
  sourceAddress: '15551234567',
  shortMessage: text,
  receiptedMessageId: null,
  ...overrides,
});

export const buildSmppChannelConfig = (overrides: SmppChannelConfigInput = {}): SmppChannelConfig =>
  validateSmppChannelConfig({
    host: 'smsc.test',
    systemId: 'gateway',
    password: 'test-secret',
    maxConnections: 1,
    submitTimeoutMs: 200,
    apiTimeoutMs: 1_000,
    ...overrides,
  });
