import { randomUUID } from 'node:crypto';

import {
  INITIAL_MESSAGE_STATUS,
  MessageStatus,
  NotFoundError,
  type CreateMessageInput,
  type Message,
  type MessageUpdate,
} from '@sms-gateway/core';

export type ListMessagesFilter = {
  status?: MessageStatus;
  limit?: number;
};

export interface MessageStore {
  getById(id: string): Promise<Message | null>;
  /** Newest first. */
  list(filter?: ListMessagesFilter): Promise<Message[]>;
  create(input: CreateMessageInput): Promise<Message>;
  update(id: string, patch: MessageUpdate): Promise<Message>;
  /** Applies `patch` only while the message is still in `expectedStatus`; resolves null otherwise. */
  updateIfStatus(id: string, expectedStatus: MessageStatus, patch: MessageUpdate): Promise<Message | null>;
  /**
   * Finds the message a provider acknowledged under `providerMessageId`, either as a whole or as one
   * of its parts. Only messages sent through `providerName` (compared case-insensitively) match.
   */
  findByProviderMessageId(providerMessageId: string, providerName: string): Promise<Message | null>;
  findAwaitingReceipt(sentBefore: Date): Promise<Message[]>;
}

const copyMessage = (message: Message): Message => ({
  ...message,
  channelData: message.channelData ? { ...message.channelData } : null,
  parts: message.parts.map((part) => ({ ...part })),
});

const sameProvider = (message: Message, providerName: string): boolean =>
  message.providerName !== null && message.providerName.toLowerCase() === providerName.trim().toLowerCase();

const carriesProviderId = (message: Message, providerMessageId: string): boolean =>
  message.providerMessageId === providerMessageId ||
  message.parts.some((part) => part.providerMessageId === providerMessageId);

type StoredMessage = { sequence: number; message: Message };

export class InMemoryMessageStore implements MessageStore {
  private readonly messages = new Map<string, StoredMessage>();
  private sequence = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async getById(id: string): Promise<Message | null> {
    const stored = this.messages.get(id);
    return stored ? copyMessage(stored.message) : null;
  }

  async list(filter: ListMessagesFilter = {}): Promise<Message[]> {
    const ordered = [...this.messages.values()]
      .filter((entry) => !filter.status || entry.message.status === filter.status)
      .sort(
        (left, right) =>
          right.message.createdAt.getTime() - left.message.createdAt.getTime() || right.sequence - left.sequence
      )
      .map((entry) => copyMessage(entry.message));

    return typeof filter.limit === 'number' ? ordered.slice(0, Math.max(filter.limit, 0)) : ordered;
  }

  async create(input: CreateMessageInput): Promise<Message> {
    const timestamp = this.now();
    const message: Message = {
      id: randomUUID(),
      recipient: input.recipient,
      content: input.content,
      channelType: input.channelType,
      providerName: null,
      status: INITIAL_MESSAGE_STATUS,
      createdAt: timestamp,
      updatedAt: timestamp,
      sentAt: null,
      providerMessageId: null,
      deliveredAt: null,
      deliveryStatus: null,
      errorCode: null,
      networkErrorCode: null,
      deliveryReceiptText: null,
      channelData: null,
      parts: [],
    };

    this.sequence += 1;
    this.messages.set(message.id, { sequence: this.sequence, message });
    return copyMessage(message);
  }

  async update(id: string, patch: MessageUpdate): Promise<Message> {
    const stored = this.messages.get(id);
    if (!stored) {
      throw new NotFoundError('Message', id);
    }

    const updated: Message = {
      ...stored.message,
      ...patch,
      id: stored.message.id,
      createdAt: stored.message.createdAt,
      updatedAt: patch.updatedAt ?? this.now(),
    };

    this.messages.set(id, { sequence: stored.sequence, message: updated });
    return copyMessage(updated);
  }

  async updateIfStatus(id: string, expectedStatus: MessageStatus, patch: MessageUpdate): Promise<Message | null> {
    const stored = this.messages.get(id);
    if (!stored || stored.message.status !== expectedStatus) {
      return null;
    }
    return this.update(id, patch);
  }

  async findByProviderMessageId(providerMessageId: string, providerName: string): Promise<Message | null> {
    for (const { message } of this.messages.values()) {
      if (sameProvider(message, providerName) && carriesProviderId(message, providerMessageId)) {
        return copyMessage(message);
      }
    }
    return null;
  }

  async findAwaitingReceipt(sentBefore: Date): Promise<Message[]> {
    return [...this.messages.values()]
      .map((entry) => entry.message)
      .filter(
        (message) =>
          message.status === MessageStatus.SENT && message.sentAt !== null && message.sentAt.getTime() <= sentBefore.getTime()
      )
      .map(copyMessage);
  }
}
