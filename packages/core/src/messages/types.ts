import { z } from 'zod';

import { ChannelTypeSchema, EntityIdSchema, TimestampSchema } from '../common/types';
import { MessageStatus } from './status';

export const MAX_MESSAGE_CONTENT_LENGTH = 10_000;

/** Diagnostic values a channel may attach to a send outcome. */
export const ChannelDataValueSchema = z.union([z.string(), z.number(), z.date()]);
export type ChannelDataValue = z.infer<typeof ChannelDataValueSchema>;

export const ChannelDataSchema = z.record(ChannelDataValueSchema);
export type ChannelData = z.infer<typeof ChannelDataSchema>;

/** One segment of a message the provider split and acknowledged under its own id. */
export const MessagePartSchema = z.object({
  providerMessageId: z.string().min(1),
  partNumber: z.number().int().positive(),
  totalParts: z.number().int().positive(),
  status: z.nativeEnum(MessageStatus),
  deliveredAt: TimestampSchema.nullable(),
  deliveryStatus: z.string().nullable(),
  deliveryReceiptText: z.string().nullable(),
  errorCode: z.number().int().nullable(),
  updatedAt: TimestampSchema,
});

export type MessagePart = z.infer<typeof MessagePartSchema>;

export const MessageSchema = z.object({
  id: EntityIdSchema,
  recipient: z.string().min(1),
  content: z.string().min(1).max(MAX_MESSAGE_CONTENT_LENGTH),
  channelType: ChannelTypeSchema,
  providerName: z.string().nullable(),
  status: z.nativeEnum(MessageStatus),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
  sentAt: TimestampSchema.nullable(),
  providerMessageId: z.string().nullable(),
  deliveredAt: TimestampSchema.nullable(),
  deliveryStatus: z.string().nullable(),
  errorCode: z.number().int().nullable(),
  networkErrorCode: z.number().int().nullable(),
  deliveryReceiptText: z.string().nullable(),
  channelData: ChannelDataSchema.nullable(),
  // Empty unless the provider acknowledged the message in several parts.
  parts: z.array(MessagePartSchema),
});

export type Message = z.infer<typeof MessageSchema>;

/** The part of a message a channel needs to dispatch it. */
export type OutboundMessage = Pick<Message, 'recipient' | 'content'> & Partial<Pick<Message, 'id'>>;

export type CreateMessageInput = Pick<Message, 'recipient' | 'content' | 'channelType'>;

export type MessageUpdate = Partial<Omit<Message, 'id' | 'createdAt'>>;
