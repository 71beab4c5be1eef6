import { Router } from 'express';
import { z } from 'zod';
import {
  describeStatus,
  parseMessageStatus,
  type ChannelData,
  type Message,
  type MessagePart,
} from '@sms-gateway/core';
import { SendMessageRequestSchema } from '@sms-gateway/contracts';

import { asyncHandler } from '../middleware/error-handler';
import type { MessageService } from '../services/message-service';
import { HttpError } from '../utils/http-errors';

const ListMessagesQuerySchema = z.object({
  status: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return undefined;
      }
      const status = parseMessageStatus(value);
      if (!status) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown status "${value}"` });
        return z.NEVER;
      }
      return status;
    }),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

const serializeChannelData = (data: ChannelData | null): Record<string, string | number> | null => {
  if (!data) {
    return null;
  }
  return Object.fromEntries(
    Object.entries(data).map(([key, value]) => [key, value instanceof Date ? value.toISOString() : value])
  );
};

const toIso = (value: Date | null): string | null => (value ? value.toISOString() : null);

const formatPart = (part: MessagePart) => ({
  providerMessageId: part.providerMessageId,
  partNumber: part.partNumber,
  totalParts: part.totalParts,
  status: part.status,
  deliveredAt: toIso(part.deliveredAt),
  deliveryStatus: part.deliveryStatus,
  errorCode: part.errorCode,
});

export const formatMessageResponse = (message: Message) => ({
  id: message.id,
  recipient: message.recipient,
  content: message.content,
  channelType: message.channelType,
  providerName: message.providerName,
  status: message.status,
  statusLabel: describeStatus(message.status),
  providerMessageId: message.providerMessageId,
  createdAt: message.createdAt.toISOString(),
  updatedAt: message.updatedAt.toISOString(),
  sentAt: toIso(message.sentAt),
  deliveredAt: toIso(message.deliveredAt),
  deliveryStatus: message.deliveryStatus,
  errorCode: message.errorCode,
  networkErrorCode: message.networkErrorCode,
  deliveryReceiptText: message.deliveryReceiptText,
  channelData: serializeChannelData(message.channelData),
  parts: message.parts.map(formatPart),
});

export const createMessagesRouter = (service: MessageService): Router => {
  const router = Router();

  router.post(
    '/send',
    asyncHandler(async (req, res) => {
      const parsed = SendMessageRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw HttpError.invalidBody(parsed.error.issues);
      }

      const message = await service.sendMessage(parsed.data);
      const statusUrl = `${req.baseUrl}/${message.id}/status`;

      res.status(202).location(statusUrl).json({
        success: true,
        data: {
          message: formatMessageResponse(message),
          statusUrl,
        },
      });
    })
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const parsed = ListMessagesQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw HttpError.invalidBody(parsed.error.issues);
      }

      const messages = await service.listMessages(parsed.data);
      res.json({
        success: true,
        data: {
          items: messages.map(formatMessageResponse),
          total: messages.length,
        },
      });
    })
  );

  router.get(
    '/:id/status',
    asyncHandler(async (req, res) => {
      const message = await service.getMessage(req.params.id ?? '');
      res.json({ success: true, data: formatMessageResponse(message) });
    })
  );

  return router;
};
