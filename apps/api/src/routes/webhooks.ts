import { createHmac, timingSafeEqual } from 'node:crypto';

import { Router, type Request } from 'express';
import { NotFoundError } from '@sms-gateway/core';
import { DeliveryReceiptPayloadSchema } from '@sms-gateway/contracts';

import type { ChannelRegistry } from '../channels/channel-registry';
import { isReceiptSource } from '../channels/types';
import { logger } from '../config/logger';
import { asyncHandler } from '../middleware/error-handler';
import type { MessageService } from '../services/message-service';
import { HttpError } from '../utils/http-errors';
import { formatMessageResponse } from './messages';

export const SIGNATURE_HEADER = 'x-signature';

const readSignature = (req: Request): string | null => {
  const header = req.header(SIGNATURE_HEADER)?.trim();
  if (!header) {
    return null;
  }
  return header.startsWith('sha256=') ? header.slice('sha256='.length) : header;
};

export const signPayload = (secret: string, payload: Buffer | string): string =>
  createHmac('sha256', secret).update(payload).digest('hex');

export const verifySignature = (secret: string, payload: Buffer | string, signature: string): boolean => {
  const expectedBuffer = createHmac('sha256', secret).update(payload).digest();
  const providedBuffer = Buffer.from(signature, 'hex');
  return providedBuffer.length === expectedBuffer.length && timingSafeEqual(providedBuffer, expectedBuffer);
};

type WebhooksRouterDeps = {
  service: MessageService;
  channels: ChannelRegistry;
};

export const createWebhooksRouter = ({ service, channels }: WebhooksRouterDeps): Router => {
  const router = Router();

  router.post(
    '/delivery-receipts/:providerName',
    asyncHandler(async (req, res) => {
      const providerName = req.params.providerName ?? '';
      const channel = channels.findByProviderName(providerName);
      if (!channel) {
        throw new NotFoundError('Channel', providerName);
      }
      // Receipt-less channels and channels that report over their own session have no callback route.
      if (!channel.expectsDeliveryReceipts || isReceiptSource(channel)) {
        throw HttpError.receiptsNotAccepted(channel.providerName);
      }

      if (channel.webhookSecret) {
        const signature = readSignature(req);
        if (!signature || !verifySignature(channel.webhookSecret, req.rawBody ?? Buffer.alloc(0), signature)) {
          logger.warn('Delivery receipt rejected: signature mismatch', {
            requestId: req.rid ?? null,
            providerName: channel.providerName,
            signaturePresent: Boolean(signature),
          });
          throw HttpError.invalidSignature(channel.providerName);
        }
      }

      const parsed = DeliveryReceiptPayloadSchema.safeParse(req.body);
      if (!parsed.success) {
        throw HttpError.invalidBody(parsed.error.issues);
      }

      const message = await service.applyDeliveryReceipt(parsed.data, channel.providerName);

      res.json({
        success: true,
        data: {
          matched: message !== null,
          message: message ? formatMessageResponse(message) : null,
        },
      });
    })
  );

  return router;
};
