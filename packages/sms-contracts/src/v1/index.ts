import { z } from 'zod';
import {
  ChannelDataSchema,
  ChannelTypeSchema,
  MAX_MESSAGE_CONTENT_LENGTH,
  type ChannelData,
} from '@sms-gateway/core';

const trimmedString = z.string().trim();

export const SendMessageRequestSchema = z
  .object({
    recipient: trimmedString.min(1, 'recipient is required').optional(),
    phoneNumber: trimmedString.min(1, 'phoneNumber is required').optional(),
    content: z
      .string()
      .refine((value) => value.trim().length > 0, 'content is required')
      .refine(
        (value) => value.length <= MAX_MESSAGE_CONTENT_LENGTH,
        `content cannot exceed ${MAX_MESSAGE_CONTENT_LENGTH} characters`
      ),
    channelType: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
      ChannelTypeSchema.optional()
    ),
    channelName: trimmedString.min(1).optional(),
  })
  .superRefine((value, ctx) => {
    if (!value.recipient && !value.phoneNumber) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['recipient'],
        message: 'recipient is required',
      });
    }
  })
  .transform(({ phoneNumber, recipient, ...rest }) => ({
    ...rest,
    recipient: recipient ?? phoneNumber ?? '',
  }));

export type SendMessageRequest = z.infer<typeof SendMessageRequestSchema>;

export const SendSuccessSchema = z.object({
  success: z.literal(true),
  providerMessageId: z.string().min(1),
  // Set when the provider acknowledged the message as several parts; the first id is providerMessageId.
  providerMessageIds: z.array(z.string().min(1)).min(2).optional(),
  channelData: ChannelDataSchema,
});

export const SendFailureSchema = z.object({
  success: z.literal(false),
  errorMessage: z.string().min(1),
  errorCode: z.number().int().optional(),
  networkErrorCode: z.number().int().optional(),
  channelData: ChannelDataSchema,
});

export const SendResultSchema = z.discriminatedUnion('success', [SendSuccessSchema, SendFailureSchema]);

export type SendSuccess = z.infer<typeof SendSuccessSchema>;
export type SendFailure = z.infer<typeof SendFailureSchema>;
export type SendResult = z.infer<typeof SendResultSchema>;

export const createSendSuccess = (providerMessageId: string, channelData: ChannelData = {}): SendSuccess => ({
  success: true,
  providerMessageId,
  channelData: { ...channelData },
});

export const createMultipartSendSuccess = (
  providerMessageIds: readonly [string, ...string[]],
  channelData: ChannelData = {}
): SendSuccess => {
  const success = createSendSuccess(providerMessageIds[0], channelData);
  if (providerMessageIds.length > 1) {
    success.providerMessageIds = [...providerMessageIds];
  }
  return success;
};

export type SendFailureCodes = {
  errorCode?: number;
  networkErrorCode?: number;
};

export const createSendFailure = (
  errorMessage: string,
  codes: SendFailureCodes = {},
  channelData: ChannelData = {}
): SendFailure => {
  const failure: SendFailure = {
    success: false,
    errorMessage,
    channelData: { ...channelData },
  };

  if (codes.errorCode !== undefined) {
    failure.errorCode = codes.errorCode;
  }
  if (codes.networkErrorCode !== undefined) {
    failure.networkErrorCode = codes.networkErrorCode;
  }

  return failure;
};

export const isSendSuccess = (result: SendResult): result is SendSuccess => result.success;

/**
 * Field names tried, in order, when looking for a provider message id in a JSON body.
 */
export const PROVIDER_MESSAGE_ID_FIELDS = [
  'messageId',
  'message_id',
  'id',
  'sid',
  'messageUuid',
  'uuid',
  'MessageId',
] as const;

const RECEIPT_ID_FIELDS = [...PROVIDER_MESSAGE_ID_FIELDS, 'providerMessageId', 'MessageSid', 'SmsSid'] as const;
const RECEIPT_STATUS_FIELDS = ['status', 'deliveryStatus', 'MessageStatus', 'SmsStatus', 'stat'] as const;
const RECEIPT_ERROR_FIELDS = ['errorCode', 'error_code', 'ErrorCode', 'err'] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const pickField = (record: Record<string, unknown>, fields: readonly string[]): string | undefined => {
  for (const field of fields) {
    const candidate = record[field];
    if (typeof candidate === 'string' && candidate.trim().length > 0) {
      return candidate.trim();
    }
    if (typeof candidate === 'number' && Number.isFinite(candidate)) {
      return String(candidate);
    }
  }
  return undefined;
};

export const DeliveryReceiptSchema = z.object({
  providerMessageId: z.string().min(1),
  status: z.string().min(1),
  errorCode: z.number().int().nullable(),
  receivedAt: z.date(),
  receiptText: z.string(),
});

export type DeliveryReceipt = z.infer<typeof DeliveryReceiptSchema>;

/**
 * Normalizes a provider callback body into a delivery receipt. Providers disagree on field names,
 * so the id, status and error code are each looked up through a list of known spellings.
 */
export const DeliveryReceiptPayloadSchema = z.unknown().transform((payload, ctx): DeliveryReceipt => {
  const record = isRecord(payload) ? payload : {};
  const providerMessageId = pickField(record, RECEIPT_ID_FIELDS);
  const status = pickField(record, RECEIPT_STATUS_FIELDS);

  if (!providerMessageId) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['providerMessageId'], message: 'message id is required' });
  }
  if (!status) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['status'], message: 'status is required' });
  }

  const rawErrorCode = pickField(record, RECEIPT_ERROR_FIELDS);
  const parsedErrorCode = rawErrorCode !== undefined ? Number.parseInt(rawErrorCode, 10) : Number.NaN;

  return {
    providerMessageId: providerMessageId ?? '',
    status: status ?? '',
    errorCode: Number.isInteger(parsedErrorCode) ? parsedErrorCode : null,
    receivedAt: new Date(),
    receiptText: JSON.stringify(payload ?? null),
  };
});
