import { ChannelTypeSchema, MessageStatus, parseMessageStatus, type ChannelType } from '@sms-gateway/core';

import type { ReceiptTimeoutStatus } from '../services/message-service';
import { normalizeBoolean, normalizeList, normalizePositiveInteger, normalizeString, type Env } from './env';

export type ReceiptTimeoutConfig = {
  enabled: boolean;
  intervalMs: number;
  timeoutMs: number;
  timeoutStatus: ReceiptTimeoutStatus;
};

export type GatewayConfig = {
  nodeEnv: string;
  port: number;
  corsOrigins: string[];
  defaultChannelType: ChannelType;
  dryRunEnabled: boolean;
  receiptTimeout: ReceiptTimeoutConfig;
};

const DEFAULT_PORT = 4000;
const DEFAULT_RECEIPT_SWEEP_INTERVAL_MS = 60_000;
const DEFAULT_RECEIPT_TIMEOUT_MS = 30 * 60_000;

const resolveChannelType = (value: string | null): ChannelType => {
  const parsed = ChannelTypeSchema.safeParse(value?.toUpperCase());
  return parsed.success ? parsed.data : 'HTTP';
};

const resolveTimeoutStatus = (value: string | null): ReceiptTimeoutStatus =>
  parseMessageStatus(value) === MessageStatus.DELIVERY_UNKNOWN
    ? MessageStatus.DELIVERY_UNKNOWN
    : MessageStatus.ASSUMED_DELIVERED;

export const buildGatewayConfig = (env: Env = process.env): GatewayConfig => {
  const nodeEnv = normalizeString(env.NODE_ENV) ?? 'development';
  const port = normalizePositiveInteger(env.PORT);

  if (nodeEnv === 'production' && port === null) {
    throw new Error('PORT environment variable must be defined in production environments.');
  }

  return {
    nodeEnv,
    port: port ?? DEFAULT_PORT,
    corsOrigins: normalizeList(env.CORS_ALLOWED_ORIGINS),
    defaultChannelType: resolveChannelType(normalizeString(env.SMS_DEFAULT_CHANNEL_TYPE)),
    dryRunEnabled: normalizeBoolean(env.SMS_DRYRUN_ENABLED, nodeEnv !== 'production'),
    receiptTimeout: {
      enabled: normalizeBoolean(env.SMS_RECEIPT_TIMEOUT_ENABLED, true),
      intervalMs: normalizePositiveInteger(env.SMS_RECEIPT_SWEEP_INTERVAL_MS) ?? DEFAULT_RECEIPT_SWEEP_INTERVAL_MS,
      timeoutMs: normalizePositiveInteger(env.SMS_RECEIPT_TIMEOUT_MS) ?? DEFAULT_RECEIPT_TIMEOUT_MS,
      timeoutStatus: resolveTimeoutStatus(normalizeString(env.SMS_RECEIPT_TIMEOUT_STATUS)),
    },
  };
};

let cachedConfig: GatewayConfig | null = null;

export const getGatewayConfig = (): GatewayConfig => {
  if (!cachedConfig) {
    cachedConfig = buildGatewayConfig();
  }
  return cachedConfig;
};
