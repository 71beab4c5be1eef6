import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { z } from 'zod';

import {
  validateHttpChannelConfig,
  type HttpChannelConfig,
  type HttpChannelConfigInput,
} from '../channels/http/http-channel-config';
import {
  awsSnsPreset,
  genericPreset,
  resolveProviderPreset,
  twilioPreset,
} from '../channels/http/provider-presets';
import { validateSmppChannelConfig, type SmppChannelConfig } from '../channels/smpp/smpp-channel-config';
import { normalizeBoolean, normalizeInteger, normalizeString, type Env } from './env';

const optionalText = z.string().nullish();
const optionalInteger = z.number().int().nullish();

const ChannelEntrySchema = z.object({
  preset: optionalText,
  providerName: optionalText,
  apiUrl: optionalText,
  apiKey: optionalText,
  authorizationType: optionalText,
  apiKeyHeaderName: optionalText,
  fromNumber: optionalText,
  requestBodyTemplate: optionalText,
  requestBodyFields: z.record(z.string()).nullish(),
  contentType: optionalText,
  healthCheckUrl: optionalText,
  timeoutMs: optionalInteger,
  maxRetryAttempts: optionalInteger,
  webhookUrl: optionalText,
  webhookSecret: optionalText,
  basicAuthUsername: optionalText,
  awsAccessKeyId: optionalText,
  awsRegion: optionalText,
  awsService: optionalText,
});

export type ChannelEntry = z.infer<typeof ChannelEntrySchema>;

const ChannelFileSchema = z.union([
  z.array(ChannelEntrySchema),
  z.object({ channels: z.array(ChannelEntrySchema) }).transform((value) => value.channels),
]);

export class ChannelFileError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    options: { cause?: unknown } = {}
  ) {
    super(`Invalid channel file ${filePath}: ${message}`, options);
    this.name = 'ChannelFileError';
  }
}

// Blank values in the entry keep the preset's value.
const overlayEntry = (base: HttpChannelConfigInput, entry: ChannelEntry): HttpChannelConfigInput => ({
  providerName: entry.providerName || base.providerName,
  apiUrl: entry.apiUrl || base.apiUrl,
  apiKey: entry.apiKey || base.apiKey,
  authorizationType: entry.authorizationType || base.authorizationType,
  apiKeyHeaderName: entry.apiKeyHeaderName || base.apiKeyHeaderName,
  fromNumber: entry.fromNumber || base.fromNumber,
  requestBodyTemplate: entry.requestBodyTemplate || base.requestBodyTemplate,
  // An explicit template replaces the preset's fields.
  requestBodyFields: entry.requestBodyFields ?? (entry.requestBodyTemplate ? null : base.requestBodyFields),
  contentType: entry.contentType || base.contentType,
  healthCheckUrl: entry.healthCheckUrl || base.healthCheckUrl,
  timeoutMs: entry.timeoutMs ?? base.timeoutMs,
  maxRetryAttempts: entry.maxRetryAttempts ?? base.maxRetryAttempts,
  webhookUrl: entry.webhookUrl || base.webhookUrl,
  webhookSecret: entry.webhookSecret || base.webhookSecret,
  basicAuthUsername: entry.basicAuthUsername || base.basicAuthUsername,
  awsAccessKeyId: entry.awsAccessKeyId || base.awsAccessKeyId,
  awsRegion: entry.awsRegion || base.awsRegion,
  awsService: entry.awsService || base.awsService,
});

/**
 * Expands a named preset and lets explicit fields override it. Preset credentials come from the
 * same fields a custom channel uses: the Twilio account SID is `basicAuthUsername`, the AWS access key
 * is `awsAccessKeyId`, and the secret is always `apiKey`.
 */
export const applyPreset = (entry: ChannelEntry): HttpChannelConfigInput => {
  const preset = resolveProviderPreset(entry.preset);

  switch (preset) {
    case 'twilio':
      return overlayEntry(twilioPreset(entry.basicAuthUsername ?? '', entry.apiKey ?? '', entry.fromNumber ?? ''), entry);
    case 'aws-sns':
      return overlayEntry(awsSnsPreset(entry.awsAccessKeyId ?? '', entry.apiKey ?? '', entry.awsRegion || undefined), entry);
    case 'generic':
      return overlayEntry(
        genericPreset(entry.providerName ?? '', entry.apiUrl ?? '', entry.apiKey ?? '', entry.fromNumber),
        entry
      );
    case null:
      return overlayEntry({}, entry);
  }
};

export const readChannelEntriesFromEnv = (env: Env): ChannelEntry[] => {
  const preset = normalizeString(env.SMS_HTTP_PRESET);
  const apiUrl = normalizeString(env.SMS_HTTP_API_URL);
  if (!preset && !apiUrl) {
    return [];
  }

  return [
    {
      preset,
      providerName: normalizeString(env.SMS_HTTP_PROVIDER_NAME),
      apiUrl,
      apiKey: normalizeString(env.SMS_HTTP_API_KEY),
      authorizationType: normalizeString(env.SMS_HTTP_AUTHORIZATION_TYPE),
      apiKeyHeaderName: normalizeString(env.SMS_HTTP_API_KEY_HEADER),
      fromNumber: normalizeString(env.SMS_HTTP_FROM_NUMBER),
      // Templates are kept as written, whitespace included.
      requestBodyTemplate: env.SMS_HTTP_BODY_TEMPLATE || null,
      contentType: normalizeString(env.SMS_HTTP_CONTENT_TYPE),
      healthCheckUrl: normalizeString(env.SMS_HTTP_HEALTH_CHECK_URL),
      timeoutMs: normalizeInteger(env.SMS_HTTP_TIMEOUT_MS),
      maxRetryAttempts: normalizeInteger(env.SMS_HTTP_MAX_RETRY_ATTEMPTS),
      webhookUrl: normalizeString(env.SMS_HTTP_WEBHOOK_URL),
      webhookSecret: normalizeString(env.SMS_HTTP_WEBHOOK_SECRET),
      basicAuthUsername: normalizeString(env.SMS_HTTP_BASIC_USERNAME),
      awsAccessKeyId: normalizeString(env.SMS_HTTP_AWS_ACCESS_KEY_ID),
      awsRegion: normalizeString(env.SMS_HTTP_AWS_REGION),
      awsService: normalizeString(env.SMS_HTTP_AWS_SERVICE),
    },
  ];
};

export const parseChannelFile = (filePath: string, contents: string): ChannelEntry[] => {
  let payload: unknown;
  try {
    payload = JSON.parse(contents);
  } catch (error) {
    throw new ChannelFileError(filePath, 'not valid JSON', { cause: error });
  }

  const parsed = ChannelFileSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ChannelFileError(filePath, issues, { cause: parsed.error });
  }
  return parsed.data;
};

export type LoadChannelConfigsOptions = {
  env?: Env;
  readFile?: (filePath: string) => string;
};

/**
 * Reads every configured HTTP provider: the entries of SMS_CHANNELS_FILE first, then the single
 * channel described by SMS_HTTP_* variables. Each is validated before anything starts.
 */
export const loadHttpChannelConfigs = ({
  env = process.env,
  readFile = (filePath) => readFileSync(filePath, 'utf8'),
}: LoadChannelConfigsOptions = {}): HttpChannelConfig[] => {
  const entries: ChannelEntry[] = [];

  const channelFile = normalizeString(env.SMS_CHANNELS_FILE);
  if (channelFile) {
    const filePath = resolve(channelFile);
    entries.push(...parseChannelFile(filePath, readFile(filePath)));
  }

  entries.push(...readChannelEntriesFromEnv(env));

  return entries.map((entry) => validateHttpChannelConfig(applyPreset(entry)));
};

/** The SMSC connection described by SMPP_* variables; none unless SMPP_HOST is set. */
export const loadSmppChannelConfigs = ({
  env = process.env,
}: Pick<LoadChannelConfigsOptions, 'env'> = {}): SmppChannelConfig[] => {
  const host = normalizeString(env.SMPP_HOST);
  if (!host) {
    return [];
  }

  return [
    validateSmppChannelConfig({
      providerName: normalizeString(env.SMPP_PROVIDER_NAME),
      host,
      port: normalizeInteger(env.SMPP_PORT),
      systemId: normalizeString(env.SMPP_SYSTEM_ID),
      password: normalizeString(env.SMPP_PASSWORD),
      systemType: normalizeString(env.SMPP_SYSTEM_TYPE),
      sourceAddress: normalizeString(env.SMPP_SOURCE_ADDRESS),
      maxConnections: normalizeInteger(env.SMPP_MAX_CONNECTIONS),
      maxSubmitRetries: normalizeInteger(env.SMPP_MAX_SUBMIT_RETRIES),
      keepAliveIntervalMs: normalizeInteger(env.SMPP_KEEP_ALIVE_INTERVAL_MS),
      connectionTimeoutMs: normalizeInteger(env.SMPP_CONNECTION_TIMEOUT_MS),
      bindTimeoutMs: normalizeInteger(env.SMPP_BIND_TIMEOUT_MS),
      submitTimeoutMs: normalizeInteger(env.SMPP_SUBMIT_TIMEOUT_MS),
      apiTimeoutMs: normalizeInteger(env.SMPP_API_TIMEOUT_MS),
      expectDeliveryReceipts: normalizeBoolean(env.SMPP_EXPECT_DELIVERY_RECEIPTS, true),
    }),
  ];
};
