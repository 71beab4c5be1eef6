import { DomainError } from '@sms-gateway/core';

export const AUTHORIZATION_TYPES = ['Bearer', 'ApiKey', 'Basic', 'AWS'] as const;

export type AuthorizationType = (typeof AUTHORIZATION_TYPES)[number];

export const DEFAULT_TIMEOUT_MS = 30_000;
// Largest delay a Node timer accepts.
export const MAX_TIMEOUT_MS = 2_147_483_647;
export const DEFAULT_MAX_RETRY_ATTEMPTS = 2;
export const DEFAULT_API_KEY_HEADER = 'X-API-Key';
export const DEFAULT_CONTENT_TYPE = 'application/json';
export const DEFAULT_AWS_SERVICE = 'sns';

/** Loose shape accepted from env, JSON files and presets before validation. */
export type HttpChannelConfigInput = {
  providerName?: string | null;
  apiUrl?: string | null;
  apiKey?: string | null;
  authorizationType?: string | null;
  apiKeyHeaderName?: string | null;
  fromNumber?: string | null;
  requestBodyTemplate?: string | null;
  requestBodyFields?: Record<string, string> | null;
  contentType?: string | null;
  healthCheckUrl?: string | null;
  timeoutMs?: number | null;
  maxRetryAttempts?: number | null;
  webhookUrl?: string | null;
  webhookSecret?: string | null;
  basicAuthUsername?: string | null;
  awsAccessKeyId?: string | null;
  awsRegion?: string | null;
  awsService?: string | null;
};

export type HttpChannelConfig = Readonly<{
  providerName: string;
  apiUrl: string;
  apiKey: string;
  authorizationType: AuthorizationType;
  apiKeyHeaderName: string;
  fromNumber: string | null;
  requestBodyTemplate: string | null;
  /** Body as named fields, encoded to match `contentType`. Values may hold placeholders. */
  requestBodyFields: Readonly<Record<string, string>> | null;
  contentType: string;
  healthCheckUrl: string | null;
  timeoutMs: number;
  maxRetryAttempts: number;
  webhookUrl: string | null;
  webhookSecret: string | null;
  basicAuthUsername: string | null;
  awsAccessKeyId: string | null;
  awsRegion: string | null;
  awsService: string;
}>;

export type HttpChannelConfigField = keyof HttpChannelConfig;

export class ChannelConfigurationError extends DomainError {
  constructor(
    public readonly field: string,
    message: string,
    public readonly providerName: string | null = null
  ) {
    super(message, 'CHANNEL_CONFIGURATION_ERROR', { field, providerName });
    this.name = 'ChannelConfigurationError';
  }
}

const normalizeString = (value: string | null | undefined): string | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

export const isAbsoluteUrl = (value: string): boolean => {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
};

const resolveAuthorizationType = (value: string | null): AuthorizationType | null => {
  if (!value) {
    return 'Bearer';
  }
  const match = AUTHORIZATION_TYPES.find((candidate) => candidate.toLowerCase() === value.toLowerCase());
  return match ?? null;
};

/**
 * Validates one provider's connection parameters and returns an immutable configuration.
 * The first violation found throws a ChannelConfigurationError naming the offending field.
 */
export const validateHttpChannelConfig = (input: HttpChannelConfigInput): HttpChannelConfig => {
  const providerName = normalizeString(input.providerName);
  const fail = (field: HttpChannelConfigField, message: string): never => {
    throw new ChannelConfigurationError(field, message, providerName);
  };

  if (!providerName) {
    return fail('providerName', 'providerName is required');
  }

  const apiUrl = normalizeString(input.apiUrl);
  if (!apiUrl) {
    return fail('apiUrl', 'apiUrl is required');
  }
  if (!isAbsoluteUrl(apiUrl)) {
    return fail('apiUrl', 'apiUrl must be a valid absolute URL');
  }

  const apiKey = normalizeString(input.apiKey);
  if (!apiKey) {
    return fail('apiKey', 'apiKey is required');
  }

  const authorizationType = resolveAuthorizationType(normalizeString(input.authorizationType));
  if (!authorizationType) {
    return fail(
      'authorizationType',
      `authorizationType "${input.authorizationType ?? ''}" is not supported (expected one of ${AUTHORIZATION_TYPES.join(', ')})`
    );
  }

  const basicAuthUsername = normalizeString(input.basicAuthUsername);
  if (authorizationType === 'Basic' && !basicAuthUsername) {
    return fail('basicAuthUsername', 'basicAuthUsername is required for Basic authorization');
  }

  const awsAccessKeyId = normalizeString(input.awsAccessKeyId);
  const awsRegion = normalizeString(input.awsRegion);
  if (authorizationType === 'AWS') {
    if (!awsAccessKeyId) {
      return fail('awsAccessKeyId', 'awsAccessKeyId is required for AWS authorization');
    }
    if (!awsRegion) {
      return fail('awsRegion', 'awsRegion is required for AWS authorization');
    }
  }

  const timeoutMs = input.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    return fail('timeoutMs', 'timeoutMs must be a positive integer');
  }
  if (timeoutMs > MAX_TIMEOUT_MS) {
    return fail('timeoutMs', `timeoutMs cannot exceed ${MAX_TIMEOUT_MS}`);
  }

  const maxRetryAttempts = input.maxRetryAttempts ?? DEFAULT_MAX_RETRY_ATTEMPTS;
  if (!Number.isInteger(maxRetryAttempts) || maxRetryAttempts < 0) {
    return fail('maxRetryAttempts', 'maxRetryAttempts cannot be negative');
  }

  // Templates are provider-authored text; keep them byte for byte.
  const requestBodyTemplate =
    typeof input.requestBodyTemplate === 'string' && input.requestBodyTemplate.length > 0
      ? input.requestBodyTemplate
      : null;
  const requestBodyFields = input.requestBodyFields ?? null;
  if (requestBodyFields) {
    if (requestBodyTemplate) {
      return fail('requestBodyFields', 'requestBodyFields cannot be combined with requestBodyTemplate');
    }
    const names = Object.keys(requestBodyFields);
    if (names.length === 0 || names.some((name) => name.trim().length === 0)) {
      return fail('requestBodyFields', 'requestBodyFields must name at least one field and no blank ones');
    }
  }

  const healthCheckUrl = normalizeString(input.healthCheckUrl);
  if (healthCheckUrl && !isAbsoluteUrl(healthCheckUrl)) {
    return fail('healthCheckUrl', 'healthCheckUrl must be a valid absolute URL');
  }

  const webhookUrl = normalizeString(input.webhookUrl);
  if (webhookUrl && !isAbsoluteUrl(webhookUrl)) {
    return fail('webhookUrl', 'webhookUrl must be a valid absolute URL');
  }

  return Object.freeze({
    providerName,
    apiUrl,
    apiKey,
    authorizationType,
    apiKeyHeaderName: normalizeString(input.apiKeyHeaderName) ?? DEFAULT_API_KEY_HEADER,
    fromNumber: normalizeString(input.fromNumber),
    requestBodyTemplate,
    requestBodyFields: requestBodyFields ? Object.freeze({ ...requestBodyFields }) : null,
    contentType: normalizeString(input.contentType) ?? DEFAULT_CONTENT_TYPE,
    healthCheckUrl,
    timeoutMs,
    maxRetryAttempts,
    webhookUrl,
    webhookSecret: normalizeString(input.webhookSecret),
    basicAuthUsername,
    awsAccessKeyId,
    awsRegion,
    awsService: normalizeString(input.awsService) ?? DEFAULT_AWS_SERVICE,
  });
};
