import { randomUUID } from 'node:crypto';

import type { ChannelData } from '@sms-gateway/core';
import {
  PROVIDER_MESSAGE_ID_FIELDS,
  createSendFailure,
  createSendSuccess,
  type SendResult,
} from '@sms-gateway/contracts';

export const MAX_RAW_RESPONSE_LENGTH = 2_000;
export const MAX_TEXT_MESSAGE_ID_LENGTH = 100;

export type ProviderResponse = {
  status: number;
  body: string;
};

export type ParseOptions = {
  /** Id factory for bodies that carry none. */
  generateId?: () => string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const pickIdentifier = (record: Record<string, unknown>): string | null => {
  for (const field of PROVIDER_MESSAGE_ID_FIELDS) {
    const candidate = record[field];
    if (typeof candidate === 'string' && candidate.trim().length > 0) {
      return candidate.trim();
    }
    if (typeof candidate === 'number' && Number.isFinite(candidate)) {
      return String(candidate);
    }
  }
  return null;
};

type JsonParseResult = { isJson: true; value: unknown } | { isJson: false };

const tryParseJson = (body: string): JsonParseResult => {
  try {
    return { isJson: true, value: JSON.parse(body) };
  } catch {
    return { isJson: false };
  }
};

/**
 * Finds the provider's id for an accepted message. JSON bodies are searched field by field;
 * plain-text bodies are taken as the id itself.
 */
export const extractProviderMessageId = (body: string): string | null => {
  const trimmed = body.trim();
  if (!trimmed) {
    return null;
  }

  const parsed = tryParseJson(trimmed);
  if (!parsed.isJson) {
    return trimmed.slice(0, MAX_TEXT_MESSAGE_ID_LENGTH);
  }

  return isRecord(parsed.value) ? pickIdentifier(parsed.value) : null;
};

const truncate = (value: string, maxLength: number): string =>
  value.length > maxLength ? value.slice(0, maxLength) : value;

const isSuccessStatus = (status: number): boolean => status >= 200 && status <= 299;

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** Classifies a provider response. Never throws. */
export const parseProviderResponse = (response: ProviderResponse, options: ParseOptions = {}): SendResult => {
  try {
    const channelData: ChannelData = {
      rawResponse: truncate(response.body, MAX_RAW_RESPONSE_LENGTH),
      httpStatusCode: response.status,
    };

    if (!isSuccessStatus(response.status)) {
      return createSendFailure(
        `HTTP API error: ${response.status}`,
        { errorCode: response.status, networkErrorCode: response.status },
        channelData
      );
    }

    const generateId = options.generateId ?? randomUUID;
    const providerMessageId = extractProviderMessageId(response.body) ?? generateId();
    return createSendSuccess(providerMessageId, channelData);
  } catch (error) {
    return createSendFailure(`Response parsing error: ${describeError(error)}`);
  }
};
