import { setTimeout as delay } from 'node:timers/promises';

import type { OutboundMessage } from '@sms-gateway/core';
import { createSendFailure, type SendResult } from '@sms-gateway/contracts';

import { logger as defaultLogger } from '../../config/logger';
import { recordChannelSend } from '../../metrics/channel-metrics';
import type { Logger } from '../../types/logger';
import type { MessageChannel } from '../types';
import type { HttpChannelConfig } from './http-channel-config';
import { buildHealthCheckRequest, buildSendRequest } from './request-builder';
import { parseProviderResponse } from './response-parser';
import {
  TransportNetworkError,
  TransportTimeoutError,
  getSharedTransport,
  type HttpTransport,
  type TransportRequest,
} from './transport';

const LOG_PREFIX = '[HttpSmsChannel]';

export const TIMEOUT_NETWORK_ERROR_CODE = 408;
export const MAX_BACKOFF_MS = 5_000;

export const computeBackoffMs = (attempt: number): number => Math.min(2 ** attempt * 250, MAX_BACKOFF_MS);

export type HttpSmsChannelOptions = {
  transport?: HttpTransport;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  generateId?: () => string;
  clock?: () => Date;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const isBlank = (value: string | null | undefined): boolean => !value || value.trim().length === 0;

export class HttpSmsChannel implements MessageChannel {
  readonly channelType = 'HTTP' as const;

  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly generateId: (() => string) | undefined;
  private readonly clock: () => Date;

  constructor(
    readonly config: HttpChannelConfig,
    options: HttpSmsChannelOptions = {}
  ) {
    this.transport = options.transport ?? getSharedTransport();
    this.logger = options.logger ?? defaultLogger;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.generateId = options.generateId;
    this.clock = options.clock ?? (() => new Date());
  }

  get providerName(): string {
    return this.config.providerName;
  }

  get expectsDeliveryReceipts(): boolean {
    return this.config.webhookUrl !== null;
  }

  get webhookSecret(): string | null {
    return this.config.webhookSecret;
  }

  async send(message: OutboundMessage): Promise<SendResult> {
    const startedAt = Date.now();

    if (isBlank(message.recipient) || isBlank(message.content)) {
      return this.complete(createSendFailure('Phone number and content are required'), startedAt, 0);
    }

    let request: TransportRequest;
    try {
      request = await buildSendRequest(message, this.config, { signingDate: this.clock() });
    } catch (error) {
      this.logger.error(`${LOG_PREFIX} Failed to build request`, {
        providerName: this.providerName,
        messageId: message.id ?? null,
        error: describeError(error),
      });
      return this.complete(createSendFailure(`Request build error: ${describeError(error)}`), startedAt, 0);
    }

    this.logger.debug(`${LOG_PREFIX} Sending SMS`, {
      providerName: this.providerName,
      messageId: message.id ?? null,
      url: request.url,
    });

    for (let attempt = 1; ; attempt += 1) {
      try {
        const response = await this.transport.send(request, { timeoutMs: this.config.timeoutMs });
        const result = parseProviderResponse(response, { generateId: this.generateId });
        return this.complete(result, startedAt, attempt);
      } catch (error) {
        if (error instanceof TransportNetworkError && attempt <= this.config.maxRetryAttempts) {
          const backoffMs = computeBackoffMs(attempt);
          this.logger.warn(`${LOG_PREFIX} Transport failure, retrying`, {
            providerName: this.providerName,
            attempt,
            maxRetryAttempts: this.config.maxRetryAttempts,
            backoffMs,
            error: describeError(error),
          });
          await this.sleep(backoffMs);
          continue;
        }

        return this.complete(this.toFailure(error), startedAt, attempt);
      }
    }
  }

  async isHealthy(): Promise<boolean> {
    if (isBlank(this.config.apiUrl) || isBlank(this.config.apiKey)) {
      return false;
    }

    try {
      const request = await buildHealthCheckRequest(this.config, { signingDate: this.clock() });
      if (!request) {
        return true;
      }

      const response = await this.transport.send(request, { timeoutMs: this.config.timeoutMs });
      return response.status >= 200 && response.status <= 299;
    } catch (error) {
      this.logger.warn(`${LOG_PREFIX} Health check failed`, {
        providerName: this.providerName,
        error: describeError(error),
      });
      return false;
    }
  }

  private toFailure(error: unknown): SendResult {
    if (error instanceof TransportTimeoutError) {
      return createSendFailure('HTTP request timed out', { networkErrorCode: TIMEOUT_NETWORK_ERROR_CODE });
    }

    if (error instanceof TransportNetworkError) {
      return createSendFailure(
        `HTTP request failed: ${error.message}`,
        { networkErrorCode: error.statusCode },
        error.code ? { networkError: error.code } : {}
      );
    }

    return createSendFailure(`Unexpected error: ${describeError(error)}`);
  }

  private complete(result: SendResult, startedAt: number, attempts: number): SendResult {
    const responseTimeMs = Date.now() - startedAt;
    const enriched: SendResult = {
      ...result,
      channelData: {
        ...result.channelData,
        responseTimeMs,
        providerName: this.providerName,
        completedAt: this.clock(),
        attempts,
      },
    };

    recordChannelSend(
      {
        channelType: this.channelType,
        providerName: this.providerName,
        outcome: enriched.success ? 'success' : 'failure',
      },
      responseTimeMs
    );

    if (enriched.success) {
      this.logger.info(`${LOG_PREFIX} SMS accepted`, {
        providerName: this.providerName,
        providerMessageId: enriched.providerMessageId,
        responseTimeMs,
        attempts,
      });
    } else {
      this.logger.warn(`${LOG_PREFIX} SMS send failed`, {
        providerName: this.providerName,
        errorMessage: enriched.errorMessage,
        errorCode: enriched.errorCode ?? null,
        networkErrorCode: enriched.networkErrorCode ?? null,
        responseTimeMs,
        attempts,
      });
    }

    return enriched;
  }
}
