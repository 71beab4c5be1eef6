import { EventEmitter } from 'node:events';

import type { OutboundMessage } from '@sms-gateway/core';
import { createMultipartSendSuccess, createSendFailure, type SendResult } from '@sms-gateway/contracts';

import { logger as defaultLogger } from '../../config/logger';
import { recordChannelSend } from '../../metrics/channel-metrics';
import type { Logger } from '../../types/logger';
import { TIMEOUT_NETWORK_ERROR_CODE } from '../http/http-sms-channel';
import type { DeliveryReceiptListener, MessageChannel, ReceiptSource } from '../types';
import { isDeliveryReceipt, toDeliveryReceipt, type InboundDeliverSm } from './delivery-receipt';
import { MAX_SEGMENTS, segmentMessage, type SegmentedMessage } from './segmenter';
import {
  SmppTimeoutError,
  connectSmppSession,
  formatCommandStatus,
  withTimeout,
  type SmppSession,
  type SmppSessionFactory,
  type SubmitSmResponse,
} from './session';
import { SmppSessionPool } from './session-pool';
import type { SmppChannelConfig } from './smpp-channel-config';

const LOG_PREFIX = '[SmppChannel]';
const RECEIPT_EVENT = 'delivery-receipt';

const ESME_ROK = 0x00000000;
// Session is not bound; another connection may be.
const ESME_RINVBNDSTS = 0x00000004;
export const API_TIMEOUT_ERROR_CODE = -1;

export type SmppChannelOptions = {
  connect?: SmppSessionFactory;
  logger?: Logger;
  clock?: () => Date;
};

type SendAttempts = { count: number };

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const isBlank = (value: string | null | undefined): boolean => !value || value.trim().length === 0;

export class SmppChannel extends EventEmitter implements MessageChannel, ReceiptSource {
  readonly channelType = 'SMPP' as const;
  readonly webhookSecret = null;

  private readonly pool: SmppSessionPool;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private reference = 0;

  constructor(
    readonly config: SmppChannelConfig,
    options: SmppChannelOptions = {}
  ) {
    super();
    const connect = options.connect ?? connectSmppSession;
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());
    this.pool = new SmppSessionPool({
      connect: () => connect(config, this.logger),
      maxSessions: config.maxConnections,
      onSessionOpened: (session) => session.onDeliverSm((pdu) => this.handleDeliverSm(pdu)),
      logger: this.logger,
    });
  }

  get providerName(): string {
    return this.config.providerName;
  }

  get expectsDeliveryReceipts(): boolean {
    return this.config.expectDeliveryReceipts;
  }

  onDeliveryReceipt(listener: DeliveryReceiptListener): () => void {
    this.on(RECEIPT_EVENT, listener);
    return () => {
      this.off(RECEIPT_EVENT, listener);
    };
  }

  async send(message: OutboundMessage): Promise<SendResult> {
    const startedAt = Date.now();
    const attempts: SendAttempts = { count: 0 };

    if (isBlank(message.recipient) || isBlank(message.content)) {
      return this.complete(createSendFailure('Phone number and content are required'), startedAt, attempts);
    }

    const segmented = segmentMessage(message.content, this.nextReference());
    if (segmented.segments.length > MAX_SEGMENTS) {
      return this.complete(
        createSendFailure(`Message needs ${segmented.segments.length} parts; at most ${MAX_SEGMENTS} fit one SMS`),
        startedAt,
        attempts
      );
    }

    this.logger.debug(`${LOG_PREFIX} Submitting SMS`, {
      providerName: this.providerName,
      messageId: message.id ?? null,
      parts: segmented.segments.length,
      encoding: segmented.encoding,
    });

    try {
      const result = await withTimeout(
        this.submitWithRetries(message, segmented, attempts),
        this.config.apiTimeoutMs,
        'send'
      );
      return this.complete(result, startedAt, attempts);
    } catch (error) {
      if (error instanceof SmppTimeoutError) {
        const failure = createSendFailure(`SMPP API timeout after ${this.config.apiTimeoutMs / 1000}s`, {
          errorCode: API_TIMEOUT_ERROR_CODE,
          networkErrorCode: TIMEOUT_NETWORK_ERROR_CODE,
        });
        return this.complete(failure, startedAt, attempts);
      }
      return this.complete(createSendFailure(`Unexpected error: ${describeError(error)}`), startedAt, attempts);
    }
  }

  /** Healthy while at least one session is bound, or before any has been opened. */
  async isHealthy(): Promise<boolean> {
    return this.pool.size === 0 || this.pool.boundCount > 0;
  }

  async close(): Promise<void> {
    await this.pool.close();
    this.removeAllListeners(RECEIPT_EVENT);
  }

  // A retry resubmits every part, so it is only taken while none has been acknowledged.
  private async submitWithRetries(
    message: OutboundMessage,
    segmented: SegmentedMessage,
    attempts: SendAttempts
  ): Promise<SendResult> {
    const destinationAddress = message.recipient.trim().replace(/^\+/, '');

    for (let attempt = 1; ; attempt += 1) {
      attempts.count = attempt;
      const canRetry = attempt <= this.config.maxSubmitRetries;

      let session: SmppSession;
      try {
        session = await this.pool.acquire();
      } catch (error) {
        if (canRetry) {
          this.logRetry('No bound session available', attempt, error);
          continue;
        }
        return createSendFailure(`SMPP connection failed: ${describeError(error)}`);
      }

      const responses: SubmitSmResponse[] = [];
      try {
        for (const segment of segmented.segments) {
          const response = await withTimeout(
            session.submit({
              sourceAddress: this.config.sourceAddress,
              destinationAddress,
              text: segment.text,
              udh: segment.udh,
              dataCoding: segmented.dataCoding,
              registeredDelivery: this.config.expectDeliveryReceipts,
            }),
            this.config.submitTimeoutMs,
            'submit_sm'
          );
          responses.push(response);
          if (response.commandStatus !== ESME_ROK) {
            break;
          }
        }
      } catch (error) {
        await this.pool.discard(session);
        if (responses.length === 0 && canRetry) {
          this.logRetry('submit_sm failed', attempt, error);
          continue;
        }
        if (error instanceof SmppTimeoutError) {
          return createSendFailure(
            `SMPP submit timed out after ${responses.length} of ${segmented.segments.length} parts`,
            { networkErrorCode: TIMEOUT_NETWORK_ERROR_CODE }
          );
        }
        return createSendFailure(`SMPP submit failed: ${describeError(error)}`);
      }

      const [first] = responses;
      if (responses.length === 1 && first?.commandStatus === ESME_RINVBNDSTS && canRetry) {
        await this.pool.discard(session);
        this.logRetry('Session reported it is not bound', attempt, null);
        continue;
      }

      await this.pool.release(session);
      return this.toResult(responses, segmented);
    }
  }

  private toResult(responses: SubmitSmResponse[], segmented: SegmentedMessage): SendResult {
    const rejected = responses.filter((response) => response.commandStatus !== ESME_ROK);
    const [firstRejected] = rejected;
    if (firstRejected) {
      const statuses = rejected.map((response) => formatCommandStatus(response.commandStatus)).join(', ');
      return createSendFailure(`SMPP submit failed with statuses: ${statuses}`, {
        errorCode: firstRejected.commandStatus,
      });
    }

    const ids = responses.flatMap((response) => (response.messageId ? [response.messageId] : []));
    const [first, ...rest] = ids;
    if (!first || ids.length !== responses.length) {
      return createSendFailure('SMPP submit response carried no message id');
    }

    return createMultipartSendSuccess([first, ...rest], {
      smppMessageId: first,
      messageParts: ids.length,
      encoding: segmented.encoding,
    });
  }

  private handleDeliverSm(pdu: InboundDeliverSm): void {
    if (!isDeliveryReceipt(pdu)) {
      this.logger.debug(`${LOG_PREFIX} Ignoring mobile-originated message`, {
        providerName: this.providerName,
        sourceAddress: pdu.sourceAddress,
      });
      return;
    }

    const receipt = toDeliveryReceipt(pdu, this.clock());
    if (!receipt) {
      this.logger.warn(`${LOG_PREFIX} Delivery receipt without a message id`, {
        providerName: this.providerName,
        receiptText: pdu.shortMessage,
      });
      return;
    }

    this.logger.debug(`${LOG_PREFIX} Delivery receipt received`, {
      providerName: this.providerName,
      providerMessageId: receipt.providerMessageId,
      status: receipt.status,
    });
    this.emit(RECEIPT_EVENT, receipt);
  }

  private nextReference(): number {
    this.reference = (this.reference + 1) & 0xff;
    return this.reference;
  }

  private logRetry(reason: string, attempt: number, error: unknown): void {
    this.logger.warn(`${LOG_PREFIX} ${reason}, retrying`, {
      providerName: this.providerName,
      attempt,
      maxSubmitRetries: this.config.maxSubmitRetries,
      error: error === null ? null : describeError(error),
    });
  }

  private complete(result: SendResult, startedAt: number, attempts: SendAttempts): SendResult {
    const responseTimeMs = Date.now() - startedAt;
    const enriched: SendResult = {
      ...result,
      channelData: {
        ...result.channelData,
        channelType: this.channelType,
        responseTimeMs,
        providerName: this.providerName,
        completedAt: this.clock(),
        attempts: attempts.count,
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
        providerMessageIds: enriched.providerMessageIds ?? [enriched.providerMessageId],
        responseTimeMs,
        attempts: attempts.count,
      });
    } else {
      this.logger.warn(`${LOG_PREFIX} SMS send failed`, {
        providerName: this.providerName,
        errorMessage: enriched.errorMessage,
        errorCode: enriched.errorCode ?? null,
        responseTimeMs,
        attempts: attempts.count,
      });
    }

    return enriched;
  }
}
