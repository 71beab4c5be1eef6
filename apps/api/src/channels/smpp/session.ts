import smpp, { type PDU, type Session } from 'smpp';

import type { Logger } from '../../types/logger';
import type { InboundDeliverSm } from './delivery-receipt';
import { ESM_CLASS_UDHI } from './segmenter';
import type { SmppChannelConfig } from './smpp-channel-config';

const LOG_PREFIX = '[SmppSession]';
const UNBIND_GRACE_MS = 5_000;

export type SubmitSmRequest = {
  sourceAddress: string;
  destinationAddress: string;
  text: string;
  udh: Buffer | null;
  dataCoding: number;
  registeredDelivery: boolean;
};

export type SubmitSmResponse = {
  commandStatus: number;
  messageId: string | null;
};

/** A bound transceiver connection to the SMSC. */
export interface SmppSession {
  readonly bound: boolean;
  submit(request: SubmitSmRequest): Promise<SubmitSmResponse>;
  enquireLink(): Promise<void>;
  onDeliverSm(listener: (pdu: InboundDeliverSm) => void): void;
  close(): Promise<void>;
}

export type SmppSessionFactory = (config: SmppChannelConfig, logger: Logger) => Promise<SmppSession>;

export class SmppTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'SmppTimeoutError';
  }
}

export class SmppBindError extends Error {
  constructor(
    message: string,
    public readonly commandStatus: number | null = null
  ) {
    super(message);
    this.name = 'SmppBindError';
  }
}

export const formatCommandStatus = (status: number): string =>
  `0x${status.toString(16).toUpperCase().padStart(8, '0')}`;

export const withTimeout = <T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new SmppTimeoutError(operation, timeoutMs)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });

const readShortMessage = (value: PDU['short_message']): string => {
  if (value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('latin1');
  }
  const { message } = value;
  if (message === undefined) {
    return '';
  }
  return typeof message === 'string' ? message : message.toString('latin1');
};

const toInboundDeliverSm = (pdu: PDU): InboundDeliverSm => ({
  esmClass: pdu.esm_class ?? 0,
  sourceAddress: pdu.source_addr ?? '',
  shortMessage: readShortMessage(pdu.short_message),
  receiptedMessageId: pdu.receipted_message_id || null,
});

class NodeSmppSession implements SmppSession {
  private isBound = true;
  private readonly listeners: Array<(pdu: InboundDeliverSm) => void> = [];

  constructor(
    private readonly session: Session,
    private readonly logger: Logger
  ) {
    session.on('deliver_sm', (pdu: PDU) => {
      session.send(pdu.response());
      const inbound = toInboundDeliverSm(pdu);
      for (const listener of this.listeners) {
        listener(inbound);
      }
    });
    session.on('unbind', (pdu: PDU) => {
      this.isBound = false;
      session.send(pdu.response());
    });
    session.on('error', (error: unknown) => {
      this.isBound = false;
      this.logger.warn(`${LOG_PREFIX} Connection error`, {
        error: error instanceof Error ? error.message : String(error),
      });
    });
    session.on('close', () => {
      this.isBound = false;
    });
  }

  get bound(): boolean {
    return this.isBound;
  }

  submit(request: SubmitSmRequest): Promise<SubmitSmResponse> {
    return new Promise((resolve) => {
      this.session.submit_sm(
        {
          source_addr: request.sourceAddress,
          destination_addr: request.destinationAddress,
          short_message: request.udh ? { udh: request.udh, message: request.text } : request.text,
          data_coding: request.dataCoding,
          esm_class: request.udh ? ESM_CLASS_UDHI : 0,
          registered_delivery: request.registeredDelivery ? 1 : 0,
        },
        (pdu) => resolve({ commandStatus: pdu.command_status, messageId: pdu.message_id || null })
      );
    });
  }

  enquireLink(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.session.enquire_link({}, (pdu) => {
        if (pdu.command_status === smpp.ESME_ROK) {
          resolve();
          return;
        }
        reject(new Error(`enquire_link rejected with status ${formatCommandStatus(pdu.command_status)}`));
      });
    });
  }

  onDeliverSm(listener: (pdu: InboundDeliverSm) => void): void {
    this.listeners.push(listener);
  }

  async close(): Promise<void> {
    if (this.isBound) {
      this.isBound = false;
      const unbound = new Promise<void>((resolve) => this.session.unbind({}, () => resolve()));
      try {
        await withTimeout(unbound, UNBIND_GRACE_MS, 'unbind');
      } catch (error) {
        this.logger.debug(`${LOG_PREFIX} Unbind not acknowledged, closing anyway`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    this.session.close();
  }
}

/** Opens a TCP connection to the SMSC and binds it as a transceiver. */
export const connectSmppSession: SmppSessionFactory = (config, logger) =>
  new Promise<SmppSession>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;
    const fail = (error: unknown) => {
      clearTimeout(timer);
      session.off('error', fail);
      session.destroy();
      reject(error);
    };

    timer = setTimeout(
      () => fail(new SmppTimeoutError('connect', config.connectionTimeoutMs)),
      config.connectionTimeoutMs
    );

    const session = smpp.connect(
      {
        url: `smpp://${config.host}:${config.port}`,
        auto_enquire_link_period: config.keepAliveIntervalMs,
      },
      () => {
        clearTimeout(timer);
        timer = setTimeout(
          () => fail(new SmppTimeoutError('bind_transceiver', config.bindTimeoutMs)),
          config.bindTimeoutMs
        );

        session.bind_transceiver(
          { system_id: config.systemId, password: config.password, system_type: config.systemType },
          (pdu) => {
            if (pdu.command_status !== smpp.ESME_ROK) {
              const status = formatCommandStatus(pdu.command_status);
              fail(new SmppBindError(`Bind rejected with status ${status}`, pdu.command_status));
              return;
            }
            clearTimeout(timer);
            session.off('error', fail);
            logger.info(`${LOG_PREFIX} Bound as transceiver`, {
              providerName: config.providerName,
              host: config.host,
              port: config.port,
            });
            resolve(new NodeSmppSession(session, logger));
          }
        );
      }
    );
    session.on('error', fail);
  });
