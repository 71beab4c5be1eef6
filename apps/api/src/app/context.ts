import { ChannelRegistry } from '../channels/channel-registry';
import { DryRunChannel } from '../channels/dryrun-channel';
import type { HttpChannelConfig } from '../channels/http/http-channel-config';
import { HttpSmsChannel } from '../channels/http/http-sms-channel';
import type { HttpTransport } from '../channels/http/transport';
import type { SmppSessionFactory } from '../channels/smpp/session';
import { SmppChannel } from '../channels/smpp/smpp-channel';
import type { SmppChannelConfig } from '../channels/smpp/smpp-channel-config';
import { isReceiptSource } from '../channels/types';
import type { GatewayConfig } from '../config/gateway';
import { InMemoryMessageStore, type MessageStore } from '../data/message-store';
import { MessageService } from '../services/message-service';
import type { Logger } from '../types/logger';
import { ReceiptTimeoutWorker } from '../workers/receipt-timeout';

export type GatewayContext = {
  store: MessageStore;
  channels: ChannelRegistry;
  service: MessageService;
  receiptTimeoutWorker: ReceiptTimeoutWorker | null;
  /** Unbinds SMPP sessions and drops receipt subscriptions. */
  close(): Promise<void>;
};

export type BuildGatewayContextOptions = {
  config: Pick<GatewayConfig, 'defaultChannelType' | 'dryRunEnabled' | 'receiptTimeout'>;
  httpChannels: HttpChannelConfig[];
  smppChannels?: SmppChannelConfig[];
  logger: Logger;
  transport?: HttpTransport;
  smppConnect?: SmppSessionFactory;
  store?: MessageStore;
};

export const buildGatewayContext = ({
  config,
  httpChannels,
  smppChannels = [],
  logger,
  transport,
  smppConnect,
  store = new InMemoryMessageStore(),
}: BuildGatewayContextOptions): GatewayContext => {
  const channels = new ChannelRegistry(config.defaultChannelType);

  for (const channelConfig of httpChannels) {
    channels.register(new HttpSmsChannel(channelConfig, { transport, logger }));
  }

  const smppInstances = smppChannels.map(
    (channelConfig) => new SmppChannel(channelConfig, { connect: smppConnect, logger })
  );
  for (const channel of smppInstances) {
    channels.register(channel);
  }

  if (config.dryRunEnabled) {
    channels.register(new DryRunChannel());
  }

  const service = new MessageService({ store, channels, logger });
  const receiptTimeoutWorker = config.receiptTimeout.enabled
    ? new ReceiptTimeoutWorker(service, {
        intervalMs: config.receiptTimeout.intervalMs,
        timeoutMs: config.receiptTimeout.timeoutMs,
        timeoutStatus: config.receiptTimeout.timeoutStatus,
        logger,
      })
    : null;

  const unsubscribes = channels
    .list()
    .filter(isReceiptSource)
    .map((channel) => {
      // One at a time: part receipts for one message read and write the same record.
      let pending: Promise<unknown> = Promise.resolve();
      return channel.onDeliveryReceipt((receipt) => {
        pending = pending
          .then(() => service.applyDeliveryReceipt(receipt, channel.providerName))
          .catch((error: unknown) => {
            logger.error('Failed to apply delivery receipt', {
              providerName: channel.providerName,
              providerMessageId: receipt.providerMessageId,
              error: error instanceof Error ? error.message : String(error),
            });
          });
      });
    });

  const close = async (): Promise<void> => {
    for (const unsubscribe of unsubscribes) {
      unsubscribe();
    }
    await Promise.all(smppInstances.map((channel) => channel.close()));
  };

  logger.info('Channels registered', {
    channels: channels.list().map((channel) => `${channel.channelType}/${channel.providerName}`),
    defaultChannelType: config.defaultChannelType,
  });

  return { store, channels, service, receiptTimeoutWorker, close };
};
