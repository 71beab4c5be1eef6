import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type ChannelSendOutcome = 'success' | 'failure';

export interface ChannelSendLabels {
  channelType: string;
  providerName: string;
  outcome: ChannelSendOutcome;
}

export const gatewayMetricsRegistry = new Registry();

const channelSendsCounter = new Counter<'channelType' | 'providerName' | 'outcome'>({
  name: 'sms_channel_sends_total',
  help: 'Total SMS send attempts grouped by channel, provider and outcome.',
  labelNames: ['channelType', 'providerName', 'outcome'],
  registers: [gatewayMetricsRegistry],
});

const channelSendDuration = new Histogram<'channelType' | 'providerName'>({
  name: 'sms_channel_send_duration_ms',
  help: 'Time spent in a channel send, in milliseconds.',
  labelNames: ['channelType', 'providerName'],
  buckets: [25, 50, 100, 250, 500, 1_000, 2_500, 5_000, 10_000, 30_000],
  registers: [gatewayMetricsRegistry],
});

const deliveryReceiptsCounter = new Counter<'providerName' | 'status'>({
  name: 'sms_delivery_receipts_total',
  help: 'Delivery receipts accepted, grouped by provider and mapped status.',
  labelNames: ['providerName', 'status'],
  registers: [gatewayMetricsRegistry],
});

let defaultMetricsEnabled = false;

export const enableDefaultMetrics = (): void => {
  if (defaultMetricsEnabled) {
    return;
  }
  collectDefaultMetrics({ register: gatewayMetricsRegistry });
  defaultMetricsEnabled = true;
};

export const recordChannelSend = (labels: ChannelSendLabels, durationMs: number): void => {
  channelSendsCounter.inc({ ...labels });
  channelSendDuration.observe(
    { channelType: labels.channelType, providerName: labels.providerName },
    Math.max(durationMs, 0)
  );
};

export const recordDeliveryReceipt = (providerName: string, status: string): void => {
  deliveryReceiptsCounter.inc({ providerName, status });
};

export const renderMetrics = async (): Promise<string> => gatewayMetricsRegistry.metrics();

export const metricsContentType = (): string => gatewayMetricsRegistry.contentType;

export const resetGatewayMetrics = (): void => {
  gatewayMetricsRegistry.resetMetrics();
};
