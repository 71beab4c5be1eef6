import { MessageStatus } from '@sms-gateway/core';

import { buildGatewayContext, type GatewayContext } from '../app/context';
import { createGatewayApp } from '../app/http-server';
import type { HttpChannelConfigInput } from '../channels/http/http-channel-config';

import { StubTransport, buildHttpChannelConfig, createTestLogger, jsonResponse } from './channel-stubs';
import { buildSmppChannelConfig, createSessionFactory, type FakeSmppSession } from './smpp-stubs';

export const TEST_WEBHOOK_SECRET = 'test-secret';

type TestGatewayOptions = {
  transport?: StubTransport;
  channel?: HttpChannelConfigInput;
  extraChannels?: HttpChannelConfigInput[];
  /** Registers an SMPP channel bound through this session. */
  smppSession?: FakeSmppSession;
};

/** A full app over in-memory storage, one stubbed HTTP provider ("Acme") and the dry-run channel. */
export const createTestGateway = ({
  transport = new StubTransport(jsonResponse(201, { sid: 'SM123' })),
  channel = {},
  extraChannels = [],
  smppSession,
}: TestGatewayOptions = {}) => {
  const logger = createTestLogger();
  const context: GatewayContext = buildGatewayContext({
    config: {
      defaultChannelType: 'HTTP',
      dryRunEnabled: true,
      receiptTimeout: {
        enabled: false,
        intervalMs: 60_000,
        timeoutMs: 60_000,
        timeoutStatus: MessageStatus.ASSUMED_DELIVERED,
      },
    },
    httpChannels: [
      buildHttpChannelConfig({
        providerName: 'Acme',
        webhookUrl: 'https://gateway.test/api/webhooks/delivery-receipts/Acme',
        webhookSecret: TEST_WEBHOOK_SECRET,
        ...channel,
      }),
      ...extraChannels.map((extra) => buildHttpChannelConfig(extra)),
    ],
    smppChannels: smppSession ? [buildSmppChannelConfig()] : [],
    smppConnect: smppSession ? createSessionFactory(smppSession) : undefined,
    logger,
    transport,
  });

  const app = createGatewayApp({ context, logger, nodeEnv: 'test' });
  return { app, context, transport, logger };
};
