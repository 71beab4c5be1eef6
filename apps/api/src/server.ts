import dotenv from 'dotenv';

import { buildGatewayContext } from './app/context';
import { createGatewayApp, createHttpServer } from './app/http-server';
import {
  getReadinessState,
  logRuntimeLifecycle,
  markApplicationNotReady,
  markApplicationReady,
  registerGracefulShutdown,
} from './app/readiness';
import { closeSharedTransport } from './channels/http/transport';
import { getGatewayConfig } from './config/gateway';
import { logger } from './config/logger';
import { loadHttpChannelConfigs, loadSmppChannelConfigs } from './config/sms-channels';
import { enableDefaultMetrics } from './metrics/channel-metrics';

if (process.env.NODE_ENV !== 'production') {
  dotenv.config();
}

const config = getGatewayConfig();

markApplicationNotReady('booting API process', { nodeEnv: config.nodeEnv, port: config.port });

const context = buildGatewayContext({
  config,
  httpChannels: loadHttpChannelConfigs(),
  smppChannels: loadSmppChannelConfigs(),
  logger,
});

enableDefaultMetrics();

const app = createGatewayApp({
  context,
  logger,
  nodeEnv: config.nodeEnv,
  corsOrigins: config.corsOrigins,
});
const server = createHttpServer(app);

server.listen(config.port, () => {
  logger.info(`Server bound to port ${config.port}`);
  logger.info(`Health check available at http://localhost:${config.port}/health`);
  logger.info(`Prometheus metrics available at http://localhost:${config.port}/metrics`);
  context.receiptTimeoutWorker?.start();
  markApplicationReady('http server bound to port', {
    port: config.port,
    nodeEnv: config.nodeEnv,
    pid: process.pid,
  });
});

registerGracefulShutdown({
  logger,
  server,
  onShutdown: async () => {
    await context.receiptTimeoutWorker?.stop();
    await context.close();
    await closeSharedTransport();
  },
});
logRuntimeLifecycle(logger);

logger.info('Readiness state initialized', getReadinessState());

export { app };
