import type { Application } from 'express';

import { buildHealthPayload } from '../health';
import { errorHandler } from '../middleware/error-handler';
import { metricsContentType, renderMetrics } from '../metrics/channel-metrics';
import { createChannelsRouter } from '../routes/channels';
import { createMessagesRouter } from '../routes/messages';
import { createWebhooksRouter } from '../routes/webhooks';
import type { Logger } from '../types/logger';
import type { GatewayContext } from './context';

type RegisterRoutersDeps = {
  context: GatewayContext;
  logger: Logger;
  nodeEnv: string;
};

export const registerRouters = (app: Application, { context, logger, nodeEnv }: RegisterRoutersDeps) => {
  app.get('/health', (_req, res) => {
    res.json(buildHealthPayload({ environment: nodeEnv, channels: context.channels }));
  });

  app.get('/metrics', (_req, res, next) => {
    renderMetrics()
      .then((body) => {
        res.setHeader('Content-Type', metricsContentType());
        res.send(body);
      })
      .catch(next);
  });

  app.use('/api/messages', createMessagesRouter(context.service));
  app.use('/api/channels', createChannelsRouter(context.channels));
  app.use('/api/webhooks', createWebhooksRouter({ service: context.service, channels: context.channels }));

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Route ${req.method} ${req.originalUrl} not found`,
      },
    });
  });

  app.use(errorHandler);

  logger.info('Routers registered', { nodeEnv });
};
