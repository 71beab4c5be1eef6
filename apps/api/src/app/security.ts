import type { IncomingMessage } from 'http';

import compression from 'compression';
import cors, { type CorsOptions } from 'cors';
import express, { type Application, type RequestHandler } from 'express';
import helmet from 'helmet';

import { type Logger } from '../types/logger';

type ConfigureSecurityMiddlewareDeps = {
  corsOptions: CorsOptions;
  nodeEnv: string;
  requestLogger: RequestHandler;
  logger: Logger;
};

// Receipt signatures are computed over the bytes the provider sent.
const captureRawBody = (req: IncomingMessage, _res: unknown, buffer: Buffer): void => {
  req.rawBody = Buffer.from(buffer);
};

const assignRequestId: RequestHandler = (req, res, next) => {
  const headerValue = req.headers['x-request-id'];
  const fromHeader = Array.isArray(headerValue) ? headerValue[0] : headerValue;
  const trimmed = typeof fromHeader === 'string' ? fromHeader.trim() : '';
  const requestId =
    trimmed.length > 0 ? trimmed : `rid_${Date.now().toString(36)}${Math.random().toString(36).slice(2, 8)}`;

  req.rid = requestId;
  res.setHeader('X-Request-Id', requestId);

  next();
};

export const configureSecurityMiddleware = (
  app: Application,
  { corsOptions, nodeEnv, requestLogger, logger }: ConfigureSecurityMiddlewareDeps
) => {
  app.use(cors(corsOptions));
  app.options('*', cors(corsOptions));

  app.set('trust proxy', 1);
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );
  app.use(compression());
  app.use(express.json({ limit: '1mb', verify: captureRawBody }));
  app.use(express.urlencoded({ extended: true, limit: '1mb', verify: captureRawBody }));
  app.use(assignRequestId);
  app.use(requestLogger);

  logger.info('Security middleware configured', { nodeEnv });
};
