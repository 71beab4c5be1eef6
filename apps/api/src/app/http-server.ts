import type { CorsOptions } from 'cors';
import express, { type Application } from 'express';
import { createServer, type Server as HttpServer } from 'http';

import { requestLogger } from '../middleware/request-logger';
import type { Logger } from '../types/logger';
import type { GatewayContext } from './context';
import { registerRouters } from './routers';
import { configureSecurityMiddleware } from './security';

const normalizeOrigin = (origin: string): string => {
  const trimmed = origin.trim();

  if (!trimmed) {
    return '';
  }

  if (trimmed === '*') {
    return '*';
  }

  return trimmed.toLowerCase().replace(/\/+$/, '');
};

const sharedCorsSettings = {
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['content-type', 'accept', 'x-request-id', 'x-signature'],
};

/** An empty list or `*` admits every origin. */
export const buildCorsOptions = (origins: string[]): CorsOptions => {
  const allowed = new Set(origins.map(normalizeOrigin).filter(Boolean));

  if (allowed.size === 0 || allowed.has('*')) {
    return { origin: true, ...sharedCorsSettings };
  }

  return {
    origin: (origin, callback) => {
      if (!origin || allowed.has(normalizeOrigin(origin))) {
        callback(null, true);
        return;
      }

      callback(new Error(`Origin ${origin} not allowed by CORS`));
    },
    ...sharedCorsSettings,
  };
};

export type CreateGatewayAppOptions = {
  context: GatewayContext;
  logger: Logger;
  nodeEnv: string;
  corsOrigins?: string[];
};

export const createGatewayApp = ({ context, logger, nodeEnv, corsOrigins = [] }: CreateGatewayAppOptions): Application => {
  const app = express();

  configureSecurityMiddleware(app, {
    corsOptions: buildCorsOptions(corsOrigins),
    nodeEnv,
    requestLogger,
    logger,
  });
  registerRouters(app, { context, logger, nodeEnv });

  return app;
};

export const createHttpServer = (app: Application): HttpServer => createServer(app);
