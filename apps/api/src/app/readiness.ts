import type { Server } from 'http';

import type { Logger } from '../types/logger';

type ReadinessState = {
  ready: boolean;
  status: 'starting' | 'ready' | 'stopping';
  reason: string;
  lastReadyAt: string | null;
  lastNotReadyAt: string;
  transitions: number;
  metadata: Record<string, unknown>;
};

const nowIso = () => new Date().toISOString();

const state: ReadinessState = {
  ready: false,
  status: 'starting',
  reason: 'booting',
  lastReadyAt: null,
  lastNotReadyAt: nowIso(),
  transitions: 0,
  metadata: {},
};

const updateState = (partial: Partial<ReadinessState>) => {
  Object.assign(state, partial);
  state.transitions += 1;
};

export const markApplicationNotReady = (reason: string, metadata: Record<string, unknown> = {}) => {
  updateState({ ready: false, status: 'starting', reason, lastNotReadyAt: nowIso(), metadata });
};

export const markApplicationStopping = (reason: string, metadata: Record<string, unknown> = {}) => {
  updateState({ ready: false, status: 'stopping', reason, lastNotReadyAt: nowIso(), metadata });
};

export const markApplicationReady = (reason: string, metadata: Record<string, unknown> = {}) => {
  updateState({ ready: true, status: 'ready', reason, lastReadyAt: nowIso(), metadata });
};

export const getReadinessState = (): ReadinessState => ({ ...state, metadata: { ...state.metadata } });

export const registerGracefulShutdown = (options: {
  logger: Logger;
  server: Server;
  onShutdown?: () => Promise<void>;
  shutdownTimeoutMs?: number;
}) => {
  const { logger, server, onShutdown, shutdownTimeoutMs = 30_000 } = options;

  const shutdownHandler = (signal: NodeJS.Signals) => {
    const context = { signal, pid: process.pid, uptimeSeconds: process.uptime() };
    markApplicationStopping(`received ${signal}`, context);
    logger.warn('Shutdown signal received. Beginning graceful shutdown.', context);

    const forceExit = setTimeout(() => {
      logger.error('Force exiting after graceful shutdown timeout', { ...context, shutdownTimeoutMs });
      process.exit(1);
    }, shutdownTimeoutMs);
    forceExit.unref();

    server.close((error) => {
      const release = onShutdown ? onShutdown() : Promise.resolve();
      release
        .catch((releaseError: unknown) => {
          logger.error('Error while releasing resources during shutdown', { ...context, error: releaseError });
        })
        .finally(() => {
          clearTimeout(forceExit);
          if (error) {
            logger.error('Error while closing HTTP server during shutdown', { ...context, error });
            process.exit(1);
          }

          logger.info('HTTP server closed cleanly after shutdown signal', context);
          process.exit(0);
        });
    });
  };

  process.on('SIGTERM', shutdownHandler);
  process.on('SIGINT', shutdownHandler);
};

export const logRuntimeLifecycle = (logger: Logger) => {
  logger.info('Process lifecycle hooks registered', { pid: process.pid, nodeVersion: process.version });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection detected', { reason });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception detected', { error });
  });
};
