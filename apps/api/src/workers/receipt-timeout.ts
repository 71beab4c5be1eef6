import { logger as defaultLogger } from '../config/logger';
import type { MessageService, ReceiptTimeoutStatus } from '../services/message-service';
import type { Logger } from '../types/logger';

export type ReceiptTimeoutWorkerOptions = {
  intervalMs: number;
  timeoutMs: number;
  timeoutStatus: ReceiptTimeoutStatus;
  logger?: Logger;
  now?: () => Date;
};

export interface ReceiptTimeoutWorkerMetrics {
  running: boolean;
  lastRunAt: string | null;
  lastExpiredCount: number;
  totalExpired: number;
  consecutiveFailures: number;
  lastErrorMessage: string | null;
}

/** Periodically settles SENT messages whose channel will never report delivery. */
export class ReceiptTimeoutWorker {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private metrics: ReceiptTimeoutWorkerMetrics = {
    running: false,
    lastRunAt: null,
    lastExpiredCount: 0,
    totalExpired: 0,
    consecutiveFailures: 0,
    lastErrorMessage: null,
  };

  constructor(
    private readonly service: MessageService,
    private readonly options: ReceiptTimeoutWorkerOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.options.intervalMs);
    this.timer.unref();
    this.metrics.running = true;

    this.logger.info('[ReceiptTimeoutWorker] Started', {
      intervalMs: this.options.intervalMs,
      timeoutMs: this.options.timeoutMs,
      timeoutStatus: this.options.timeoutStatus,
    });
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.metrics.running = false;

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  getMetrics(): ReceiptTimeoutWorkerMetrics {
    return { ...this.metrics };
  }

  /** Runs a single sweep. Overlapping calls share the sweep already in progress. */
  runOnce(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.sweep().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async sweep(): Promise<void> {
    const now = this.now();
    try {
      const expired = await this.service.expireAwaitingReceipts({
        now,
        timeoutMs: this.options.timeoutMs,
        timeoutStatus: this.options.timeoutStatus,
      });
      this.metrics.lastRunAt = now.toISOString();
      this.metrics.lastExpiredCount = expired;
      this.metrics.totalExpired += expired;
      this.metrics.consecutiveFailures = 0;
      this.metrics.lastErrorMessage = null;
    } catch (error) {
      this.metrics.consecutiveFailures += 1;
      this.metrics.lastErrorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error('[ReceiptTimeoutWorker] Sweep failed', { error });
    }
  }
}
