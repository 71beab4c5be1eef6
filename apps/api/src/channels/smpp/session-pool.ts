import { logger as defaultLogger } from '../../config/logger';
import type { Logger } from '../../types/logger';
import { withTimeout, type SmppSession } from './session';

const LOG_PREFIX = '[SmppSessionPool]';
export const DEFAULT_VALIDATE_TIMEOUT_MS = 5_000;

export type SmppSessionPoolOptions = {
  connect: () => Promise<SmppSession>;
  maxSessions: number;
  /** Runs once per newly bound session, before it is handed out. */
  onSessionOpened?: (session: SmppSession) => void;
  validateTimeoutMs?: number;
  logger?: Logger;
};

type Waiter = { resolve: () => void; reject: (error: Error) => void };

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Hands out at most `maxSessions` bound sessions at a time. Idle sessions are checked with an
 * enquire_link before reuse and replaced when the check fails.
 */
export class SmppSessionPool {
  private readonly idle: SmppSession[] = [];
  private readonly open = new Set<SmppSession>();
  private readonly waiting: Waiter[] = [];
  private leased = 0;
  private closed = false;
  private readonly logger: Logger;
  private readonly validateTimeoutMs: number;

  constructor(private readonly options: SmppSessionPoolOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.validateTimeoutMs = options.validateTimeoutMs ?? DEFAULT_VALIDATE_TIMEOUT_MS;
  }

  get size(): number {
    return this.open.size;
  }

  get boundCount(): number {
    return [...this.open].filter((session) => session.bound).length;
  }

  async acquire(): Promise<SmppSession> {
    await this.takeSlot();

    try {
      for (let session = this.idle.pop(); session; session = this.idle.pop()) {
        if (await this.isAlive(session)) {
          return session;
        }
        await this.closeSession(session);
      }

      const session = await this.options.connect();
      this.open.add(session);
      this.options.onSessionOpened?.(session);
      return session;
    } catch (error) {
      this.releaseSlot();
      throw error;
    }
  }

  /** Returns a session after use; one that lost its bind is closed instead of kept. */
  async release(session: SmppSession): Promise<void> {
    if (session.bound && !this.closed) {
      this.idle.push(session);
    } else {
      await this.closeSession(session);
    }
    this.releaseSlot();
  }

  /** Drops a session that misbehaved mid-use. */
  async discard(session: SmppSession): Promise<void> {
    await this.closeSession(session);
    this.releaseSlot();
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiting.splice(0)) {
      waiter.reject(new Error('SMPP session pool is closed'));
    }
    const sessions = [...this.open];
    this.idle.length = 0;
    await Promise.all(sessions.map((session) => this.closeSession(session)));
  }

  private async takeSlot(): Promise<void> {
    if (this.closed) {
      throw new Error('SMPP session pool is closed');
    }
    if (this.leased < this.options.maxSessions) {
      this.leased += 1;
      return;
    }
    // The releasing caller hands its slot straight to the waiter.
    await new Promise<void>((resolve, reject) => this.waiting.push({ resolve, reject }));
  }

  private releaseSlot(): void {
    const next = this.waiting.shift();
    if (next) {
      next.resolve();
      return;
    }
    this.leased -= 1;
  }

  private async isAlive(session: SmppSession): Promise<boolean> {
    if (!session.bound) {
      return false;
    }
    try {
      await withTimeout(session.enquireLink(), this.validateTimeoutMs, 'enquire_link');
      return true;
    } catch (error) {
      this.logger.debug(`${LOG_PREFIX} Idle session failed enquire_link`, { error: describeError(error) });
      return false;
    }
  }

  private async closeSession(session: SmppSession): Promise<void> {
    if (!this.open.delete(session)) {
      return;
    }
    try {
      await session.close();
    } catch (error) {
      this.logger.warn(`${LOG_PREFIX} Failed to close session`, { error: describeError(error) });
    }
  }
}
