import { Agent, fetch, type Dispatcher } from 'undici';

export type TransportMethod = 'GET' | 'POST';

export type TransportRequest = {
  method: TransportMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
};

export type TransportResponse = {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
};

export type TransportCallOptions = {
  timeoutMs: number;
};

/**
 * The process-wide HTTP client every channel shares. Implementations must tolerate concurrent
 * calls and reject with TransportTimeoutError or TransportNetworkError on transport faults.
 */
export interface HttpTransport {
  send(request: TransportRequest, options: TransportCallOptions): Promise<TransportResponse>;
}

export class TransportTimeoutError extends Error {
  constructor(
    public readonly timeoutMs: number,
    options: { cause?: unknown } = {}
  ) {
    super(`Request aborted after ${timeoutMs}ms`, options);
    this.name = 'TransportTimeoutError';
  }
}

/** Status reported for faults where no HTTP response was received. */
export const NETWORK_FAILURE_STATUS = 503;

export class TransportNetworkError extends Error {
  public readonly code: string | null;
  public readonly statusCode: number;

  constructor(message: string, options: { code?: string | null; statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportNetworkError';
    this.code = options.code ?? null;
    this.statusCode = options.statusCode ?? NETWORK_FAILURE_STATUS;
  }
}

const readErrorCode = (error: unknown): string | null => {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error) {
    return readErrorCode(error.cause);
  }
  return null;
};

const describeError = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause instanceof Error ? error.cause.message : null;
  return cause && cause !== error.message ? `${error.message} (${cause})` : error.message;
};

export class UndiciHttpTransport implements HttpTransport {
  constructor(private readonly dispatcher: Dispatcher) {}

  async send(request: TransportRequest, { timeoutMs }: TransportCallOptions): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      // The body read stays under the same deadline as the headers.
      const body = await response.text();

      return {
        status: response.status,
        statusText: response.statusText,
        headers: Object.fromEntries(response.headers.entries()),
        body,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportTimeoutError(timeoutMs, { cause: error });
      }

      throw new TransportNetworkError(describeError(error), {
        code: readErrorCode(error),
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}

let sharedAgent: Agent | null = null;
let sharedTransport: HttpTransport | null = null;

export const getSharedTransport = (): HttpTransport => {
  if (!sharedTransport) {
    sharedAgent = new Agent({ keepAliveTimeout: 10_000, connections: 128 });
    sharedTransport = new UndiciHttpTransport(sharedAgent);
  }
  return sharedTransport;
};

export const closeSharedTransport = async (): Promise<void> => {
  const agent = sharedAgent;
  sharedAgent = null;
  sharedTransport = null;
  if (agent) {
    await agent.close();
  }
};
