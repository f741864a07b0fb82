import { RequestSpec } from './types.js';

export interface TransportResponse {
  status: number;
  text(): Promise<string>;
}

/** Sends one HTTP request. Rejects only on transport-level failure. */
export interface Transport {
  send(request: RequestSpec): Promise<TransportResponse>;
}

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

export class HttpClient implements Transport {
  private timeoutMs?: number;

  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  async send(request: RequestSpec): Promise<TransportResponse> {
    const init: RequestInit = {
      method: request.method,
      headers: { ...request.headers },
    };

    // fetch refuses a body on GET/HEAD, so the payload only rides along on other methods
    if (!BODYLESS_METHODS.has(request.method)) {
      init.headers = {
        'Content-Type': 'application/json',
        ...request.headers,
      };
      init.body = JSON.stringify(request.payload);
    }

    if (this.timeoutMs !== undefined) {
      init.signal = AbortSignal.timeout(this.timeoutMs);
    }

    try {
      return await fetch(request.url, init);
    } catch (error) {
      throw new TransportError(describeFailure(error, this.timeoutMs), error);
    }
  }
}

export class TransportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

export function describeFailure(error: unknown, timeoutMs?: number): string {
  if (error instanceof TransportError) {
    return error.message;
  }
  if (error instanceof Error) {
    if (error.name === 'TimeoutError') {
      return timeoutMs === undefined ? 'Request timed out' : `Request timed out after ${timeoutMs}ms`;
    }
    // undici puts the socket error (ECONNREFUSED, ENOTFOUND, ...) on cause
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message || error.name;
  }
  return String(error);
}
