/**
 * In-process stand-ins for the HTTP transport, sessions and logger
 */

import { EngineLogger } from '../core/EngineLogger.js';
import type {
  HttpTransport,
  TransportFactory,
  TransportOptions,
  TransportRequest,
  TransportResponse,
} from '../http/HttpTransport.js';
import { TransportError } from '../http/HttpTransport.js';
import type { Authenticator } from '../session/Session.js';
import { LogLevel } from '../types/log-types.js';
import type { JsonValue } from '../types/core-types.js';

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  204: 'No Content',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

export function reply(status: number, body?: JsonValue, headers: Record<string, string> = {}): TransportResponse {
  return {
    status,
    statusText: STATUS_TEXT[status] ?? '',
    headers,
    body: body === undefined ? '' : typeof body === 'string' ? body : JSON.stringify(body),
  };
}

type Reply = TransportResponse | TransportError;
type Handler = (request: TransportRequest) => Reply;

/**
 * Answers requests from a queue first, then from routes keyed by
 * `METHOD /path`. Unmatched requests fail the test loudly.
 */
export class FakeServer {
  readonly requests: TransportRequest[] = [];
  readonly transportOptions: TransportOptions[] = [];
  closed = 0;
  private readonly queue: Reply[] = [];
  private readonly routes = new Map<string, Handler>();

  enqueue(...replies: Reply[]): this {
    this.queue.push(...replies);
    return this;
  }

  route(key: string, handler: Handler | Reply): this {
    this.routes.set(key, typeof handler === 'function' ? handler : () => handler);
    return this;
  }

  readonly factory: TransportFactory = (options) => {
    this.transportOptions.push(options);
    const transport: HttpTransport = {
      send: async (request) => this.handle(request),
      close: async () => {
        this.closed++;
      },
    };
    return transport;
  };

  /** `METHOD /path?query` of every request, in order */
  get calls(): string[] {
    return this.requests.map((request) => {
      const url = new URL(request.url);
      return `${request.method} ${url.pathname}${url.search}`;
    });
  }

  bodyOf(index: number): unknown {
    const body = this.requests[index]?.body;
    return body === undefined ? undefined : JSON.parse(body);
  }

  private handle(request: TransportRequest): TransportResponse {
    this.requests.push(request);
    const next = this.queue.shift() ?? this.fromRoutes(request);
    if (next instanceof TransportError) {
      throw next;
    }
    return next;
  }

  private fromRoutes(request: TransportRequest): Reply {
    const key = `${request.method} ${new URL(request.url).pathname}`;
    const handler = this.routes.get(key);
    if (!handler) {
      throw new Error(`Unexpected request: ${key}`);
    }
    return handler(request);
  }
}

/**
 * Records requested sleeps instead of waiting
 */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

/**
 * Bearer-style authenticator issuing numbered placeholder tokens
 */
export class StubAuthenticator implements Authenticator {
  authenticateCalls = 0;
  refreshCalls = 0;
  private token: string | undefined;

  constructor(
    private readonly options: { failAuthenticate?: boolean; failRefresh?: boolean; keepTokenOnFailedRefresh?: boolean } = {}
  ) {}

  async authenticate(): Promise<void> {
    this.authenticateCalls++;
    if (this.options.failAuthenticate) {
      throw new Error('credentials rejected');
    }
    this.token = `test-token-${this.authenticateCalls + this.refreshCalls}`;
  }

  async refresh(): Promise<void> {
    this.refreshCalls++;
    if (this.options.failRefresh) {
      if (!this.options.keepTokenOnFailedRefresh) {
        this.token = undefined;
      }
      throw new Error('refresh token expired');
    }
    this.token = `test-token-${this.authenticateCalls + this.refreshCalls}`;
  }

  getHeaders(): Record<string, string> {
    return this.token ? { Authorization: `Bearer ${this.token}` } : {};
  }

  isAuthenticated(): boolean {
    return this.token !== undefined;
  }
}

/**
 * Logger writing plain lines into an array
 */
export function capturingLogger(level: LogLevel = LogLevel.DEBUG): { logger: EngineLogger; lines: string[] } {
  const lines: string[] = [];
  const logger = new EngineLogger({
    level,
    format: 'text',
    colors: false,
    timestamp: false,
    sink: (line) => lines.push(line),
  });
  return { logger, lines };
}
