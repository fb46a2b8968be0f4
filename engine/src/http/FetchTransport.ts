/**
 * Fetch Transport
 *
 * Default transport: undici's fetch over a private Agent, so TLS
 * verification can be switched per session and the connection pool is
 * released on close.
 *
 * @module http
 */

import { Agent, fetch } from 'undici';
import {
  TransportError,
  type HttpTransport,
  type TransportOptions,
  type TransportRequest,
  type TransportResponse,
} from './HttpTransport.js';

const SSL_ERROR_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_REVOKED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'ERR_TLS_HANDSHAKE_TIMEOUT',
]);

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

const TIMEOUT_ERROR_CODES = new Set(['UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);

export class FetchTransport implements HttpTransport {
  private readonly agent: Agent;

  constructor(private readonly options: TransportOptions) {
    this.agent = new Agent({ connect: { rejectUnauthorized: options.validateSsl } });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    try {
      new URL(request.url);
    } catch (error) {
      throw new TransportError('invalid-url', `Invalid URL: ${request.url}`, 'ERR_INVALID_URL', error);
    }

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        dispatcher: this.agent,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      throw classifyFetchError(error, this.options.timeoutMs);
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

export function createFetchTransport(options: TransportOptions): HttpTransport {
  return new FetchTransport(options);
}

/**
 * Map fetch failures onto transport error kinds. undici wraps the socket
 * error as `cause`, sometimes two levels deep.
 */
export function classifyFetchError(error: unknown, timeoutMs: number): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  const name = readString(error, 'name');
  if (name === 'TimeoutError' || name === 'AbortError') {
    return new TransportError('timeout', `Request timed out after ${timeoutMs}ms`, name, error);
  }

  let current: unknown = error;
  for (let depth = 0; depth < 3 && current !== undefined; depth++) {
    const code = readString(current, 'code');
    const message = readString(current, 'message') ?? String(current);
    if (code !== undefined) {
      if (SSL_ERROR_CODES.has(code) || code.startsWith('ERR_SSL_') || code.startsWith('ERR_TLS_')) {
        return new TransportError('ssl', message, code, error);
      }
      if (TIMEOUT_ERROR_CODES.has(code)) {
        return new TransportError('timeout', message, code, error);
      }
      if (CONNECTION_ERROR_CODES.has(code)) {
        return new TransportError('connection', message, code, error);
      }
    }
    current = readField(current, 'cause');
  }

  return new TransportError('client', readString(error, 'message') ?? String(error), undefined, error);
}

function readField(value: unknown, field: string): unknown {
  if (typeof value === 'object' && value !== null && field in value) {
    return Reflect.get(value, field);
  }
  return undefined;
}

function readString(value: unknown, field: string): string | undefined {
  const result = readField(value, field);
  return typeof result === 'string' ? result : undefined;
}
