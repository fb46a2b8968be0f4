/**
 * HTTP transport contract
 *
 * The resilient client creates one transport per logical request and closes
 * it when the request settles. Transports report network-level failures as
 * `TransportError` so the client can classify them without inspecting
 * platform error codes.
 *
 * @module http
 */

export interface TransportRequest {
  readonly method: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}

export interface TransportResponse {
  readonly status: number;
  readonly statusText: string;
  /** Lowercased header names */
  readonly headers: Readonly<Record<string, string>>;
  /** Fully received body */
  readonly body: string;
}

export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

export interface TransportOptions {
  readonly validateSsl: boolean;
  readonly timeoutMs: number;
}

export type TransportFactory = (options: TransportOptions) => HttpTransport;

/**
 * - `ssl`: certificate or handshake failure, never retried
 * - `connection`: refused, reset, DNS and socket failures
 * - `timeout`: the configured timeout elapsed
 * - `invalid-url`: the URL could not be parsed, never retried
 * - `client`: any other failure raised while sending
 */
export type TransportErrorKind = 'ssl' | 'connection' | 'timeout' | 'invalid-url' | 'client';

export class TransportError extends Error {
  constructor(
    public readonly kind: TransportErrorKind,
    message: string,
    public readonly errorCode?: string,
    cause?: unknown
  ) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'TransportError';
  }
}
