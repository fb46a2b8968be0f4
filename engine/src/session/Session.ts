/**
 * Sessions
 *
 * A session is a named base URL with credentials and default resilience
 * settings. The engine consumes sessions through `SessionProvider`; where
 * sessions are stored and how credentials are obtained are host concerns.
 *
 * @module session
 */

import { ConfigurationError, SessionNotFoundError, AuthenticationError, errorMessage } from '../errors/index.js';
import type { CircuitBreaker } from '../http/CircuitBreaker.js';
import {
  DEFAULT_SESSION_TIMEOUT,
  type CircuitBreakerConfig,
  type JsonValue,
  type RetryConfig,
  type SessionConfig,
} from '../types/core-types.js';

export interface Session {
  readonly name: string;
  readonly baseUrl: string;
  readonly retryConfig?: RetryConfig;
  readonly circuitBreakerConfig?: CircuitBreakerConfig;
  /** When set, every client for this session shares this breaker */
  readonly circuitBreaker?: CircuitBreaker;
  readonly validateSsl: boolean;
  /** Seconds */
  readonly timeout: number;
  authenticate(): Promise<void>;
  refreshAuth(): Promise<void>;
  getHeaders(): Record<string, string>;
  isAuthenticated(): boolean;
}

export interface SessionProvider {
  /**
   * @throws {SessionNotFoundError} for unknown names
   */
  getSession(name: string): Session;
}

/**
 * Credential handling for one session. Only `none` is always available;
 * `createAuthenticators()` supplies bearer, basic, API key and OAuth2, and
 * hosts may register their own types next to them.
 */
export interface Authenticator {
  authenticate(): Promise<void>;
  refresh(): Promise<void>;
  getHeaders(): Record<string, string>;
  isAuthenticated(): boolean;
}

/**
 * Builds an authenticator from a session's rendered auth options
 */
export type AuthenticatorFactory = (options: Readonly<Record<string, JsonValue>>, sessionName: string) => Authenticator;

/**
 * The `none` auth type: always authenticated, adds no headers
 */
export class NoAuthenticator implements Authenticator {
  async authenticate(): Promise<void> {}

  async refresh(): Promise<void> {}

  getHeaders(): Record<string, string> {
    return {};
  }

  isAuthenticated(): boolean {
    return true;
  }
}

export interface ConfiguredSessionOptions {
  authenticators?: Readonly<Record<string, AuthenticatorFactory>>;
  circuitBreaker?: CircuitBreaker;
}

/**
 * A Session built from a `SessionConfig`
 */
export class ConfiguredSession implements Session {
  readonly baseUrl: string;
  readonly retryConfig?: RetryConfig;
  readonly circuitBreakerConfig?: CircuitBreakerConfig;
  readonly circuitBreaker?: CircuitBreaker;
  readonly validateSsl: boolean;
  readonly timeout: number;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly authenticator: Authenticator;

  constructor(
    readonly name: string,
    config: SessionConfig,
    options: ConfiguredSessionOptions = {}
  ) {
    this.baseUrl = config.baseUrl;
    this.retryConfig = config.retry;
    this.circuitBreakerConfig = config.circuitBreaker ?? config.retry?.circuitBreaker;
    this.circuitBreaker = options.circuitBreaker;
    this.validateSsl = config.validateSsl;
    this.timeout = config.timeout;
    this.headers = config.headers;
    this.authenticator = createAuthenticator(name, config, options.authenticators ?? {});
  }

  async authenticate(): Promise<void> {
    try {
      await this.authenticator.authenticate();
    } catch (error) {
      throw new AuthenticationError(`Authentication failed for session "${this.name}": ${errorMessage(error)}`, {}, error);
    }
  }

  async refreshAuth(): Promise<void> {
    await this.authenticator.refresh();
  }

  getHeaders(): Record<string, string> {
    return { ...this.headers, ...this.authenticator.getHeaders() };
  }

  isAuthenticated(): boolean {
    return this.authenticator.isAuthenticated();
  }
}

function createAuthenticator(
  name: string,
  config: SessionConfig,
  factories: Readonly<Record<string, AuthenticatorFactory>>
): Authenticator {
  const type = config.auth?.type ?? 'none';
  const factory = factories[type];
  if (factory) {
    return factory(config.auth?.options ?? {}, name);
  }
  if (type === 'none') {
    return new NoAuthenticator();
  }
  throw ConfigurationError.unsupportedAuth(name, type);
}

/**
 * Map-backed provider
 */
export class StaticSessionProvider implements SessionProvider {
  private readonly sessions = new Map<string, Session>();

  constructor(sessions: Iterable<Session> = []) {
    for (const session of sessions) {
      this.sessions.set(session.name, session);
    }
  }

  /**
   * Build a provider from session configs, e.g. a parsed sessions file
   */
  static fromConfigs(
    configs: Readonly<Record<string, SessionConfig>>,
    options: ConfiguredSessionOptions = {}
  ): StaticSessionProvider {
    return new StaticSessionProvider(
      Object.entries(configs).map(([name, config]) => new ConfiguredSession(name, config, options))
    );
  }

  add(session: Session): void {
    this.sessions.set(session.name, session);
  }

  getSession(name: string): Session {
    const session = this.sessions.get(name);
    if (!session) {
      throw new SessionNotFoundError(name);
    }
    return session;
  }

  has(name: string): boolean {
    return this.sessions.has(name);
  }
}

/**
 * Session config for hosts that only know a base URL
 */
export function sessionConfig(baseUrl: string, overrides: Partial<SessionConfig> = {}): SessionConfig {
  return {
    baseUrl,
    headers: {},
    validateSsl: true,
    timeout: DEFAULT_SESSION_TIMEOUT,
    ...overrides,
  };
}
