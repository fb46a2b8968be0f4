import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitBreaker } from '../http/CircuitBreaker.js';
import { TransportError } from '../http/HttpTransport.js';
import { ResilientHttpClient, type ResilientHttpClientConfig } from '../http/ResilientHttpClient.js';
import {
  AuthenticationError,
  RetryExceededError,
  SSLVerificationError,
  UnknownError,
} from '../errors/index.js';
import { ConfiguredSession, sessionConfig, type Session } from '../session/Session.js';
import { DEFAULT_RETRY_CONFIG, type RetryConfig } from '../types/core-types.js';
import { FakeServer, StubAuthenticator, capturingLogger, recordingSleep, reply } from './fakes.js';

// ── Helpers ────────────────────────────────────────────────────────────

function makeConfig(retry: Partial<RetryConfig> = {}): ResilientHttpClientConfig {
  return {
    retry: { ...DEFAULT_RETRY_CONFIG, maxRetries: 2, ...retry },
    validateSsl: true,
    timeout: 30,
  };
}

function makeSession(authenticator?: StubAuthenticator): Session {
  if (!authenticator) {
    return new ConfiguredSession('api', sessionConfig('https://api.test'));
  }
  return new ConfiguredSession(
    'api',
    sessionConfig('https://api.test', { auth: { type: 'stub', options: {} } }),
    { authenticators: { stub: () => authenticator } }
  );
}

describe('ResilientHttpClient', () => {
  let server: FakeServer;
  let clock: ReturnType<typeof recordingSleep>;

  beforeEach(() => {
    server = new FakeServer();
    clock = recordingSleep();
  });

  function makeClient(
    config: ResilientHttpClientConfig = makeConfig(),
    session: Session = makeSession(),
    circuitBreaker?: CircuitBreaker
  ): ResilientHttpClient {
    return new ResilientHttpClient(session, config, {
      logger: capturingLogger().logger,
      transportFactory: server.factory,
      sleep: clock.sleep,
      circuitBreaker,
    });
  }

  // ── Success path ───────────────────────────────────────────────────

  describe('success', () => {
    it('returns the parsed body of a 2xx response', async () => {
      server.enqueue(reply(200, { id: 7 }));
      const client = makeClient();

      const response = await client.executeRequest({ method: 'GET', endpoint: '/items' });

      expect(response.status).toBe(200);
      expect(response.data).toEqual({ id: 7 });
      expect(server.calls).toEqual(['GET /items']);
      expect(client.metadata?.attempts).toBe(1);
      expect(client.metadata?.retryCount).toBe(0);
      expect(client.metadata?.success).toBe(true);
    });

    it('builds the request from session headers, json body and params', async () => {
      server.enqueue(reply(201, { ok: true }));
      const session = new ConfiguredSession(
        'api',
        sessionConfig('https://api.test/', { headers: { 'X-Api-Key': 'test-secret' } })
      );
      const client = makeClient(makeConfig(), session);

      await client.executeRequest({
        method: 'POST',
        endpoint: 'items',
        json: { name: 'widget' },
        params: { page: 2, cursor: null },
      });

      const request = server.requests[0];
      expect(request.url).toBe('https://api.test/items?page=2');
      expect(request.body).toBe('{"name":"widget"}');
      expect(request.headers).toEqual({
        'X-Api-Key': 'test-secret',
        'Content-Type': 'application/json',
      });
    });

    it('passes timeout and TLS settings to the transport and closes it', async () => {
      server.enqueue(reply(200));
      const client = makeClient({ ...makeConfig(), validateSsl: false, timeout: 5 });

      await client.executeRequest({ method: 'GET', endpoint: '/health' });

      expect(server.transportOptions).toEqual([{ validateSsl: false, timeoutMs: 5000 }]);
      expect(server.closed).toBe(1);
    });

    it('returns a 404 without retrying by default', async () => {
      server.enqueue(reply(404, { error: 'missing' }));
      const client = makeClient();

      const response = await client.executeRequest({ method: 'GET', endpoint: '/items/9' });

      expect(response.status).toBe(404);
      expect(client.metadata?.attempts).toBe(1);
      expect(clock.delays).toEqual([]);
    });
  });

  // ── Retries ────────────────────────────────────────────────────────

  describe('retries', () => {
    it('retries 5xx responses with exponential backoff', async () => {
      server.enqueue(reply(503), reply(503), reply(200, { ok: true }));
      const client = makeClient();

      const response = await client.executeRequest({ method: 'GET', endpoint: '/items' });

      expect(response.data).toEqual({ ok: true });
      expect(clock.delays).toEqual([1000, 2000]);
      expect(client.metadata?.attempts).toBe(3);
      expect(client.metadata?.retryCount).toBe(2);
      expect(client.metadata?.errors).toEqual([
        'HTTP 503: Service Unavailable',
        'HTTP 503: Service Unavailable',
      ]);
    });

    it('caps the backoff at maxDelay', async () => {
      server.enqueue(reply(500), reply(500), reply(200));
      const client = makeClient(makeConfig({ backoffFactor: 3, maxDelay: 4 }));

      await client.executeRequest({ method: 'GET', endpoint: '/items' });

      expect(clock.delays).toEqual([3000, 4000]);
    });

    it('retries connection failures', async () => {
      server.enqueue(new TransportError('connection', 'connect ECONNREFUSED', 'ECONNREFUSED'), reply(200));
      const client = makeClient();

      const response = await client.executeRequest({ method: 'GET', endpoint: '/items' });

      expect(response.status).toBe(200);
      expect(client.metadata?.attempts).toBe(2);
      expect(client.metadata?.errors).toEqual(['Connection error: connect ECONNREFUSED']);
    });

    it('throws RetryExceededError once attempts are exhausted', async () => {
      server.enqueue(reply(503), reply(503));
      const client = makeClient(makeConfig({ maxRetries: 1 }));

      const failure = await client.executeRequest({ method: 'GET', endpoint: '/items' }).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(RetryExceededError);
      if (failure instanceof RetryExceededError) {
        expect(failure.attempts).toBe(2);
        expect(failure.message).toBe('Request failed after 2 attempts: HTTP 503: Service Unavailable');
      }
      expect(clock.delays).toEqual([1000]);
      expect(server.closed).toBe(1);
    });

    it('retries a 404 when retryOn404 is set', async () => {
      server.enqueue(reply(404), reply(200, { id: 1 }));
      const client = makeClient(makeConfig({ retryOn404: true }));

      const response = await client.executeRequest({ method: 'GET', endpoint: '/items/1' });

      expect(response.data).toEqual({ id: 1 });
      expect(clock.delays).toEqual([1000]);
    });
  });

  // ── Rate limiting ──────────────────────────────────────────────────

  describe('rate limiting', () => {
    it('waits for the server-directed delay', async () => {
      server.enqueue(reply(429, undefined, { 'retry-after': '5' }), reply(200));
      const client = makeClient();

      await client.executeRequest({ method: 'GET', endpoint: '/items' });

      expect(clock.delays).toEqual([5000]);
    });

    it('falls back to backoff without a usable header', async () => {
      server.enqueue(reply(429, undefined, { 'retry-after': 'soon' }), reply(429), reply(200));
      const client = makeClient();

      await client.executeRequest({ method: 'GET', endpoint: '/items' });

      expect(clock.delays).toEqual([1000, 2000]);
    });

    it('ignores the header when server delays are disabled', async () => {
      server.enqueue(reply(429, undefined, { 'retry-after': '5' }), reply(200));
      const client = makeClient(
        makeConfig({ rateLimit: { useServerRetryDelay: false, retryHeader: 'Retry-After' } })
      );

      await client.executeRequest({ method: 'GET', endpoint: '/items' });

      expect(clock.delays).toEqual([1000]);
    });

    it('reads a custom retry header', async () => {
      server.enqueue(reply(429, undefined, { 'x-retry-in': '2' }), reply(200));
      const client = makeClient(
        makeConfig({ rateLimit: { useServerRetryDelay: true, retryHeader: 'X-Retry-In' } })
      );

      await client.executeRequest({ method: 'GET', endpoint: '/items' });

      expect(clock.delays).toEqual([2000]);
    });

    it('throws RetryExceededError when the last attempt is rate limited', async () => {
      server.enqueue(reply(429), reply(429), reply(429));
      const client = makeClient();

      await expect(client.executeRequest({ method: 'GET', endpoint: '/items' })).rejects.toBeInstanceOf(
        RetryExceededError
      );
      expect(server.requests).toHaveLength(3);
    });
  });

  // ── Authentication ─────────────────────────────────────────────────

  describe('authentication', () => {
    it('authenticates before the first attempt', async () => {
      const authenticator = new StubAuthenticator();
      server.enqueue(reply(200));
      const client = makeClient(makeConfig(), makeSession(authenticator));

      await client.executeRequest({ method: 'GET', endpoint: '/me' });

      expect(authenticator.authenticateCalls).toBe(1);
      expect(server.requests[0].headers).toEqual({ Authorization: 'Bearer test-token-1' });
    });

    it('refreshes credentials after a 401 and retries without sleeping', async () => {
      const authenticator = new StubAuthenticator();
      server.enqueue(reply(401), reply(200));
      const client = makeClient(makeConfig(), makeSession(authenticator));

      await client.executeRequest({ method: 'GET', endpoint: '/me' });

      expect(authenticator.refreshCalls).toBe(1);
      expect(server.requests[1].headers).toEqual({ Authorization: 'Bearer test-token-2' });
      expect(clock.delays).toEqual([]);
    });

    it('re-authenticates when the refresh fails', async () => {
      const authenticator = new StubAuthenticator({ failRefresh: true });
      server.enqueue(reply(403), reply(200));
      const client = makeClient(makeConfig(), makeSession(authenticator));

      await client.executeRequest({ method: 'GET', endpoint: '/me' });

      expect(authenticator.authenticateCalls).toBe(2);
      expect(server.requests[1].headers).toEqual({ Authorization: 'Bearer test-token-3' });
    });

    it('re-authenticates when a failed refresh keeps the rejected token', async () => {
      const authenticator = new StubAuthenticator({ failRefresh: true, keepTokenOnFailedRefresh: true });
      server.enqueue(reply(401), reply(200));
      const client = makeClient(makeConfig(), makeSession(authenticator));

      await client.executeRequest({ method: 'GET', endpoint: '/me' });

      expect(authenticator.authenticateCalls).toBe(2);
      expect(server.requests[0].headers).toEqual({ Authorization: 'Bearer test-token-1' });
      expect(server.requests[1].headers).toEqual({ Authorization: 'Bearer test-token-3' });
    });

    it('throws AuthenticationError when the last attempt is rejected', async () => {
      server.enqueue(reply(401));
      const client = makeClient(makeConfig({ maxRetries: 0 }), makeSession(new StubAuthenticator()));

      await expect(client.executeRequest({ method: 'GET', endpoint: '/me' })).rejects.toThrow(
        'Authentication rejected with HTTP 401 after 1 attempts'
      );
    });

    it('fails without sending when the initial authentication fails', async () => {
      const client = makeClient(makeConfig(), makeSession(new StubAuthenticator({ failAuthenticate: true })));

      await expect(client.executeRequest({ method: 'GET', endpoint: '/me' })).rejects.toBeInstanceOf(
        AuthenticationError
      );
      expect(server.requests).toHaveLength(0);
    });
  });

  // ── Fatal failures ─────────────────────────────────────────────────

  describe('fatal failures', () => {
    it('does not retry TLS verification failures', async () => {
      server.enqueue(new TransportError('ssl', 'certificate has expired', 'CERT_HAS_EXPIRED'));
      const client = makeClient();

      await expect(client.executeRequest({ method: 'GET', endpoint: '/items' })).rejects.toBeInstanceOf(
        SSLVerificationError
      );
      expect(server.requests).toHaveLength(1);
      expect(client.metadata?.attempts).toBe(1);
    });

    it('wraps unexpected transport failures in UnknownError', async () => {
      server.route('GET /items', () => {
        throw new Error('boom');
      });
      const client = makeClient();

      const failure = await client.executeRequest({ method: 'GET', endpoint: '/items' }).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(UnknownError);
      expect(failure).toHaveProperty('message', 'Unexpected transport failure: boom');
    });
  });

  // ── Circuit breaker ────────────────────────────────────────────────

  describe('circuit breaker', () => {
    it('records 5xx failures and resets on success', async () => {
      const breaker = new CircuitBreaker({ threshold: 5, reset: 10, jitter: 0 });
      server.enqueue(reply(502), reply(200));
      const client = makeClient(makeConfig(), makeSession(), breaker);

      await client.executeRequest({ method: 'GET', endpoint: '/items' });

      expect(breaker.failures).toBe(0);
      expect(breaker.state).toBe('closed');
    });

    it('counts a failure for every retryable attempt, the last one included', async () => {
      const breaker = new CircuitBreaker({ threshold: 5, reset: 10, jitter: 0 });
      server.enqueue(reply(500), reply(500));
      const client = makeClient(makeConfig({ maxRetries: 1 }), makeSession(), breaker);

      await expect(client.executeRequest({ method: 'GET', endpoint: '/items' })).rejects.toBeInstanceOf(
        RetryExceededError
      );
      expect(breaker.failures).toBe(2);
    });

    it('does not count retried 404s', async () => {
      const breaker = new CircuitBreaker({ threshold: 5, reset: 10, jitter: 0 });
      server.enqueue(reply(404), reply(200));
      const client = makeClient(makeConfig({ retryOn404: true }), makeSession(), breaker);

      await client.executeRequest({ method: 'GET', endpoint: '/items' });
      expect(breaker.failures).toBe(0);
    });

    it('waits out an open breaker before the next attempt', async () => {
      const breaker = new CircuitBreaker({ threshold: 1, reset: 10, jitter: 0 }, { now: () => 0 });
      server.enqueue(reply(503), reply(200));
      const client = makeClient(makeConfig(), makeSession(), breaker);

      await client.executeRequest({ method: 'GET', endpoint: '/items' });

      expect(clock.delays).toEqual([1000, 10000]);
      expect(breaker.state).toBe('closed');
    });
  });
});
