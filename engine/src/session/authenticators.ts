/**
 * Built-in Authenticators
 *
 * The auth types a session can name besides `none`. Options arrive from the
 * session's `auth` block after template rendering and are checked when the
 * session is created, so a missing credential fails before any request.
 *
 * @module session
 */

import { z } from 'zod';
import { AuthenticationError, ConfigurationError } from '../errors/index.js';
import { createFetchTransport } from '../http/FetchTransport.js';
import { HttpResponse } from '../http/HttpResponse.js';
import type { TransportFactory } from '../http/HttpTransport.js';
import { DEFAULT_SESSION_TIMEOUT, type JsonValue } from '../types/core-types.js';
import type { Authenticator, AuthenticatorFactory } from './Session.js';

const credential = z.string().min(1);

const BearerOptionsSchema = z.object({ token: credential }).strict();

const BasicOptionsSchema = z.object({ username: credential, password: z.string() }).strict();

const ApiKeyOptionsSchema = z
  .object({
    api_key: credential,
    header_name: credential.default('X-API-Key'),
  })
  .strict();

const OAuth2OptionsSchema = z
  .object({
    client_id: credential,
    client_secret: credential,
    token_url: z.string().url(),
    scope: z.string().optional(),
    validate_ssl: z.boolean().default(true),
    timeout: z.number().positive().default(DEFAULT_SESSION_TIMEOUT),
  })
  .strict();

export type OAuth2Options = z.output<typeof OAuth2OptionsSchema>;

const TokenResponseSchema = z.object({
  access_token: credential,
  refresh_token: credential.optional(),
});

/**
 * Static token sent as `Authorization: Bearer <token>`
 */
export class BearerAuthenticator implements Authenticator {
  private authenticated = false;

  constructor(private readonly token: string) {}

  async authenticate(): Promise<void> {
    this.authenticated = true;
  }

  async refresh(): Promise<void> {
    await this.authenticate();
  }

  getHeaders(): Record<string, string> {
    return this.authenticated ? { Authorization: `Bearer ${this.token}` } : {};
  }

  isAuthenticated(): boolean {
    return this.authenticated;
  }
}

export class BasicAuthenticator implements Authenticator {
  private readonly encoded: string;
  private authenticated = false;

  constructor(username: string, password: string) {
    this.encoded = Buffer.from(`${username}:${password}`, 'utf-8').toString('base64');
  }

  async authenticate(): Promise<void> {
    this.authenticated = true;
  }

  async refresh(): Promise<void> {
    await this.authenticate();
  }

  getHeaders(): Record<string, string> {
    return this.authenticated ? { Authorization: `Basic ${this.encoded}` } : {};
  }

  isAuthenticated(): boolean {
    return this.authenticated;
  }
}

/**
 * Key in a fixed header. Nothing to obtain, so it is always authenticated.
 */
export class ApiKeyAuthenticator implements Authenticator {
  constructor(
    private readonly apiKey: string,
    private readonly headerName: string
  ) {}

  async authenticate(): Promise<void> {}

  async refresh(): Promise<void> {}

  getHeaders(): Record<string, string> {
    return { [this.headerName]: this.apiKey };
  }

  isAuthenticated(): boolean {
    return true;
  }
}

/**
 * OAuth2 client credentials grant. `refresh()` uses the refresh token when
 * the server issued one and falls back to a new grant otherwise.
 */
export class OAuth2Authenticator implements Authenticator {
  private accessToken: string | undefined;
  private refreshToken: string | undefined;

  constructor(
    private readonly options: OAuth2Options,
    private readonly transportFactory: TransportFactory = createFetchTransport
  ) {}

  async authenticate(): Promise<void> {
    const form: Record<string, string> = {
      grant_type: 'client_credentials',
      client_id: this.options.client_id,
      client_secret: this.options.client_secret,
    };
    if (this.options.scope !== undefined) {
      form.scope = this.options.scope;
    }
    await this.requestToken(form);
  }

  async refresh(): Promise<void> {
    const refreshToken = this.refreshToken;
    if (refreshToken === undefined) {
      await this.authenticate();
      return;
    }
    try {
      await this.requestToken({
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
        client_id: this.options.client_id,
        client_secret: this.options.client_secret,
      });
    } catch (error) {
      this.refreshToken = undefined;
      // Rejected refresh token: start over with a new grant
      if (!(error instanceof AuthenticationError)) {
        throw error;
      }
      await this.authenticate();
    }
  }

  getHeaders(): Record<string, string> {
    return this.accessToken ? { Authorization: `Bearer ${this.accessToken}` } : {};
  }

  isAuthenticated(): boolean {
    return this.accessToken !== undefined;
  }

  private async requestToken(form: Record<string, string>): Promise<void> {
    const url = this.options.token_url;
    const transport = this.transportFactory({
      validateSsl: this.options.validate_ssl,
      timeoutMs: this.options.timeout * 1000,
    });
    try {
      const response = new HttpResponse(
        await transport.send({
          method: 'POST',
          url,
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
          },
          body: new URLSearchParams(form).toString(),
        })
      );
      if (response.status !== 200) {
        throw new AuthenticationError(`Token endpoint answered HTTP ${response.status}`, {
          url,
          method: 'POST',
          statusCode: response.status,
        });
      }
      const token = TokenResponseSchema.safeParse(response.data);
      if (!token.success) {
        throw new AuthenticationError('Token response has no access_token', { url, method: 'POST' });
      }
      this.accessToken = token.data.access_token;
      this.refreshToken = token.data.refresh_token ?? this.refreshToken;
    } finally {
      await transport.close();
    }
  }
}

export interface BuiltInAuthenticatorOptions {
  /** Transport for OAuth2 token requests */
  transportFactory?: TransportFactory;
}

/**
 * Factories for `bearer`, `basic`, `api_key` and `oauth2`, keyed by auth type
 */
export function createAuthenticators(
  options: BuiltInAuthenticatorOptions = {}
): Record<string, AuthenticatorFactory> {
  return {
    bearer: (raw, session) => new BearerAuthenticator(parseOptions(BearerOptionsSchema, raw, session, 'bearer').token),
    basic: (raw, session) => {
      const { username, password } = parseOptions(BasicOptionsSchema, raw, session, 'basic');
      return new BasicAuthenticator(username, password);
    },
    api_key: (raw, session) => {
      const { api_key, header_name } = parseOptions(ApiKeyOptionsSchema, raw, session, 'api_key');
      return new ApiKeyAuthenticator(api_key, header_name);
    },
    oauth2: (raw, session) =>
      new OAuth2Authenticator(parseOptions(OAuth2OptionsSchema, raw, session, 'oauth2'), options.transportFactory),
  };
}

function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  raw: Readonly<Record<string, JsonValue>>,
  session: string,
  type: string
): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw ConfigurationError.fromIssues(result.error.issues, `${type} auth of session "${session}"`);
  }
  return result.data;
}
