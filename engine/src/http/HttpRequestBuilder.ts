/**
 * HTTP Request Builder
 *
 * Fluent builder turning a rendered request spec plus session context into
 * the concrete request a transport sends.
 *
 * @module http
 */

import type { HttpMethod, JsonPrimitive, JsonValue } from '../types/core-types.js';
import type { TransportRequest } from './HttpTransport.js';

/**
 * One logical request, already rendered
 */
export interface HttpRequestSpec {
  readonly method: HttpMethod;
  readonly endpoint: string;
  readonly json?: JsonValue;
  readonly params?: Readonly<Record<string, JsonPrimitive>>;
  readonly headers?: Readonly<Record<string, string>>;
}

export class HttpRequestBuilder {
  private methodValue: HttpMethod = 'GET';
  private urlValue: string | undefined;
  private headerValues: Record<string, string> = {};
  private bodyValue: string | undefined;

  method(method: HttpMethod): this {
    this.methodValue = method;
    return this;
  }

  /**
   * `baseUrl` without its trailing slash, `/`, endpoint without its leading slash.
   * An absolute endpoint URL is used as-is.
   */
  url(baseUrl: string, endpoint: string): this {
    this.urlValue = joinUrl(baseUrl, endpoint);
    return this;
  }

  /**
   * Later calls override earlier ones, header names compared case-insensitively
   */
  headers(headers: Readonly<Record<string, string>>): this {
    for (const [name, value] of Object.entries(headers)) {
      for (const existing of Object.keys(this.headerValues)) {
        if (existing.toLowerCase() === name.toLowerCase()) {
          delete this.headerValues[existing];
        }
      }
      this.headerValues[name] = value;
    }
    return this;
  }

  json(data: JsonValue): this {
    this.bodyValue = JSON.stringify(data);
    if (!this.hasHeader('content-type')) {
      this.headerValues['Content-Type'] = 'application/json';
    }
    return this;
  }

  /**
   * `null` values are dropped. Requires `url()` first.
   */
  query(params: Readonly<Record<string, JsonPrimitive>>): this {
    if (!this.urlValue) {
      throw new Error('URL must be set before adding query parameters');
    }

    const entries = Object.entries(params).filter(
      (entry): entry is [string, string | number | boolean] => entry[1] !== null
    );
    if (entries.length === 0) {
      return this;
    }

    const search = new URLSearchParams(entries.map(([key, value]): [string, string] => [key, String(value)]));
    const separator = this.urlValue.includes('?') ? '&' : '?';
    this.urlValue = `${this.urlValue}${separator}${search.toString()}`;
    return this;
  }

  build(): TransportRequest {
    if (!this.urlValue) {
      throw new Error('URL is required');
    }
    return {
      method: this.methodValue,
      url: this.urlValue,
      headers: { ...this.headerValues },
      body: this.bodyValue,
    };
  }

  private hasHeader(name: string): boolean {
    return Object.keys(this.headerValues).some((key) => key.toLowerCase() === name);
  }
}

export function joinUrl(baseUrl: string, endpoint: string): string {
  if (/^https?:\/\//i.test(endpoint)) {
    return endpoint;
  }
  return `${baseUrl.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;
}
