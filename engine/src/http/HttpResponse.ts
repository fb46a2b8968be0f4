/**
 * HTTP Response
 *
 * Wraps a fully received transport response. The body is parsed once: JSON
 * when it parses, otherwise the raw text, `null` when empty.
 *
 * @module http
 */

import type { JsonValue } from '../types/core-types.js';
import type { TransportResponse } from './HttpTransport.js';

export class HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly text: string;
  private parsed: { value: JsonValue } | undefined;

  constructor(response: TransportResponse) {
    this.status = response.status;
    this.statusText = response.statusText;
    this.headers = response.headers;
    this.text = response.body;
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  get sizeBytes(): number {
    return Buffer.byteLength(this.text, 'utf-8');
  }

  /**
   * Case-insensitive header lookup
   */
  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  /**
   * The parsed body
   */
  get data(): JsonValue {
    if (!this.parsed) {
      this.parsed = { value: parseBody(this.text) };
    }
    return this.parsed.value;
  }
}

export function parseBody(text: string): JsonValue {
  if (text.trim() === '') {
    return null;
  }

  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch {
    return text;
  }
}
