/**
 * Config Renderer
 *
 * Produces fresh rendered values from read-only step and session configs.
 * Nothing here mutates a config; each iteration renders its own copy.
 *
 * @module context
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigurationError, errorMessage } from '../errors/index.js';
import type { HttpRequestSpec } from '../http/HttpRequestBuilder.js';
import type {
  AuthConfig,
  JsonPrimitive,
  JsonValue,
  RequestConfig,
  SessionConfig,
  StoreConfig,
} from '../types/core-types.js';
import type { TemplateContext, TemplateRenderer } from './TemplateRenderer.js';

export interface ConfigRendererOptions {
  /** Base directory for `fromFile` paths (default: process.cwd()) */
  cwd?: string;
}

export class ConfigRenderer {
  private readonly cwd: string;

  constructor(
    private readonly renderer: TemplateRenderer,
    options: ConfigRendererOptions = {}
  ) {
    this.cwd = options.cwd ?? process.cwd();
  }

  async renderRequest(request: RequestConfig, context: TemplateContext): Promise<HttpRequestSpec> {
    const json = request.fromFile !== undefined
      ? await this.loadRequestData(request.fromFile, context)
      : request.data !== undefined
        ? this.renderer.renderValue(request.data, context)
        : undefined;

    return {
      method: request.method,
      endpoint: this.renderer.render(request.endpoint, context),
      json,
      params: request.params ? this.renderParams(request.params, context) : undefined,
      headers: request.headers ? this.renderer.renderStrings(request.headers, context) : undefined,
    };
  }

  renderStore(store: StoreConfig, context: TemplateContext): StoreConfig {
    return {
      var: this.renderer.render(store.var, context),
      query: store.query !== undefined ? this.renderer.render(store.query, context) : undefined,
      append: store.append,
    };
  }

  renderSession(session: SessionConfig, context: TemplateContext): SessionConfig {
    return {
      ...session,
      baseUrl: this.renderer.render(session.baseUrl, context),
      headers: this.renderer.renderStrings(session.headers, context),
      auth: session.auth ? this.renderAuth(session.auth, context) : undefined,
    };
  }

  private renderAuth(auth: AuthConfig, context: TemplateContext): AuthConfig {
    return {
      type: auth.type,
      options: this.renderer.renderDict(auth.options, context),
    };
  }

  private renderParams(
    params: Readonly<Record<string, JsonPrimitive>>,
    context: TemplateContext
  ): Record<string, JsonPrimitive> {
    const result: Record<string, JsonPrimitive> = {};
    for (const [key, value] of Object.entries(params)) {
      result[key] = typeof value === 'string' ? this.renderer.render(value, context) : value;
    }
    return result;
  }

  /**
   * Read a JSON request body from disk, then render it
   */
  private async loadRequestData(fromFile: string, context: TemplateContext): Promise<JsonValue> {
    const relativePath = this.renderer.render(fromFile, context);
    const filePath = resolve(this.cwd, relativePath);
    if (!existsSync(filePath)) {
      throw ConfigurationError.fileNotFound(relativePath, 'Request data file');
    }

    const content = await readFile(filePath, 'utf-8');
    let data: JsonValue;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError({
        message: `Invalid JSON in request data file: ${relativePath} (${errorMessage(error)})`,
        context: { filePath },
        cause: error,
      });
    }
    return this.renderer.renderValue(data, context);
  }
}
