/**
 * Variable Manager
 *
 * The run-scoped variable store: one flat name to JSON value mapping, the
 * only channel through which steps, iterations and phases pass data, and
 * the only state that survives a checkpoint round-trip.
 *
 * Every mutation completes synchronously, so concurrent iterations never
 * interleave inside a single write. Appends cannot lose items; competing
 * replace writes to one name resolve last-completion-wins.
 *
 * @module context
 */

import jsonata from 'jsonata';
import type { EngineLogger } from '../core/EngineLogger.js';
import { VariableExtractionError } from '../errors/index.js';
import type { JsonValue, StoreConfig, Variables } from '../types/core-types.js';
import { toJsonValue } from './TemplateRenderer.js';

export class VariableManager {
  private variables: Variables = {};
  private readonly queries = new Map<string, jsonata.Expression>();

  constructor(private readonly logger: EngineLogger) {}

  set(name: string, value: JsonValue): void {
    this.variables[name] = value;
  }

  get(name: string): JsonValue | undefined {
    return this.has(name) ? this.variables[name] : undefined;
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.variables, name);
  }

  /**
   * A copy of every variable
   */
  getAll(): Variables {
    return structuredClone(this.variables);
  }

  /**
   * Replace the whole store (used when restoring a checkpoint)
   */
  setAll(variables: Variables): void {
    this.variables = structuredClone(variables);
  }

  clear(): void {
    this.variables = {};
  }

  /**
   * Replace `name`, or with `append` add to it. A scalar already stored
   * under `name` becomes the first element of a new list.
   */
  store(name: string, value: JsonValue, append: boolean): void {
    if (!append) {
      this.set(name, value);
      return;
    }

    const current = this.get(name);
    if (current === undefined) {
      this.set(name, [value]);
    } else if (Array.isArray(current)) {
      this.set(name, [...current, value]);
    } else {
      this.set(name, [current, value]);
    }
  }

  /**
   * Run each store config's query against `body` and store the result.
   * Store configs must already be rendered.
   *
   * @returns The stored values, by variable name
   * @throws {VariableExtractionError} when a query fails; the body is attached
   */
  async storeResponseData(storeConfigs: readonly StoreConfig[], body: JsonValue): Promise<Record<string, JsonValue>> {
    const stored: Record<string, JsonValue> = {};

    for (const config of storeConfigs) {
      const value = await this.extract(config, body);
      this.store(config.var, value, config.append);
      stored[config.var] = value;
      this.logger.debug(`Stored variable "${config.var}"`, {
        query: config.query,
        append: config.append,
      });
    }

    return stored;
  }

  private async extract(config: StoreConfig, body: JsonValue): Promise<JsonValue> {
    if (!config.query) {
      return structuredClone(body);
    }

    try {
      const result: unknown = await this.compileQuery(config.query).evaluate(body);
      return result === undefined ? null : toJsonValue(result);
    } catch (error) {
      const failure = new VariableExtractionError(config.var, config.query, body, error);
      this.logger.error(failure.message, undefined, { body: failure.bodyPreview });
      throw failure;
    }
  }

  private compileQuery(query: string): jsonata.Expression {
    let expression = this.queries.get(query);
    if (!expression) {
      expression = jsonata(query);
      this.queries.set(query, expression);
    }
    return expression;
  }
}
