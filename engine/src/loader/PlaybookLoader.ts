/**
 * Playbook Loader
 *
 * Utility layer, not part of execution: reads playbook files, parses
 * YAML/JSON and validates the result. The engine itself never touches the
 * filesystem for the playbook.
 *
 * ```ts
 * const playbook = await PlaybookLoader.fromFile('./migrate.yaml');
 * await engine.execute(playbook, sessions);
 * ```
 *
 * @module loader
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors/index.js';
import { SessionSchema } from '../parser/PlaybookSchema.js';
import { SchemaValidator } from '../parser/SchemaValidator.js';
import type { PlaybookConfig, SessionConfig } from '../types/core-types.js';

const SessionsFileSchema = z.record(SessionSchema);

export class PlaybookLoader {
  /**
   * Load a playbook from a file path
   *
   * 1. Validate the file exists
   * 2. Read it
   * 3. Parse by extension (.yaml/.yml, .json; anything else tries YAML)
   * 4. Validate against the schema
   *
   * @throws {ConfigurationError} on a missing file, bad syntax or schema failure
   */
  static async fromFile(filePath: string): Promise<PlaybookConfig> {
    const resolvedPath = resolve(filePath);
    if (!existsSync(resolvedPath)) {
      throw ConfigurationError.fileNotFound(filePath, 'Playbook file');
    }

    let content: string;
    try {
      content = await readFile(resolvedPath, 'utf-8');
    } catch (error) {
      throw ConfigurationError.parseError(filePath, `cannot read file: ${errorMessage(error)}`, error);
    }

    const document = filePath.endsWith('.json')
      ? this.parseJSON(content, filePath)
      : this.parseYAML(content, filePath);

    return SchemaValidator.validate(document, filePath);
  }

  /**
   * Load a playbook from YAML text. JSON is valid YAML, so this also takes JSON.
   */
  static fromYAML(content: string, source = 'playbook'): PlaybookConfig {
    return SchemaValidator.validate(this.parseYAML(content, source), source);
  }

  /**
   * Load a playbook piped in as YAML or JSON, e.g. `process.stdin`
   */
  static async fromStream(input: AsyncIterable<string | Buffer>, source = '<stdin>'): Promise<PlaybookConfig> {
    const chunks: Buffer[] = [];
    try {
      for await (const chunk of input) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
      }
    } catch (error) {
      throw ConfigurationError.parseError(source, `cannot read input: ${errorMessage(error)}`, error);
    }
    return this.fromYAML(Buffer.concat(chunks).toString('utf-8'), source);
  }

  /**
   * Validate an already-parsed document
   */
  static fromObject(document: unknown, source = 'playbook'): PlaybookConfig {
    return SchemaValidator.validate(document, source);
  }

  /**
   * Load a map of session configs (same keys as a playbook's `sessions`
   * block) for hosts that keep sessions outside the playbook
   */
  static async sessionsFromFile(filePath: string): Promise<Record<string, SessionConfig>> {
    const resolvedPath = resolve(filePath);
    if (!existsSync(resolvedPath)) {
      throw ConfigurationError.fileNotFound(filePath, 'Sessions file');
    }
    const content = await readFile(resolvedPath, 'utf-8');
    const document = filePath.endsWith('.json')
      ? this.parseJSON(content, filePath)
      : this.parseYAML(content, filePath);

    const result = SessionsFileSchema.safeParse(document);
    if (!result.success) {
      throw ConfigurationError.fromIssues(result.error.issues, filePath);
    }
    return result.data;
  }

  private static parseYAML(content: string, source: string): unknown {
    const document = YAML.parseDocument(content);
    if (document.errors.length > 0) {
      const [first] = document.errors;
      throw ConfigurationError.parseError(source, first.message, first);
    }
    return document.toJS();
  }

  private static parseJSON(content: string, source: string): unknown {
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw ConfigurationError.parseError(source, errorMessage(error), error);
    }
  }
}
