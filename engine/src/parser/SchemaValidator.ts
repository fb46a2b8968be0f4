/**
 * Schema Validator
 *
 * Validates raw playbook documents against the zod schema and turns zod
 * issues into a ConfigurationError listing every offending path.
 *
 * @module parser
 */

import { ConfigurationError } from '../errors/index.js';
import type { PlaybookConfig } from '../types/core-types.js';
import { PlaybookSchema } from './PlaybookSchema.js';

export class SchemaValidator {
  /**
   * Validate a parsed YAML/JSON document
   *
   * @param source - Name used in error messages (usually the file path)
   * @throws {ConfigurationError} If validation fails
   */
  static validate(rawPlaybook: unknown, source = 'playbook'): PlaybookConfig {
    if (rawPlaybook === null || typeof rawPlaybook !== 'object' || Array.isArray(rawPlaybook)) {
      throw new ConfigurationError({
        message: `Invalid ${source}: expected a mapping at the document root`,
        path: '(root)',
      });
    }

    const result = PlaybookSchema.safeParse(rawPlaybook);
    if (!result.success) {
      throw ConfigurationError.fromIssues(result.error.issues, source);
    }

    return result.data;
  }

  /**
   * Validate without throwing
   */
  static check(rawPlaybook: unknown): { valid: true; playbook: PlaybookConfig } | { valid: false; error: ConfigurationError } {
    try {
      return { valid: true, playbook: this.validate(rawPlaybook) };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return { valid: false, error };
      }
      throw error;
    }
  }
}
