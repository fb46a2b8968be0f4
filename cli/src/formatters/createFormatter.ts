/**
 * Formatter Factory
 *
 * The single point where formatters are instantiated.
 */

import type { Formatter, FormatterOptions } from './Formatter.js';
import { HumanFormatter } from './HumanFormatter.js';
import { JsonFormatter } from './JsonFormatter.js';
import { NullFormatter } from './NullFormatter.js';

export const FORMATTER_TYPES = ['human', 'json', 'null'] as const;

export type FormatterType = (typeof FORMATTER_TYPES)[number];

export function isFormatterType(value: string): value is FormatterType {
  return FORMATTER_TYPES.some((type) => type === value);
}

/**
 * Create a formatter instance
 *
 * @example
 * ```ts
 * const formatter = createFormatter('human', { noColor: true });
 * await engine.execute(playbook, sessions); // with { observers: [formatter] }
 * ```
 */
export function createFormatter(type: FormatterType = 'human', options: FormatterOptions = {}): Formatter {
  switch (type) {
    case 'human':
      return new HumanFormatter(options);
    case 'json':
      return new JsonFormatter(options);
    case 'null':
      return new NullFormatter();
    default: {
      const exhaustiveCheck: never = type;
      throw new Error(`Unhandled formatter type: ${String(exhaustiveCheck)}`);
    }
  }
}
