/**
 * Template Renderer
 *
 * Renders `{{ expression }}` templates against the variable store.
 *
 * Syntax:
 * - Paths: `{{ user.id }}`, `{{ items[0].name }}`, `{{ items.0 }}`
 * - Environment: `{{ env.API_TOKEN }}` (only referenced names are injected)
 * - Default values: `{{ page || 1 }}`, `{{ token || env.TOKEN || "anon" }}`
 * - Filters: `{{ ids | tojson }}`, `{{ name | upper }}`, `{{ items | length }}`,
 *   `{{ cursor | default("") }}`
 * - Built-in functions: `{{ now() }}`, `{{ uuid() }}`, `{{ timestamp() }}`
 *
 * `render()` always yields a string. `renderValue()` is type-aware: a string
 * that is exactly one expression keeps the expression's JSON type, so
 * `"{{ id }}"` renders to `42`, not `"42"`. Undefined values render as `""`.
 *
 * Compiled templates are cached by source text. Rendering never mutates its
 * inputs.
 *
 * @module context
 */

import { randomUUID } from 'node:crypto';
import { TemplateRenderError } from '../errors/index.js';
import type { JsonObject, JsonValue } from '../types/core-types.js';

export type TemplateContext = Readonly<Record<string, unknown>>;

type PathSegment = string | number;

type Operand =
  | { kind: 'path'; root: string; path: PathSegment[] }
  | { kind: 'literal'; value: JsonValue }
  | { kind: 'call'; name: BuiltinName };

interface Filter {
  name: FilterName;
  arg?: JsonValue;
}

interface Expression {
  alternatives: Operand[];
  filters: Filter[];
}

type Segment = { kind: 'text'; text: string } | { kind: 'expr'; expression: Expression };

interface CompiledTemplate {
  segments: Segment[];
  /** Names referenced as `env.NAME` */
  envNames: string[];
  /** The template is exactly one `{{ }}` block */
  single: boolean;
}

const BUILTINS = ['now', 'uuid', 'timestamp'] as const;
type BuiltinName = (typeof BUILTINS)[number];

const FILTERS = ['tojson', 'upper', 'lower', 'length', 'default'] as const;
type FilterName = (typeof FILTERS)[number];

export interface TemplateRendererOptions {
  /** Environment source for `env.NAME` (default: process.env) */
  env?: Readonly<Record<string, string | undefined>>;
}

export class TemplateRenderer {
  private readonly cache = new Map<string, CompiledTemplate>();
  private readonly env: Readonly<Record<string, string | undefined>>;

  constructor(options: TemplateRendererOptions = {}) {
    this.env = options.env ?? process.env;
  }

  /**
   * Whether a string contains template markup
   */
  static hasTemplates(value: string): boolean {
    return value.includes('{{');
  }

  /**
   * Render a template to a string
   */
  render(template: string, context: TemplateContext): string {
    if (!TemplateRenderer.hasTemplates(template)) {
      return template;
    }
    const compiled = this.compile(template);
    const scope = this.withEnv(compiled, context);
    return compiled.segments
      .map((segment) => (segment.kind === 'text' ? segment.text : stringify(this.evaluate(segment.expression, scope))))
      .join('');
  }

  /**
   * Render any JSON value; single-expression strings keep their type
   */
  renderValue(value: JsonValue, context: TemplateContext): JsonValue {
    if (typeof value === 'string') {
      if (!TemplateRenderer.hasTemplates(value)) {
        return value;
      }
      const compiled = this.compile(value);
      const [first] = compiled.segments;
      if (compiled.single && first.kind === 'expr') {
        const result = this.evaluate(first.expression, this.withEnv(compiled, context));
        return result === undefined ? '' : toJsonValue(result);
      }
      return this.render(value, context);
    }
    if (Array.isArray(value)) {
      return this.renderList(value, context);
    }
    if (value !== null && typeof value === 'object') {
      return this.renderDict(value, context);
    }
    return value;
  }

  renderDict(value: Readonly<JsonObject>, context: TemplateContext): JsonObject {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = this.renderValue(entry, context);
    }
    return result;
  }

  renderList(value: readonly JsonValue[], context: TemplateContext): JsonValue[] {
    return value.map((entry) => this.renderValue(entry, context));
  }

  /**
   * Render every value of a string map to strings
   */
  renderStrings(value: Readonly<Record<string, string>>, context: TemplateContext): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = this.render(entry, context);
    }
    return result;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private compile(template: string): CompiledTemplate {
    const cached = this.cache.get(template);
    if (cached) {
      return cached;
    }

    const segments: Segment[] = [];
    const envNames = new Set<string>();
    let cursor = 0;

    while (cursor < template.length) {
      const open = template.indexOf('{{', cursor);
      if (open === -1) {
        segments.push({ kind: 'text', text: template.slice(cursor) });
        break;
      }
      if (open > cursor) {
        segments.push({ kind: 'text', text: template.slice(cursor, open) });
      }
      const close = template.indexOf('}}', open + 2);
      if (close === -1) {
        throw new TemplateRenderError(template, 'unclosed "{{"');
      }
      const source = template.slice(open + 2, close).trim();
      if (source === '') {
        throw new TemplateRenderError(template, 'empty expression');
      }
      const expression = parseExpression(source, template);
      for (const operand of expression.alternatives) {
        if (operand.kind === 'path' && operand.root === 'env' && typeof operand.path[0] === 'string') {
          envNames.add(operand.path[0]);
        }
      }
      segments.push({ kind: 'expr', expression });
      cursor = close + 2;
    }

    const compiled: CompiledTemplate = {
      segments,
      envNames: [...envNames],
      single: segments.length === 1 && segments[0].kind === 'expr',
    };
    this.cache.set(template, compiled);
    return compiled;
  }

  private withEnv(compiled: CompiledTemplate, context: TemplateContext): TemplateContext {
    if (compiled.envNames.length === 0) {
      return context;
    }
    const existing = context['env'];
    const env: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
    for (const name of compiled.envNames) {
      const value = this.env[name];
      if (value !== undefined) {
        env[name] = value;
      }
    }
    return { ...context, env };
  }

  private evaluate(expression: Expression, context: TemplateContext): unknown {
    let value: unknown;
    for (const operand of expression.alternatives) {
      value = evaluateOperand(operand, context);
      if (value !== undefined && value !== null && value !== '') {
        break;
      }
    }
    return expression.filters.reduce((current, filter) => applyFilter(filter, current), value);
  }
}

function evaluateOperand(operand: Operand, context: TemplateContext): unknown {
  switch (operand.kind) {
    case 'literal':
      return operand.value;
    case 'call':
      return callBuiltin(operand.name);
    case 'path': {
      let current: unknown = Object.prototype.hasOwnProperty.call(context, operand.root)
        ? context[operand.root]
        : undefined;
      for (const segment of operand.path) {
        if (Array.isArray(current)) {
          const index = typeof segment === 'number' ? segment : /^\d+$/.test(segment) ? Number(segment) : NaN;
          const next: unknown = current[index];
          current = next;
        } else if (isRecord(current)) {
          current = Object.prototype.hasOwnProperty.call(current, segment) ? current[String(segment)] : undefined;
        } else {
          return undefined;
        }
      }
      return current;
    }
  }
}

function callBuiltin(name: BuiltinName): JsonValue {
  switch (name) {
    case 'now':
      return new Date().toISOString();
    case 'uuid':
      return randomUUID();
    case 'timestamp':
      return Date.now();
  }
}

function applyFilter(filter: Filter, value: unknown): unknown {
  switch (filter.name) {
    case 'tojson':
      return JSON.stringify(value === undefined ? null : value);
    case 'upper':
      return stringify(value).toUpperCase();
    case 'lower':
      return stringify(value).toLowerCase();
    case 'length':
      if (typeof value === 'string' || Array.isArray(value)) return value.length;
      if (isRecord(value)) return Object.keys(value).length;
      return 0;
    case 'default':
      return value === undefined || value === null || value === '' ? filter.arg ?? '' : value;
  }
}

// ============================================================================
// Expression parsing
// ============================================================================

function parseExpression(source: string, template: string): Expression {
  const [head, ...filterSources] = splitTopLevel(source, 'filter');
  const alternatives = splitTopLevel(head, 'default').map((part) => parseOperand(part.trim(), template));
  const filters = filterSources.map((part) => parseFilter(part.trim(), template));
  return { alternatives, filters };
}

/**
 * Split on `|` (filters) or `||` (defaults) outside string literals
 */
function splitTopLevel(source: string, mode: 'filter' | 'default'): string[] {
  const parts: string[] = [];
  let current = '';
  let quote: string | undefined;

  for (let i = 0; i < source.length; i++) {
    const char = source[i];
    if (quote) {
      current += char;
      if (char === quote) quote = undefined;
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
      current += char;
      continue;
    }
    if (char === '|') {
      const isDouble = source[i + 1] === '|';
      if (isDouble && mode === 'default') {
        parts.push(current);
        current = '';
        i++;
        continue;
      }
      if (isDouble) {
        current += '||';
        i++;
        continue;
      }
      if (mode === 'filter') {
        parts.push(current);
        current = '';
        continue;
      }
    }
    current += char;
  }
  parts.push(current);
  return parts;
}

function parseLiteral(source: string): { value: JsonValue } | undefined {
  if (/^(['"]).*\1$/s.test(source)) return { value: source.slice(1, -1) };
  if (/^-?\d+(\.\d+)?$/.test(source)) return { value: Number(source) };
  if (source === 'true') return { value: true };
  if (source === 'false') return { value: false };
  if (source === 'null' || source === 'none' || source === 'None') return { value: null };
  return undefined;
}

function parseOperand(source: string, template: string): Operand {
  const literal = parseLiteral(source);
  if (literal) {
    return { kind: 'literal', value: literal.value };
  }

  const call = /^([A-Za-z_]\w*)\(\)$/.exec(source);
  if (call) {
    const name = BUILTINS.find((builtin) => builtin === call[1]);
    if (!name) {
      throw new TemplateRenderError(template, `unknown function "${call[1]}()"; available: ${BUILTINS.join(', ')}`);
    }
    return { kind: 'call', name };
  }

  const path = parsePath(source);
  if (!path) {
    throw new TemplateRenderError(template, `unsupported expression "${source}"`);
  }
  return { kind: 'path', root: path.root, path: path.segments };
}

function parsePath(source: string): { root: string; segments: PathSegment[] } | undefined {
  const rootMatch = /^[A-Za-z_]\w*/.exec(source);
  if (!rootMatch) return undefined;

  const segments: PathSegment[] = [];
  let rest = source.slice(rootMatch[0].length);
  const segmentPattern = /^(?:\.([A-Za-z0-9_-]+)|\[(\d+)\]|\[(['"])(.*?)\3\])/;

  while (rest.length > 0) {
    const match = segmentPattern.exec(rest);
    if (!match) return undefined;
    if (match[1] !== undefined) segments.push(match[1]);
    else if (match[2] !== undefined) segments.push(Number(match[2]));
    else segments.push(match[4]);
    rest = rest.slice(match[0].length);
  }

  return { root: rootMatch[0], segments };
}

function parseFilter(source: string, template: string): Filter {
  const match = /^([A-Za-z_]\w*)(?:\((.*)\))?$/s.exec(source);
  const name = match ? FILTERS.find((filter) => filter === match[1]) : undefined;
  if (!match || !name) {
    throw new TemplateRenderError(template, `unknown filter "${source}"; available: ${FILTERS.join(', ')}`);
  }
  if (match[2] === undefined || match[2].trim() === '') {
    return { name };
  }
  const arg = parseLiteral(match[2].trim());
  if (!arg) {
    throw new TemplateRenderError(template, `filter "${name}" takes a literal argument`);
  }
  return { name, arg: arg.value };
}

// ============================================================================
// Value helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Narrow an evaluated value to JSON; anything else becomes its string form
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map((entry) => toJsonValue(entry ?? null));
  if (isRecord(value)) {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) result[key] = toJsonValue(entry);
    }
    return result;
  }
  return value === undefined ? null : String(value);
}
