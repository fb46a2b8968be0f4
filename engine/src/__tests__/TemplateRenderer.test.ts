import { describe, it, expect, afterEach, vi } from 'vitest';
import { TemplateRenderer } from '../context/TemplateRenderer.js';
import { TemplateRenderError } from '../errors/index.js';

describe('TemplateRenderer', () => {
  const renderer = new TemplateRenderer({ env: {} });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ── Paths ──────────────────────────────────────────────────────────

  describe('paths', () => {
    it('renders nested paths and indexes', () => {
      const context = { user: { name: 'Ada' }, items: [{ name: 'first' }, 'second'] };

      expect(renderer.render('Hello {{ user.name }}!', context)).toBe('Hello Ada!');
      expect(renderer.render('{{ items[0].name }}/{{ items.1 }}', context)).toBe('first/second');
    });

    it('renders undefined paths as empty strings', () => {
      expect(renderer.render('id={{ missing.deep }}', {})).toBe('id=');
      expect(renderer.render('{{ name.first }}', { name: 'Ada' })).toBe('');
    });

    it('leaves strings without markup untouched', () => {
      const fresh = new TemplateRenderer({ env: {} });
      expect(fresh.render('plain text', {})).toBe('plain text');
      expect(fresh.cacheSize).toBe(0);
    });
  });

  // ── Types ──────────────────────────────────────────────────────────

  describe('renderValue', () => {
    it('keeps the type of a single expression', () => {
      const context = { id: 42, flag: true, tags: ['a', 'b'] };

      expect(renderer.renderValue('{{ id }}', context)).toBe(42);
      expect(renderer.renderValue('{{ flag }}', context)).toBe(true);
      expect(renderer.renderValue('{{ tags }}', context)).toEqual(['a', 'b']);
      expect(renderer.renderValue('id-{{ id }}', context)).toBe('id-42');
    });

    it('renders undefined single expressions as empty strings', () => {
      expect(renderer.renderValue('{{ missing }}', {})).toBe('');
    });

    it('renders nested structures without mutating them', () => {
      const template = { a: '{{ n }}', b: ['{{ flag }}', 'x'], c: null };
      const result = renderer.renderValue(template, { n: 1, flag: false });

      expect(result).toEqual({ a: 1, b: [false, 'x'], c: null });
      expect(template).toEqual({ a: '{{ n }}', b: ['{{ flag }}', 'x'], c: null });
    });

    it('stringifies objects inside larger strings', () => {
      expect(renderer.render('ids: {{ ids }}', { ids: [1, 2] })).toBe('ids: [1,2]');
    });
  });

  // ── Defaults & filters ─────────────────────────────────────────────

  describe('defaults and filters', () => {
    it('takes the first non-empty alternative', () => {
      expect(renderer.renderValue('{{ page || 1 }}', {})).toBe(1);
      expect(renderer.renderValue('{{ page || 1 }}', { page: 3 })).toBe(3);
      expect(renderer.renderValue('{{ name || "anon" }}', { name: '' })).toBe('anon');
    });

    it('applies filters in order', () => {
      const context = { ids: [1, 2], name: 'Ada', items: ['a', 'b', 'c'], meta: { a: 1, b: 2 } };

      expect(renderer.renderValue('{{ ids | tojson }}', context)).toBe('[1,2]');
      expect(renderer.render('{{ name | upper }}', context)).toBe('ADA');
      expect(renderer.render('{{ name | lower }}', context)).toBe('ada');
      expect(renderer.renderValue('{{ items | length }}', context)).toBe(3);
      expect(renderer.renderValue('{{ meta | length }}', context)).toBe(2);
      expect(renderer.render('{{ name | lower | upper }}', context)).toBe('ADA');
    });

    it('supports default() with a literal argument', () => {
      expect(renderer.render('{{ cursor | default("start") }}', {})).toBe('start');
      expect(renderer.render('{{ cursor | default("start") }}', { cursor: null })).toBe('start');
      expect(renderer.render('{{ cursor | default("start") }}', { cursor: 'abc' })).toBe('abc');
    });

    it('does not split on pipes inside string literals', () => {
      expect(renderer.render('{{ sep || "a|b" }}', {})).toBe('a|b');
    });
  });

  // ── Environment ────────────────────────────────────────────────────

  describe('environment', () => {
    it('injects only referenced environment variables', () => {
      const withEnv = new TemplateRenderer({ env: { API_HOST: 'api.test', TOKEN: 'test-secret' } });

      expect(withEnv.render('https://{{ env.API_HOST }}/v1', {})).toBe('https://api.test/v1');
      expect(withEnv.render('{{ token || env.TOKEN || "anon" }}', {})).toBe('test-secret');
      expect(withEnv.render('{{ env.MISSING || "none" }}', {})).toBe('none');
    });
  });

  // ── Built-ins ──────────────────────────────────────────────────────

  describe('built-in functions', () => {
    it('renders now() and timestamp() from the clock', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));

      expect(renderer.render('{{ now() }}', {})).toBe('2026-01-02T03:04:05.000Z');
      expect(renderer.renderValue('{{ timestamp() }}', {})).toBe(Date.parse('2026-01-02T03:04:05.000Z'));
    });

    it('renders uuid() as a fresh v4 UUID', () => {
      const first = renderer.render('{{ uuid() }}', {});
      const second = renderer.render('{{ uuid() }}', {});

      expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(second).not.toBe(first);
    });
  });

  // ── Errors ─────────────────────────────────────────────────────────

  describe('errors', () => {
    it('rejects unknown filters', () => {
      expect(() => renderer.render('{{ name | shout }}', {})).toThrow(TemplateRenderError);
      expect(() => renderer.render('{{ name | shout }}', {})).toThrow(
        'Cannot render template "{{ name | shout }}": unknown filter "shout"; available: tojson, upper, lower, length, default'
      );
    });

    it('rejects unknown functions', () => {
      expect(() => renderer.render('{{ random() }}', {})).toThrow(
        'unknown function "random()"; available: now, uuid, timestamp'
      );
    });

    it('rejects malformed markup', () => {
      expect(() => renderer.render('{{ name', {})).toThrow('unclosed "{{"');
      expect(() => renderer.render('{{ }}', {})).toThrow('empty expression');
      expect(() => renderer.render('{{ a + b }}', {})).toThrow('unsupported expression "a + b"');
    });
  });
});
