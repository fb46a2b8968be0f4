import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigRenderer } from '../context/ConfigRenderer.js';
import { TemplateRenderer } from '../context/TemplateRenderer.js';
import { sessionConfig } from '../session/Session.js';
import type { RequestConfig } from '../types/core-types.js';

describe('ConfigRenderer', () => {
  let dir: string;
  let renderer: ConfigRenderer;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-renderer-'));
    await writeFile(join(dir, 'body.json'), '{"user": "{{ name }}", "id": "{{ id }}"}');
    await writeFile(join(dir, 'bad.json'), '{nope');
    renderer = new ConfigRenderer(new TemplateRenderer({ env: {} }), { cwd: dir });
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('renders every part of a request without touching the config', async () => {
    const request: RequestConfig = {
      method: 'POST',
      endpoint: '/users/{{ id }}',
      data: { name: '{{ name }}', id: '{{ id }}' },
      params: { page: '{{ page }}', limit: 10 },
      headers: { 'X-Trace': '{{ trace }}' },
    };

    const spec = await renderer.renderRequest(request, { id: 5, name: 'Ada', page: 2, trace: 't-1' });

    expect(spec).toEqual({
      method: 'POST',
      endpoint: '/users/5',
      json: { name: 'Ada', id: 5 },
      params: { page: '2', limit: 10 },
      headers: { 'X-Trace': 't-1' },
    });
    expect(request.endpoint).toBe('/users/{{ id }}');
    expect(request.data).toEqual({ name: '{{ name }}', id: '{{ id }}' });
  });

  it('loads and renders the body from a file', async () => {
    const spec = await renderer.renderRequest(
      { method: 'PUT', endpoint: '/users', fromFile: '{{ file }}' },
      { file: 'body.json', name: 'Ada', id: 7 }
    );
    expect(spec.json).toEqual({ user: 'Ada', id: 7 });
  });

  it('reports a missing body file', async () => {
    await expect(
      renderer.renderRequest({ method: 'POST', endpoint: '/users', fromFile: 'missing.json' }, {})
    ).rejects.toThrow('Request data file not found: missing.json');
  });

  it('reports a body file that is not JSON', async () => {
    await expect(
      renderer.renderRequest({ method: 'POST', endpoint: '/users', fromFile: 'bad.json' }, {})
    ).rejects.toThrow(/^Invalid JSON in request data file: bad\.json \(/);
  });

  it('renders store targets and queries', () => {
    expect(renderer.renderStore({ var: 'user_{{ i }}', query: 'items[{{ i }}]', append: false }, { i: 1 })).toEqual({
      var: 'user_1',
      query: 'items[1]',
      append: false,
    });
  });

  it('renders session base URL, headers and auth options', () => {
    const session = sessionConfig('https://{{ host }}', {
      headers: { 'X-Key': '{{ key }}' },
      auth: { type: 'bearer', options: { token: '{{ token }}' } },
    });

    const rendered = renderer.renderSession(session, { host: 'api.test', key: 'test-key', token: 'test-token' });

    expect(rendered.baseUrl).toBe('https://api.test');
    expect(rendered.headers).toEqual({ 'X-Key': 'test-key' });
    expect(rendered.auth).toEqual({ type: 'bearer', options: { token: 'test-token' } });
    expect(session.baseUrl).toBe('https://{{ host }}');
  });
});
