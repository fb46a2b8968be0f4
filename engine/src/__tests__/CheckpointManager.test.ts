import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CheckpointManager,
  shouldRestartParallelPhase,
  shouldSkipPhase,
  shouldSkipStep,
  stableStringify,
} from '../checkpoint/CheckpointManager.js';
import type { CheckpointData, CheckpointStore } from '../checkpoint/CheckpointStore.js';
import { FileCheckpointStore } from '../checkpoint/FileCheckpointStore.js';
import { PlaybookLoader } from '../loader/PlaybookLoader.js';
import type { PlaybookConfig } from '../types/core-types.js';
import { capturingLogger } from './fakes.js';

// ── Helpers ────────────────────────────────────────────────────────────

const FIXED_NOW = new Date('2026-04-01T08:00:00.000Z');

function makePlaybook(endpoint = '/ping', incremental: Record<string, unknown> = {}): PlaybookConfig {
  return PlaybookLoader.fromObject({
    phases: [{ name: 'setup', steps: [{ session: 'api', request: { endpoint } }] }],
    incremental,
  });
}

class MemoryCheckpointStore implements CheckpointStore {
  readonly records = new Map<string, CheckpointData>();
  failSave = false;

  async save(data: CheckpointData): Promise<void> {
    if (this.failSave) {
      throw new Error('disk full');
    }
    this.records.set(data.contentHash, data);
  }

  async load(contentHash: string): Promise<CheckpointData | null> {
    return this.records.get(contentHash) ?? null;
  }

  async clear(contentHash: string): Promise<void> {
    this.records.delete(contentHash);
  }
}

// ── Skip rules ─────────────────────────────────────────────────────────

describe('skip rules', () => {
  const checkpoint = { currentPhase: 1, currentStep: 2 };

  it('skips phases before the checkpoint phase', () => {
    expect(shouldSkipPhase(0, checkpoint)).toBe(true);
    expect(shouldSkipPhase(1, checkpoint)).toBe(false);
    expect(shouldSkipPhase(2, checkpoint)).toBe(false);
    expect(shouldSkipPhase(0, null)).toBe(false);
  });

  it('skips steps up to and including the checkpoint step', () => {
    expect(shouldSkipStep(1, 2, checkpoint)).toBe(true);
    expect(shouldSkipStep(1, 0, checkpoint)).toBe(true);
    expect(shouldSkipStep(1, 3, checkpoint)).toBe(false);
    expect(shouldSkipStep(2, 0, checkpoint)).toBe(false);
    expect(shouldSkipStep(1, 0, null)).toBe(false);
  });

  it('restarts a parallel phase at the checkpoint phase', () => {
    expect(shouldRestartParallelPhase(1, checkpoint)).toBe(true);
    expect(shouldRestartParallelPhase(2, checkpoint)).toBe(false);
    expect(shouldRestartParallelPhase(1, null)).toBe(false);
  });
});

// ── Fingerprint ────────────────────────────────────────────────────────

describe('CheckpointManager.fingerprint', () => {
  it('is a stable md5 digest', () => {
    const hash = CheckpointManager.fingerprint(makePlaybook());
    expect(hash).toMatch(/^[0-9a-f]{32}$/);
    expect(CheckpointManager.fingerprint(makePlaybook())).toBe(hash);
  });

  it('ignores the incremental block', () => {
    const plain = makePlaybook('/ping');
    const incremental = makePlaybook('/ping', { enabled: true, store: 'file', file_path: '.checkpoints' });
    expect(CheckpointManager.fingerprint(incremental)).toBe(CheckpointManager.fingerprint(plain));
  });

  it('changes with any other edit', () => {
    expect(CheckpointManager.fingerprint(makePlaybook('/pong'))).not.toBe(
      CheckpointManager.fingerprint(makePlaybook('/ping'))
    );
  });

  it('serializes with sorted keys and without undefined members', () => {
    expect(stableStringify({ b: 1, a: { d: [2, undefined], c: undefined } })).toBe('{"a":{"d":[2,null]},"b":1}');
  });
});

// ── Manager ────────────────────────────────────────────────────────────

describe('CheckpointManager', () => {
  let store: MemoryCheckpointStore;
  let lines: string[];
  let manager: CheckpointManager;

  beforeEach(() => {
    store = new MemoryCheckpointStore();
    const captured = capturingLogger();
    lines = captured.lines;
    manager = new CheckpointManager(makePlaybook(), store, captured.logger, () => FIXED_NOW);
  });

  it('does not save at the very first step', async () => {
    await manager.save(0, 0, { a: 1 });
    expect(store.records.size).toBe(0);
  });

  it('round-trips a snapshot', async () => {
    await manager.save(1, 2, { a: 1 });

    expect(await manager.load()).toEqual({
      currentPhase: 1,
      currentStep: 2,
      variables: { a: 1 },
      contentHash: manager.contentHash,
      timestamp: '2026-04-01T08:00:00.000Z',
    });
  });

  it('snapshots variables instead of keeping a reference', async () => {
    const variables = { ids: [1] };
    await manager.save(0, 1, variables);
    variables.ids.push(2);

    expect((await manager.load())?.variables).toEqual({ ids: [1] });
  });

  it('ignores a checkpoint written for another playbook revision', async () => {
    store.records.set(manager.contentHash, {
      currentPhase: 1,
      currentStep: 0,
      variables: {},
      contentHash: 'something-else',
      timestamp: FIXED_NOW.toISOString(),
    });

    expect(await manager.load()).toBeNull();
  });

  it('clears the checkpoint', async () => {
    await manager.save(1, 0, {});
    await manager.clear();
    expect(await manager.load()).toBeNull();
  });

  it('logs and swallows store failures', async () => {
    store.failSave = true;

    await expect(manager.save(1, 0, {})).resolves.toBeUndefined();
    expect(lines.some((line) => line.includes('Failed to save checkpoint: disk full'))).toBe(true);
  });

  it('does nothing without a store', async () => {
    const disabled = new CheckpointManager(makePlaybook(), null, capturingLogger().logger);
    await disabled.save(1, 1, { a: 1 });

    expect(disabled.enabled).toBe(false);
    expect(await disabled.load()).toBeNull();
  });
});

// ── File store ─────────────────────────────────────────────────────────

describe('FileCheckpointStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'checkpoints-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function makeManager(playbook: PlaybookConfig = makePlaybook()): CheckpointManager {
    const { logger } = capturingLogger();
    return new CheckpointManager(playbook, new FileCheckpointStore(join(dir, 'nested'), logger), logger, () => FIXED_NOW);
  }

  it('writes one snake_case document per fingerprint', async () => {
    const manager = makeManager();
    await manager.save(1, 2, { a: 1 });

    const path = join(dir, 'nested', `${manager.contentHash}.json`);
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual({
      current_phase: 1,
      current_step: 2,
      variables: { a: 1 },
      content_hash: manager.contentHash,
      timestamp: '2026-04-01T08:00:00.000Z',
    });
  });

  it('loads the snapshot back with a fresh manager', async () => {
    await makeManager().save(1, 2, { a: 1 });

    const loaded = await makeManager().load();
    expect(loaded?.currentPhase).toBe(1);
    expect(loaded?.currentStep).toBe(2);
    expect(loaded?.variables).toEqual({ a: 1 });
  });

  it('finds nothing for a different fingerprint', async () => {
    await makeManager().save(1, 2, { a: 1 });
    expect(await makeManager(makePlaybook('/changed')).load()).toBeNull();
  });

  it('ignores malformed and mismatched documents', async () => {
    const store = new FileCheckpointStore(dir, capturingLogger().logger);
    await writeFile(store.pathFor('broken'), '{"current_phase": "one"}');
    await writeFile(
      store.pathFor('renamed'),
      JSON.stringify({ current_phase: 1, current_step: 0, variables: {}, content_hash: 'other', timestamp: 'x' })
    );

    expect(await store.load('broken')).toBeNull();
    expect(await store.load('renamed')).toBeNull();
  });

  it('removes the document on clear', async () => {
    const manager = makeManager();
    await manager.save(0, 1, {});
    await manager.clear();

    expect(existsSync(join(dir, 'nested', `${manager.contentHash}.json`))).toBe(false);
  });
});
