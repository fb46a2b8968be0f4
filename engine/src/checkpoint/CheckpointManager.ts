/**
 * Checkpoint Manager
 *
 * Fingerprints the playbook and saves, loads and clears progress snapshots
 * through a CheckpointStore. Store failures are logged and swallowed: a
 * broken checkpoint store never fails a run.
 *
 * Resume semantics, for a checkpoint at (P, S):
 * - phases before P are skipped
 * - in sequential phase P, steps up to and including S are skipped
 * - parallel phase P restarts from scratch (parallel phases are atomic)
 *
 * @module checkpoint
 */

import { createHash } from 'node:crypto';
import type { EngineLogger } from '../core/EngineLogger.js';
import { errorMessage } from '../errors/index.js';
import type { PlaybookConfig, Variables } from '../types/core-types.js';
import type { CheckpointData, CheckpointStore } from './CheckpointStore.js';

/** The parts of a checkpoint the skip rules look at */
export type CheckpointPosition = Pick<CheckpointData, 'currentPhase' | 'currentStep'>;

export class CheckpointManager {
  readonly contentHash: string;

  constructor(
    config: PlaybookConfig,
    private readonly store: CheckpointStore | null,
    private readonly logger: EngineLogger,
    private readonly now: () => Date = () => new Date()
  ) {
    this.contentHash = CheckpointManager.fingerprint(config);
  }

  /**
   * md5 over the canonical JSON of the playbook without its `incremental`
   * block, so toggling checkpointing keeps prior checkpoints valid
   */
  static fingerprint(config: PlaybookConfig): string {
    const { incremental: _incremental, ...rest } = config;
    return createHash('md5').update(stableStringify(rest)).digest('hex');
  }

  get enabled(): boolean {
    return this.store !== null;
  }

  /**
   * No-op when disabled or at (0, 0)
   */
  async save(currentPhase: number, currentStep: number, variables: Variables): Promise<void> {
    if (!this.store || (currentPhase === 0 && currentStep === 0)) {
      return;
    }

    try {
      await this.store.save({
        currentPhase,
        currentStep,
        variables: structuredClone(variables),
        contentHash: this.contentHash,
        timestamp: this.now().toISOString(),
      });
      this.logger.debug(`Checkpoint saved at phase ${currentPhase}, step ${currentStep}`);
    } catch (error) {
      this.logger.warn(`Failed to save checkpoint: ${errorMessage(error)}`, { currentPhase, currentStep });
    }
  }

  async load(): Promise<CheckpointData | null> {
    if (!this.store) {
      return null;
    }

    try {
      const data = await this.store.load(this.contentHash);
      if (data && data.contentHash !== this.contentHash) {
        this.logger.info('Ignoring checkpoint for a different playbook revision');
        return null;
      }
      if (data) {
        this.logger.info(`Resuming from checkpoint at phase ${data.currentPhase}, step ${data.currentStep}`, {
          savedAt: data.timestamp,
        });
      }
      return data;
    } catch (error) {
      this.logger.warn(`Failed to load checkpoint: ${errorMessage(error)}`);
      return null;
    }
  }

  async clear(): Promise<void> {
    if (!this.store) {
      return;
    }

    try {
      await this.store.clear(this.contentHash);
      this.logger.debug('Checkpoint cleared');
    } catch (error) {
      this.logger.warn(`Failed to clear checkpoint: ${errorMessage(error)}`);
    }
  }
}

export function shouldSkipPhase(phaseIndex: number, checkpoint: CheckpointPosition | null): boolean {
  return checkpoint !== null && phaseIndex < checkpoint.currentPhase;
}

export function shouldSkipStep(phaseIndex: number, stepIndex: number, checkpoint: CheckpointPosition | null): boolean {
  return checkpoint !== null && phaseIndex === checkpoint.currentPhase && stepIndex <= checkpoint.currentStep;
}

export function shouldRestartParallelPhase(phaseIndex: number, checkpoint: CheckpointPosition | null): boolean {
  return checkpoint !== null && phaseIndex === checkpoint.currentPhase;
}

/**
 * JSON with object keys sorted at every level; undefined members are dropped
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => (entry === undefined ? 'null' : stableStringify(entry))).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, entry]) => entry !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`);
  return `{${entries.join(',')}}`;
}
