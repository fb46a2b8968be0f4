/**
 * Checkpoint store contract and record format
 *
 * Persisted records use snake_case keys and are keyed by `content_hash`:
 *
 * ```json
 * { "current_phase": 1, "current_step": 2, "variables": {},
 *   "content_hash": "9e10...", "timestamp": "2024-05-01T12:00:00.000Z" }
 * ```
 *
 * @module checkpoint
 */

import { z } from 'zod';
import { JsonValueSchema } from '../parser/PlaybookSchema.js';
import type { Variables } from '../types/core-types.js';

export interface CheckpointData {
  readonly currentPhase: number;
  readonly currentStep: number;
  readonly variables: Variables;
  readonly contentHash: string;
  /** ISO-8601 */
  readonly timestamp: string;
}

export interface CheckpointStore {
  save(data: CheckpointData): Promise<void>;
  /** Resolves to null when nothing is stored under `contentHash` */
  load(contentHash: string): Promise<CheckpointData | null>;
  clear(contentHash: string): Promise<void>;
}

export const CheckpointRecordSchema = z.object({
  current_phase: z.number().int().nonnegative(),
  current_step: z.number().int().nonnegative(),
  variables: z.record(JsonValueSchema),
  content_hash: z.string().min(1),
  timestamp: z.string(),
});

export type CheckpointRecord = z.infer<typeof CheckpointRecordSchema>;

export function toCheckpointRecord(data: CheckpointData): CheckpointRecord {
  return {
    current_phase: data.currentPhase,
    current_step: data.currentStep,
    variables: data.variables,
    content_hash: data.contentHash,
    timestamp: data.timestamp,
  };
}

/**
 * Parse a stored record. Returns null for anything malformed.
 */
export function fromCheckpointRecord(value: unknown): CheckpointData | null {
  const result = CheckpointRecordSchema.safeParse(value);
  if (!result.success) {
    return null;
  }
  const record = result.data;
  return {
    currentPhase: record.current_phase,
    currentStep: record.current_step,
    variables: record.variables,
    contentHash: record.content_hash,
    timestamp: record.timestamp,
  };
}
