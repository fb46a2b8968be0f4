/**
 * Execution Contexts
 *
 * Per-unit bookkeeping created when a phase, step or request starts and
 * discarded when it ends. Only the variable store outlives them.
 *
 * @module execution
 */

import { randomUUID } from 'node:crypto';
import type { JsonValue, PhaseConfig, StepConfig } from '../types/core-types.js';

export function generateExecutionId(prefix: 'run' | 'phase' | 'step' | 'req'): string {
  return `${prefix}-${randomUUID()}`;
}

export interface PhaseContext {
  readonly id: string;
  readonly runId: string;
  readonly index: number;
  readonly config: PhaseConfig;
  readonly startedAt: number;
}

export interface StepContext {
  readonly id: string;
  readonly phase: PhaseContext;
  readonly index: number;
  readonly config: StepConfig;
  readonly name: string;
  readonly startedAt: number;
  /** Accumulated over every request the step issues */
  retryCount: number;
  storedVars: Record<string, JsonValue>;
}

export function createPhaseContext(runId: string, index: number, config: PhaseConfig): PhaseContext {
  return {
    id: generateExecutionId('phase'),
    runId,
    index,
    config,
    startedAt: Date.now(),
  };
}

export function createStepContext(phase: PhaseContext, index: number, config: StepConfig): StepContext {
  return {
    id: generateExecutionId('step'),
    phase,
    index,
    config,
    name: config.name ?? `${phase.config.name}[${index}]`,
    startedAt: Date.now(),
    retryCount: 0,
    storedVars: {},
  };
}
