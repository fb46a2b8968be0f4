/**
 * Execution Events
 *
 * Closed set of lifecycle events the engine emits. Each variant carries only
 * its own fields; consumers switch on `type` or use `visitEvent()`.
 *
 * @module events
 */

import type { HttpMethod, JsonValue } from '../types/core-types.js';

export enum ExecutionEventType {
  // ============================================================================
  // Playbook
  // ============================================================================
  PLAYBOOK_START = 'playbook.start',
  PLAYBOOK_END = 'playbook.end',

  // ============================================================================
  // Phase
  // ============================================================================
  PHASE_START = 'phase.start',
  PHASE_END = 'phase.end',

  // ============================================================================
  // Step
  // ============================================================================
  STEP_START = 'step.start',
  STEP_END = 'step.end',

  // ============================================================================
  // Request
  // ============================================================================
  REQUEST_START = 'request.start',
  REQUEST_END = 'request.end',
}

interface EventBase {
  timestamp: Date;
  runId: string;
}

export interface PlaybookStartEvent extends EventBase {
  type: ExecutionEventType.PLAYBOOK_START;
  playbookName?: string;
  phaseCount: number;
}

export interface PlaybookEndEvent extends EventBase {
  type: ExecutionEventType.PLAYBOOK_END;
  playbookName?: string;
  success: boolean;
  durationMs: number;
  error?: string;
}

export interface PhaseStartEvent extends EventBase {
  type: ExecutionEventType.PHASE_START;
  phaseId: string;
  phaseIndex: number;
  phaseName: string;
  parallel: boolean;
  stepCount: number;
}

export interface PhaseEndEvent extends EventBase {
  type: ExecutionEventType.PHASE_END;
  phaseId: string;
  phaseIndex: number;
  phaseName: string;
  parallel: boolean;
  success: boolean;
  /** Parallel phases only: steps that failed without aborting the phase */
  failedSteps: number;
  durationMs: number;
}

export interface StepStartEvent extends EventBase {
  type: ExecutionEventType.STEP_START;
  phaseId: string;
  stepId: string;
  stepIndex: number;
  stepName: string;
  session: string;
}

export interface StepEndEvent extends EventBase {
  type: ExecutionEventType.STEP_END;
  phaseId: string;
  stepId: string;
  stepIndex: number;
  stepName: string;
  success: boolean;
  /** Retries across every request of the step */
  retryCount: number;
  storedVars: Record<string, JsonValue>;
  durationMs: number;
  error?: string;
}

export interface RequestStartEvent extends EventBase {
  type: ExecutionEventType.REQUEST_START;
  stepId: string;
  requestId: string;
  method: HttpMethod;
  endpoint: string;
  iteration?: number;
}

export interface RequestEndEvent extends EventBase {
  type: ExecutionEventType.REQUEST_END;
  stepId: string;
  requestId: string;
  method: HttpMethod;
  endpoint: string;
  iteration?: number;
  statusCode?: number;
  success: boolean;
  error?: string;
  /** Every failure seen across attempts */
  errors: string[];
  attempts: number;
  requestSizeBytes: number;
  responseSizeBytes: number;
  durationMs: number;
}

export type ExecutionEvent =
  | PlaybookStartEvent
  | PlaybookEndEvent
  | PhaseStartEvent
  | PhaseEndEvent
  | StepStartEvent
  | StepEndEvent
  | RequestStartEvent
  | RequestEndEvent;

/**
 * One optional handler per event type
 */
export interface ExecutionEventVisitor<R = void> {
  onPlaybookStart?(event: PlaybookStartEvent): R;
  onPlaybookEnd?(event: PlaybookEndEvent): R;
  onPhaseStart?(event: PhaseStartEvent): R;
  onPhaseEnd?(event: PhaseEndEvent): R;
  onStepStart?(event: StepStartEvent): R;
  onStepEnd?(event: StepEndEvent): R;
  onRequestStart?(event: RequestStartEvent): R;
  onRequestEnd?(event: RequestEndEvent): R;
}

/**
 * Dispatch an event to the matching visitor method
 *
 * @returns The handler's result, or undefined when the visitor has none
 */
export function visitEvent<R>(event: ExecutionEvent, visitor: ExecutionEventVisitor<R>): R | undefined {
  switch (event.type) {
    case ExecutionEventType.PLAYBOOK_START:
      return visitor.onPlaybookStart?.(event);
    case ExecutionEventType.PLAYBOOK_END:
      return visitor.onPlaybookEnd?.(event);
    case ExecutionEventType.PHASE_START:
      return visitor.onPhaseStart?.(event);
    case ExecutionEventType.PHASE_END:
      return visitor.onPhaseEnd?.(event);
    case ExecutionEventType.STEP_START:
      return visitor.onStepStart?.(event);
    case ExecutionEventType.STEP_END:
      return visitor.onStepEnd?.(event);
    case ExecutionEventType.REQUEST_START:
      return visitor.onRequestStart?.(event);
    case ExecutionEventType.REQUEST_END:
      return visitor.onRequestEnd?.(event);
  }
}

/**
 * Plain JSON form of an event, for NDJSON output
 */
export function serializeEvent(event: ExecutionEvent): Record<string, unknown> {
  return { ...event, timestamp: event.timestamp.toISOString() };
}
