/**
 * Metrics Observer
 *
 * Aggregates request statistics per phase while a run executes and reports
 * them when the run ends: as log lines (`console`) or as a JSON file
 * (`json`).
 *
 * @module events
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { EngineLogger } from '../core/EngineLogger.js';
import type { MetricsConfig } from '../types/core-types.js';
import {
  visitEvent,
  type ExecutionEvent,
  type ExecutionEventVisitor,
  type PhaseStartEvent,
  type PlaybookEndEvent,
  type RequestEndEvent,
  type StepStartEvent,
} from './ExecutionEvents.js';
import type { ExecutionObserver } from './ObserverManager.js';

export interface RequestStats {
  requests: number;
  failures: number;
  retries: number;
  requestBytes: number;
  responseBytes: number;
  totalDurationMs: number;
  statusCodes: Record<string, number>;
}

export interface MetricsReport {
  runId?: string;
  success?: boolean;
  durationMs?: number;
  totals: RequestStats;
  phases: Record<string, RequestStats>;
}

function emptyStats(): RequestStats {
  return {
    requests: 0,
    failures: 0,
    retries: 0,
    requestBytes: 0,
    responseBytes: 0,
    totalDurationMs: 0,
    statusCodes: {},
  };
}

export class MetricsObserver implements ExecutionObserver {
  private readonly report: MetricsReport = { totals: emptyStats(), phases: {} };
  /** phaseId -> phase name */
  private readonly phaseNames = new Map<string, string>();
  /** stepId -> phaseId */
  private readonly stepPhases = new Map<string, string>();

  private readonly visitor: ExecutionEventVisitor = {
    onPhaseStart: (event: PhaseStartEvent) => {
      this.phaseNames.set(event.phaseId, event.phaseName);
    },
    onStepStart: (event: StepStartEvent) => {
      this.stepPhases.set(event.stepId, event.phaseId);
    },
    onRequestEnd: (event: RequestEndEvent) => {
      this.record(this.report.totals, event);
      const phaseName = this.phaseNames.get(this.stepPhases.get(event.stepId) ?? '');
      if (phaseName !== undefined) {
        this.report.phases[phaseName] ??= emptyStats();
        this.record(this.report.phases[phaseName], event);
      }
    },
    onPlaybookEnd: (event: PlaybookEndEvent) => {
      this.report.runId = event.runId;
      this.report.success = event.success;
      this.report.durationMs = event.durationMs;
    },
  };

  constructor(
    private readonly config: MetricsConfig,
    private readonly logger: EngineLogger
  ) {}

  notify(event: ExecutionEvent): void {
    visitEvent(event, this.visitor);
  }

  getReport(): MetricsReport {
    return structuredClone(this.report);
  }

  async cleanup(): Promise<void> {
    switch (this.config.collector) {
      case 'console':
        this.logSummary();
        return;
      case 'json':
        await this.writeReport();
        return;
    }
  }

  private record(stats: RequestStats, event: RequestEndEvent): void {
    stats.requests++;
    if (!event.success) stats.failures++;
    stats.retries += Math.max(0, event.attempts - 1);
    stats.requestBytes += event.requestSizeBytes;
    stats.responseBytes += event.responseSizeBytes;
    stats.totalDurationMs += event.durationMs;
    const status = event.statusCode !== undefined ? String(event.statusCode) : 'none';
    stats.statusCodes[status] = (stats.statusCodes[status] ?? 0) + 1;
  }

  private logSummary(): void {
    const { totals } = this.report;
    this.logger.info(
      `Metrics: ${totals.requests} requests, ${totals.failures} failed, ${totals.retries} retries`,
      { requestBytes: totals.requestBytes, responseBytes: totals.responseBytes, durationMs: totals.totalDurationMs }
    );
    for (const [phase, stats] of Object.entries(this.report.phases)) {
      this.logger.info(`Metrics [${phase}]: ${stats.requests} requests, ${stats.failures} failed`, {
        statusCodes: stats.statusCodes,
      });
    }
  }

  private async writeReport(): Promise<void> {
    if (!this.config.outputFile) {
      this.logger.warn('Metrics collector "json" has no output_file; skipping report');
      return;
    }
    const filePath = resolve(this.config.outputFile);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify(this.report, null, 2), 'utf-8');
    this.logger.debug(`Metrics written to ${filePath}`);
  }
}
