/**
 * Shutdown Manager
 *
 * Coordinates graceful shutdown for hosts: runs registered handlers in
 * order, each raced against the grace period, and wires process signals.
 * The host decides when the process exits.
 *
 * @module lifecycle
 */

import type { EngineLogger } from '../core/EngineLogger.js';
import { errorMessage } from '../errors/index.js';

export type ShutdownHandler = () => Promise<void> | void;

export interface ShutdownReport {
  completed: string[];
  failed: string[];
  timedOut: string[];
}

export class ShutdownManager {
  private handlers: Array<{ name: string; handler: ShutdownHandler }> = [];
  private shutdownInProgress = false;

  constructor(private readonly logger: EngineLogger) {}

  /**
   * Handlers run in registration order
   */
  registerHandler(name: string, handler: ShutdownHandler): void {
    this.handlers.push({ name, handler });
    this.logger.debug('Shutdown handler registered', {
      handlerName: name,
      totalHandlers: this.handlers.length,
    });
  }

  /**
   * Run every handler, giving each at most `timeoutMs`. A handler that
   * fails or times out does not stop the ones after it.
   */
  async executeHandlers(timeoutMs = 10_000): Promise<ShutdownReport> {
    const report: ShutdownReport = { completed: [], failed: [], timedOut: [] };

    if (this.shutdownInProgress) {
      this.logger.warn('Shutdown already in progress');
      return report;
    }

    this.shutdownInProgress = true;
    this.logger.info('Executing shutdown handlers', {
      handlerCount: this.handlers.length,
      timeoutMs,
    });

    for (const { name, handler } of this.handlers) {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<'timeout'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), timeoutMs);
      });

      try {
        const outcome = await Promise.race([Promise.resolve(handler()).then(() => 'done' as const), timeout]);
        if (outcome === 'timeout') {
          report.timedOut.push(name);
          this.logger.warn(`Shutdown handler "${name}" did not finish within ${timeoutMs}ms; proceeding`);
        } else {
          report.completed.push(name);
          this.logger.debug(`Shutdown handler "${name}" completed`);
        }
      } catch (error) {
        report.failed.push(name);
        this.logger.error(`Shutdown handler "${name}" failed: ${errorMessage(error)}`);
      } finally {
        clearTimeout(timer);
      }
    }

    this.shutdownInProgress = false;
    return report;
  }

  isShuttingDown(): boolean {
    return this.shutdownInProgress;
  }

  /**
   * Call `onSignal` on the first SIGINT/SIGTERM
   *
   * @returns Function removing the listeners
   */
  static setupSignalHandlers(
    onSignal: (signal: NodeJS.Signals) => void,
    signals: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM']
  ): () => void {
    let received = false;
    const listener = (signal: NodeJS.Signals): void => {
      if (received) return;
      received = true;
      onSignal(signal);
    };

    for (const signal of signals) {
      process.on(signal, listener);
    }
    return () => {
      for (const signal of signals) {
        process.off(signal, listener);
      }
    };
  }
}
