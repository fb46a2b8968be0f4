/**
 * Observer Manager
 *
 * Fans execution events out to observers. Delivery is fire-and-forget: the
 * engine never waits on an observer, and a throwing or rejecting observer
 * is logged and otherwise ignored, so it cannot affect the run or the other
 * observers.
 *
 * @example
 * ```ts
 * const observers = new ObserverManager(logger, [
 *   { notify: (event) => console.log(event.type) },
 * ]);
 * observers.notify(event);
 * await observers.cleanup();
 * ```
 *
 * @module events
 */

import type { EngineLogger } from '../core/EngineLogger.js';
import { errorMessage } from '../errors/index.js';
import type { ExecutionEvent } from './ExecutionEvents.js';

export interface ExecutionObserver {
  notify(event: ExecutionEvent): void | Promise<void>;
  /** Called once when the run ends */
  cleanup?(): void | Promise<void>;
}

export class ObserverManager {
  private readonly observers: ExecutionObserver[];
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly logger: EngineLogger,
    observers: readonly ExecutionObserver[] = []
  ) {
    this.observers = [...observers];
  }

  /**
   * Subscribe an observer
   *
   * @returns Unsubscribe function
   */
  add(observer: ExecutionObserver): () => void {
    this.observers.push(observer);
    return () => {
      const index = this.observers.indexOf(observer);
      if (index !== -1) {
        this.observers.splice(index, 1);
      }
    };
  }

  get size(): number {
    return this.observers.length;
  }

  notify(event: ExecutionEvent): void {
    for (const observer of this.observers) {
      try {
        const result = observer.notify(event);
        if (result instanceof Promise) {
          this.track(result, event);
        }
      } catch (error) {
        this.reportFailure(event, error);
      }
    }
  }

  /**
   * Let in-flight async notifications settle, then clean up every observer
   */
  async cleanup(): Promise<void> {
    await Promise.allSettled([...this.pending]);

    for (const observer of this.observers) {
      if (!observer.cleanup) continue;
      try {
        await observer.cleanup();
      } catch (error) {
        this.logger.warn(`Observer cleanup failed: ${errorMessage(error)}`);
      }
    }
  }

  private track(result: Promise<void>, event: ExecutionEvent): void {
    const tracked = result.then(
      () => undefined,
      (error: unknown) => this.reportFailure(event, error)
    );
    this.pending.add(tracked);
    void tracked.finally(() => this.pending.delete(tracked));
  }

  private reportFailure(event: ExecutionEvent, error: unknown): void {
    this.logger.warn(`Observer failed on ${event.type}: ${errorMessage(error)}`);
  }
}
