/**
 * Backoff Timer
 *
 * The one place the engine actually waits. Clients and the engine take a
 * `SleepFn` so tests can substitute a recorder for real timers.
 *
 * @module automation/runtime
 */

export type SleepFn = (ms: number) => Promise<void>;

export class BackoffTimer {
  static sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * Format a delay for log output
   *
   * @example formatDelay(1500) // "1.5s"
   */
  static formatDelay(ms: number): string {
    if (ms < 1000) {
      return `${Math.round(ms)}ms`;
    }
    if (ms < 60_000) {
      return `${Number((ms / 1000).toFixed(1))}s`;
    }
    const minutes = Math.floor(ms / 60_000);
    const seconds = Math.round((ms % 60_000) / 1000);
    return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  }
}
