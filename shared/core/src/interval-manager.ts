/**
 * Interval Manager
 *
 * Named intervals. Callback errors, sync or async, are routed to the
 * onError handler instead of escaping as unhandled rejections.
 *
 * @example
 * ```typescript
 * const intervals = new IntervalManager({
 *   onError: (name, error) => logger.error('Interval callback failed', { name, error }),
 * });
 * intervals.set('analysis-cycle', () => scheduler.tick(Date.now()), 1000);
 * // on shutdown
 * intervals.clear('analysis-cycle');
 * ```
 */

export interface IntervalManagerOptions {
  /** Receives errors thrown or rejected by interval callbacks */
  onError?: (name: string, error: unknown) => void;
}

export class IntervalManager {
  private readonly intervals = new Map<string, NodeJS.Timeout>();
  private readonly onError: (name: string, error: unknown) => void;

  constructor(options: IntervalManagerOptions = {}) {
    this.onError = options.onError ?? (() => undefined);
  }

  /**
   * Set a named interval, replacing any interval with the same name.
   */
  set(name: string, callback: () => unknown, intervalMs: number): void {
    this.clear(name);

    const wrappedCallback = (): void => {
      try {
        const result = callback();
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.onError(name, error));
        }
      } catch (error) {
        this.onError(name, error);
      }
    };

    this.intervals.set(name, setInterval(wrappedCallback, intervalMs));
  }

  /**
   * @returns true if the interval existed
   */
  clear(name: string): boolean {
    const intervalId = this.intervals.get(name);
    if (!intervalId) {
      return false;
    }
    clearInterval(intervalId);
    this.intervals.delete(name);
    return true;
  }
}
