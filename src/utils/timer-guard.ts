/**
 * Timer Lifecycle Guard
 *
 * Owns a single pending timeout. Every set() clears the previous timer
 * first, so a chained tick loop can never accumulate orphaned timers.
 *
 * Usage:
 * ```typescript
 * const guard = new TimerGuard('scheduler-tick');
 * guard.set(() => tick(), 1000);
 * // Later...
 * guard.clear();
 * ```
 */

export interface TimerGuardOptions {
  /** Do not keep the process alive for this timer (default: true) */
  unref?: boolean;
}

export class TimerGuard {
  private timer?: NodeJS.Timeout;
  private readonly name: string;
  private readonly unref: boolean;

  constructor(name = 'anonymous', options: TimerGuardOptions = {}) {
    this.name = name;
    this.unref = options.unref ?? true;
  }

  /**
   * Arm the timer, replacing any pending one
   */
  set(callback: () => void, delayMs: number): void {
    this.clear();
    const timer = setTimeout(() => {
      this.timer = undefined;
      callback();
    }, delayMs);
    if (this.unref) {
      timer.unref();
    }
    this.timer = timer;
  }

  /**
   * Clear the timer if set. Idempotent.
   */
  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  isActive(): boolean {
    return this.timer !== undefined;
  }

  getName(): string {
    return this.name;
  }
}
