/**
 * Timer Lifecycle Management Guards
 *
 * Owns the hedge timers of one dispatch so they can all be cleared in one
 * call when the race settles.
 *
 * Usage:
 * ```typescript
 * const timers = new MultiTimerGuard();
 * timers.set('hedge-1', () => launch(1), 150);
 * // Later...
 * timers.clearAll();
 * ```
 */

/**
 * Single named timer; `set` replaces any timer already armed.
 */
export class TimerGuard {
  private timer?: NodeJS.Timeout;
  private readonly name: string;

  constructor(name = 'anonymous') {
    this.name = name;
  }

  set(callback: () => void, delayMs: number): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      callback();
    }, delayMs);
  }

  /**
   * Idempotent.
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

/**
 * Several named timers cleared together.
 */
export class MultiTimerGuard {
  private timers = new Map<string, TimerGuard>();

  set(name: string, callback: () => void, delayMs: number): void {
    const guard = this.timers.get(name) ?? new TimerGuard(name);
    guard.set(callback, delayMs);
    this.timers.set(name, guard);
  }

  clear(name: string): void {
    this.timers.get(name)?.clear();
    this.timers.delete(name);
  }

  clearAll(): void {
    for (const [name] of this.timers) {
      this.clear(name);
    }
  }

  /**
   * Timers armed and not yet fired or cleared.
   */
  getActiveCount(): number {
    let count = 0;
    for (const guard of this.timers.values()) {
      if (guard.isActive()) {
        count++;
      }
    }
    return count;
  }

  getTimerNames(): string[] {
    return Array.from(this.timers.keys());
  }
}
