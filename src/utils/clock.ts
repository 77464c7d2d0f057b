/**
 * @fileoverview Time sources for the phase tick loops.
 *
 * The engine never calls timers directly; it awaits `clock.sleep()` between
 * ticks. These sleeps are the only suspension points of a mission run.
 *
 * @module utils/clock
 */

export interface MissionClock {
  /** Current time in milliseconds */
  now(): number;
  /** Resolves once `ms` milliseconds have passed on this clock */
  sleep(ms: number): Promise<void>;
}

/**
 * Wall-clock time backed by `setTimeout`.
 */
export class SystemClock implements MissionClock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));
  }
}

/**
 * Simulated time. `sleep()` advances the clock and resolves on the next
 * microtask, so a mission runs as fast as the CPU allows while every
 * timestamp stays exactly where it would be in real time.
 *
 * @example
 * ```typescript
 * const clock = new VirtualClock();
 * await clock.sleep(100);
 * clock.now(); // 100
 * ```
 */
export class VirtualClock implements MissionClock {
  private current: number;
  private sleeps = 0;

  constructor(startMs = 0) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.current += Math.max(0, ms);
    this.sleeps++;
  }

  /** Number of sleeps performed, one per tick plus pauses */
  getSleepCount(): number {
    return this.sleeps;
  }
}
