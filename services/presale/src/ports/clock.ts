/**
 * Clock Source
 *
 * Monotonic unix time in seconds. Sampled once per operation.
 */

// ============================================
// CLOCK INTERFACE
// ============================================

export interface ClockSource {
  now(): number;
}

export class SystemClock implements ClockSource {
  private last = 0;

  now(): number {
    // Never step backwards even if the wall clock does
    this.last = Math.max(this.last, Math.floor(Date.now() / 1000));
    return this.last;
  }
}

/**
 * Manually driven clock for simulations and tests
 */
export class ManualClock implements ClockSource {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    if (timestamp < this.current) {
      throw new Error(`ManualClock cannot move backwards (${timestamp} < ${this.current})`);
    }
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.set(this.current + seconds);
  }
}
