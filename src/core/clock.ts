import { ClockOverflowError } from './errors.js';
import { isUint48 } from './uint48.js';
import type { Clock } from './types.js';

export const CLOCK_MODE = 'mode=timestamp&unit=seconds';

/**
 * Narrow a native time value to uint48 seconds.
 * Throws instead of wrapping: a wrapped clock would make a deadline look elapsed.
 */
export function toClockValue(seconds: number): number {
  if (!isUint48(seconds)) {
    throw new ClockOverflowError(seconds);
  }
  return seconds;
}

/**
 * Wall-clock seconds, clamped so the value never goes backwards within the process
 * (NTP steps or a manual clock change are absorbed until real time catches up).
 */
export class SystemClock implements Clock {
  private last = 0;

  constructor(private readonly nowMs: () => number = Date.now) {}

  now(): number {
    const current = toClockValue(Math.floor(this.nowMs() / 1000));
    if (current > this.last) {
      this.last = current;
    }
    return this.last;
  }

  clockMode(): string {
    return CLOCK_MODE;
  }
}

/**
 * Clock driven by the host. Used by tests and by hosts that already own a
 * notion of time (block timestamps, simulation ticks).
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = toClockValue(start);
  }

  now(): number {
    return this.current;
  }

  clockMode(): string {
    return CLOCK_MODE;
  }

  set(seconds: number): void {
    const next = toClockValue(seconds);
    if (next < this.current) {
      throw new RangeError(`Clock cannot move backwards (${this.current} -> ${next})`);
    }
    this.current = next;
  }

  advance(seconds: number): void {
    if (!Number.isSafeInteger(seconds) || seconds < 0) {
      throw new RangeError(`Clock can only advance by a non-negative integer, got ${seconds}`);
    }
    this.set(this.current + seconds);
  }
}
