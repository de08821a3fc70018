import { describe, it, expect, vi } from 'vitest';
import { Pausable } from './pausable.js';
import { ManualClock } from './clock.js';
import { whenNotPaused, whenPaused } from './guards.js';
import { EnforcedPauseError, ExpectedPauseError } from './errors.js';

function createBreaker(): Pausable {
  return new Pausable({ clock: new ManualClock(1), actor: () => 'ops' });
}

describe('guards', () => {
  it('passes arguments and return values through', () => {
    const breaker = createBreaker();
    const add = whenNotPaused(breaker, (a: number, b: number) => a + b);
    expect(add(2, 3)).toBe(5);
  });

  it('checks the breaker on every call, not when wrapping', () => {
    const breaker = createBreaker();
    const fn = vi.fn(() => 'done');
    const gated = whenNotPaused(breaker, fn);

    expect(gated()).toBe('done');
    breaker.pause();
    expect(() => gated()).toThrow(EnforcedPauseError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('runs recovery operations only while paused', () => {
    const breaker = createBreaker();
    const fn = vi.fn();
    const recover = whenPaused(breaker, fn);

    expect(() => recover()).toThrow(ExpectedPauseError);
    breaker.pauseFor(30);
    recover();
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('exposes the guards as plain methods too', () => {
    const breaker = createBreaker();
    expect(() => breaker.requireNotPaused()).not.toThrow();
    expect(() => breaker.requirePaused()).toThrow(ExpectedPauseError);
  });
});
