import { describe, it, expect } from 'vitest';
import { SystemClock, ManualClock, toClockValue, CLOCK_MODE } from './clock.js';
import { ClockOverflowError } from './errors.js';
import { MAX_UINT48 } from './uint48.js';

describe('clock', () => {
  describe('toClockValue', () => {
    it('passes uint48 values through', () => {
      expect(toClockValue(0)).toBe(0);
      expect(toClockValue(MAX_UINT48)).toBe(MAX_UINT48);
    });

    it('fails loudly instead of wrapping', () => {
      expect(() => toClockValue(MAX_UINT48 + 1)).toThrow(ClockOverflowError);
      expect(() => toClockValue(-1)).toThrow(ClockOverflowError);
    });
  });

  describe('SystemClock', () => {
    it('converts milliseconds to whole seconds', () => {
      const clock = new SystemClock(() => 1_700_000_000_999);
      expect(clock.now()).toBe(1_700_000_000);
    });

    it('never goes backwards when the wall clock does', () => {
      const readings = [5_000, 9_000, 2_000, 12_000];
      const clock = new SystemClock(() => readings.shift() ?? 0);

      expect(clock.now()).toBe(5);
      expect(clock.now()).toBe(9);
      expect(clock.now()).toBe(9);
      expect(clock.now()).toBe(12);
    });

    it('throws when the wall clock no longer fits 48 bits', () => {
      const clock = new SystemClock(() => (MAX_UINT48 + 1) * 1000);
      expect(() => clock.now()).toThrow(ClockOverflowError);
    });

    it('describes its unit', () => {
      expect(new SystemClock().clockMode()).toBe(CLOCK_MODE);
    });
  });

  describe('ManualClock', () => {
    it('starts where told and advances', () => {
      const clock = new ManualClock(100);
      clock.advance(10);
      expect(clock.now()).toBe(110);
      clock.set(110);
      expect(clock.now()).toBe(110);
    });

    it('refuses to move backwards', () => {
      const clock = new ManualClock(100);
      expect(() => clock.set(99)).toThrow(RangeError);
      expect(() => clock.advance(-1)).toThrow(RangeError);
      expect(clock.now()).toBe(100);
    });

    it('refuses to advance past 48 bits', () => {
      const clock = new ManualClock(MAX_UINT48);
      expect(() => clock.advance(1)).toThrow(ClockOverflowError);
    });
  });
});
