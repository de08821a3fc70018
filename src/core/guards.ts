import type { Pausable } from './pausable.js';

/**
 * Wrap a host operation so it only runs while the breaker is unpaused.
 * The guard runs on every call, before `fn`, and its error propagates unchanged.
 *
 * @example
 * const transfer = whenNotPaused(breaker, (to: string, amount: number) => ledger.move(to, amount));
 */
export function whenNotPaused<A extends unknown[], R>(
  breaker: Pausable,
  fn: (...args: A) => R
): (...args: A) => R {
  return (...args: A): R => {
    breaker.requireNotPaused();
    return fn(...args);
  };
}

/**
 * Wrap a host operation so it only runs while the breaker is paused
 * (recovery or drastic measures).
 */
export function whenPaused<A extends unknown[], R>(
  breaker: Pausable,
  fn: (...args: A) => R
): (...args: A) => R {
  return (...args: A): R => {
    breaker.requirePaused();
    return fn(...args);
  };
}
