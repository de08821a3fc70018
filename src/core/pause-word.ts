import { InvalidPauseWordError } from './errors.js';
import { isUint48 } from './uint48.js';
import type { PauseState } from './types.js';

/**
 * Packed layout of the breaker state, one unsigned 56-bit word:
 *
 *   bits [0, 8)   flag      0 = unpaused, 1 = paused
 *   bits [8, 56)  deadline  uint48 seconds, 0 = no duration
 *
 * This module is the only place that shifts or masks the word.
 */
const FLAG_BITS = 8n;
const FLAG_MASK = 0xffn;
const DEADLINE_MASK = 0xffff_ffff_ffffn;
const WORD_LIMIT = 1n << 56n;

const FLAG_UNPAUSED = 0n;
const FLAG_PAUSED = 1n;

export function packPauseWord(state: PauseState): bigint {
  if (!isUint48(state.deadline)) {
    throw new InvalidPauseWordError(`deadline ${state.deadline} is not a uint48`);
  }
  const flag = state.flag === 'paused' ? FLAG_PAUSED : FLAG_UNPAUSED;
  return (BigInt(state.deadline) << FLAG_BITS) | flag;
}

export function unpackPauseWord(word: bigint): PauseState {
  if (word < 0n || word >= WORD_LIMIT) {
    throw new InvalidPauseWordError(`0x${word.toString(16)} does not fit in 56 bits`);
  }

  const rawFlag = word & FLAG_MASK;
  const deadline = Number((word >> FLAG_BITS) & DEADLINE_MASK);

  if (rawFlag !== FLAG_UNPAUSED && rawFlag !== FLAG_PAUSED) {
    throw new InvalidPauseWordError(`unknown flag ${rawFlag}`);
  }
  if (rawFlag === FLAG_UNPAUSED && deadline !== 0) {
    throw new InvalidPauseWordError('unpaused word carries a deadline');
  }

  return { flag: rawFlag === FLAG_PAUSED ? 'paused' : 'unpaused', deadline };
}

export function formatPauseWord(word: bigint): string {
  return `0x${word.toString(16).padStart(14, '0')}`;
}

/** Accepts the `0x`-prefixed hex form written by formatPauseWord. */
export function parsePauseWord(text: string): bigint {
  if (!/^0x[0-9a-fA-F]{1,14}$/.test(text)) {
    throw new InvalidPauseWordError(`"${text}" is not a 56-bit hex word`);
  }
  return BigInt(text);
}
