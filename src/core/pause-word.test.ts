import { describe, it, expect } from 'vitest';
import {
  packPauseWord,
  unpackPauseWord,
  formatPauseWord,
  parsePauseWord,
} from './pause-word.js';
import { InvalidPauseWordError } from './errors.js';
import { MAX_UINT48 } from './uint48.js';

describe('pause-word', () => {
  describe('packPauseWord', () => {
    it('packs the unpaused state to zero', () => {
      expect(packPauseWord({ flag: 'unpaused', deadline: 0 })).toBe(0n);
    });

    it('puts the flag in the low byte', () => {
      expect(packPauseWord({ flag: 'paused', deadline: 0 })).toBe(1n);
    });

    it('puts the deadline in bits 8..56', () => {
      // 110 << 8 | 1
      expect(packPauseWord({ flag: 'paused', deadline: 110 })).toBe(28161n);
    });

    it('packs the largest deadline into the top of the 56-bit word', () => {
      expect(packPauseWord({ flag: 'paused', deadline: MAX_UINT48 })).toBe(0xffffffffffff01n);
    });

    it('rejects a deadline that is not a uint48', () => {
      expect(() => packPauseWord({ flag: 'paused', deadline: MAX_UINT48 + 1 })).toThrow(
        InvalidPauseWordError
      );
      expect(() => packPauseWord({ flag: 'paused', deadline: -1 })).toThrow(InvalidPauseWordError);
    });
  });

  describe('unpackPauseWord', () => {
    it('reads flag and deadline back', () => {
      expect(unpackPauseWord(28161n)).toEqual({ flag: 'paused', deadline: 110 });
      expect(unpackPauseWord(0n)).toEqual({ flag: 'unpaused', deadline: 0 });
      expect(unpackPauseWord(0xffffffffffff01n)).toEqual({ flag: 'paused', deadline: MAX_UINT48 });
    });

    it('rejects words wider than 56 bits', () => {
      expect(() => unpackPauseWord(1n << 56n)).toThrow(InvalidPauseWordError);
      expect(() => unpackPauseWord(-1n)).toThrow(InvalidPauseWordError);
    });

    it('rejects unknown flag values', () => {
      expect(() => unpackPauseWord(2n)).toThrow('Invalid pause word: unknown flag 2');
    });

    it('rejects an unpaused word that still carries a deadline', () => {
      expect(() => unpackPauseWord(110n << 8n)).toThrow(
        'Invalid pause word: unpaused word carries a deadline'
      );
    });
  });

  describe('formatPauseWord / parsePauseWord', () => {
    it('formats as 14 zero-padded hex digits', () => {
      expect(formatPauseWord(28161n)).toBe('0x00000000006e01');
      expect(formatPauseWord(0n)).toBe('0x00000000000000');
    });

    it('parses the formatted form', () => {
      expect(parsePauseWord('0x00000000006e01')).toBe(28161n);
    });

    it('rejects text that is not a short hex word', () => {
      expect(() => parsePauseWord('28161')).toThrow(InvalidPauseWordError);
      expect(() => parsePauseWord('0x' + 'f'.repeat(15))).toThrow(InvalidPauseWordError);
      expect(() => parsePauseWord('0xzz')).toThrow(InvalidPauseWordError);
    });
  });
});
