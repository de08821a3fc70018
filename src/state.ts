import * as fs from 'fs';
import * as path from 'path';
import {
  Pausable,
  formatPauseWord,
  parsePauseWord,
  unpackPauseWord,
  type PausableOptions,
} from './core/index.js';

/**
 * Breaker state file
 *
 * Keeps the packed pause word between CLI invocations so a pause set by one
 * command is seen by the next.
 */

export interface SavedBreakerState {
  version: 1;
  savedAt: number;
  word: string;       // packed pause word, 0x-prefixed hex
  clockMode: string;
}

function isSavedBreakerState(value: unknown): value is SavedBreakerState {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    value.version === 1 &&
    'savedAt' in value &&
    typeof value.savedAt === 'number' &&
    'word' in value &&
    typeof value.word === 'string' &&
    'clockMode' in value &&
    typeof value.clockMode === 'string'
  );
}

/**
 * Save breaker state to disk
 */
export function saveBreakerState(statePath: string, breaker: Pausable): SavedBreakerState {
  const stateDir = path.dirname(statePath);

  // Ensure directory exists
  if (!fs.existsSync(stateDir)) {
    fs.mkdirSync(stateDir, { recursive: true });
  }

  const state: SavedBreakerState = {
    version: 1,
    savedAt: Date.now(),
    word: formatPauseWord(breaker.toWord()),
    clockMode: breaker.clockMode(),
  };

  // Per-process temp name so concurrent runs never share a half-written file
  const tmpPath = `${statePath}.${process.pid}.tmp`;

  // Atomic write: write to temp file first, then rename
  // (rename is atomic on the same filesystem)
  fs.writeFileSync(tmpPath, JSON.stringify(state, null, 2), 'utf-8');
  fs.renameSync(tmpPath, statePath);

  return state;
}

/**
 * Load breaker state from disk. Returns null when there is nothing usable.
 */
export function loadBreakerState(statePath: string): SavedBreakerState | null {
  if (!fs.existsSync(statePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(statePath, 'utf-8'));
  } catch (error) {
    console.warn('Failed to load breaker state:', error);
    return null;
  }

  if (!isSavedBreakerState(parsed)) {
    console.warn('Breaker state version mismatch, ignoring saved state');
    return null;
  }

  try {
    unpackPauseWord(parsePauseWord(parsed.word));
  } catch (error) {
    console.warn('Breaker state holds an invalid pause word:', error);
    return null;
  }

  return parsed;
}

/**
 * Clear saved breaker state
 */
export function clearBreakerState(statePath: string): void {
  if (fs.existsSync(statePath)) {
    fs.unlinkSync(statePath);
  }
}

/**
 * Restore a breaker from the state file, or start a fresh unpaused one.
 */
export function openBreaker(statePath: string, options: PausableOptions): Pausable {
  const saved = loadBreakerState(statePath);
  if (!saved) {
    return new Pausable(options);
  }
  if (saved.clockMode !== options.clock.clockMode()) {
    console.warn(
      `Breaker state was saved with clock "${saved.clockMode}", reading it with "${options.clock.clockMode()}"`
    );
  }
  return Pausable.fromWord(parsePauseWord(saved.word), options);
}
