export { Pausable } from './pausable.js';
export { whenNotPaused, whenPaused } from './guards.js';
export { SystemClock, ManualClock, CLOCK_MODE, toClockValue } from './clock.js';
export {
  packPauseWord,
  unpackPauseWord,
  formatPauseWord,
  parsePauseWord,
} from './pause-word.js';
export { MAX_UINT48, isUint48, addUint48 } from './uint48.js';
export {
  PauseError,
  EnforcedPauseError,
  ExpectedPauseError,
  PauseDurationNotElapsedError,
  DeadlineOverflowError,
  ClockOverflowError,
  InvalidDurationError,
  InvalidPauseWordError,
  type PauseErrorCode,
} from './errors.js';
export type {
  Actor,
  ActorSupplier,
  Clock,
  PausableOptions,
  PauseEvent,
  PauseFlag,
  PauseKind,
  PauseListener,
  PauseState,
  PauseStatusView,
} from './types.js';
