export type PauseErrorCode =
  | 'ENFORCED_PAUSE'
  | 'EXPECTED_PAUSE'
  | 'PAUSE_DURATION_NOT_ELAPSED'
  | 'DEADLINE_OVERFLOW'
  | 'CLOCK_OVERFLOW'
  | 'INVALID_DURATION'
  | 'INVALID_PAUSE_WORD';

/**
 * Base class for every precondition failure raised by a breaker.
 * Nothing is retried internally; the caller decides what to do with the code.
 */
export class PauseError extends Error {
  constructor(
    public code: PauseErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'PauseError';
  }
}

/** An operation that requires the breaker to be unpaused ran while it was paused. */
export class EnforcedPauseError extends PauseError {
  constructor() {
    super('ENFORCED_PAUSE', 'Operation is not allowed while paused');
    this.name = 'EnforcedPauseError';
  }
}

/** An operation that requires the breaker to be paused ran while it was unpaused. */
export class ExpectedPauseError extends PauseError {
  constructor() {
    super('EXPECTED_PAUSE', 'Operation requires the breaker to be paused');
    this.name = 'ExpectedPauseError';
  }
}

export class PauseDurationNotElapsedError extends PauseError {
  constructor(
    public readonly deadline: number,
    public readonly now: number
  ) {
    super(
      'PAUSE_DURATION_NOT_ELAPSED',
      `Pause duration has not elapsed (deadline ${deadline}, now ${now})`
    );
    this.name = 'PauseDurationNotElapsedError';
  }
}

export class DeadlineOverflowError extends PauseError {
  constructor(now: number, duration: number) {
    super(
      'DEADLINE_OVERFLOW',
      `Deadline ${now} + ${duration} does not fit in 48 bits`
    );
    this.name = 'DeadlineOverflowError';
  }
}

export class ClockOverflowError extends PauseError {
  constructor(value: number) {
    super('CLOCK_OVERFLOW', `Clock value ${value} does not fit in 48 bits`);
    this.name = 'ClockOverflowError';
  }
}

export class InvalidDurationError extends PauseError {
  constructor(duration: number) {
    super(
      'INVALID_DURATION',
      `Pause duration must be a non-negative integer, got ${duration}`
    );
    this.name = 'InvalidDurationError';
  }
}

export class InvalidPauseWordError extends PauseError {
  constructor(reason: string) {
    super('INVALID_PAUSE_WORD', `Invalid pause word: ${reason}`);
    this.name = 'InvalidPauseWordError';
  }
}
