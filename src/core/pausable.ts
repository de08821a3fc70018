import {
  DeadlineOverflowError,
  EnforcedPauseError,
  ExpectedPauseError,
  InvalidDurationError,
  PauseDurationNotElapsedError,
} from './errors.js';
import { packPauseWord, unpackPauseWord } from './pause-word.js';
import { addUint48 } from './uint48.js';
import type {
  ActorSupplier,
  Clock,
  PausableOptions,
  PauseEvent,
  PauseKind,
  PauseListener,
  PauseState,
  PauseStatusView,
} from './types.js';

const UNPAUSED_STATE: PauseState = { flag: 'unpaused', deadline: 0 };

/**
 * Pausable - emergency stop for a host component
 *
 * States: unpaused, paused indefinitely, paused until a deadline.
 * An elapsed deadline does not unpause on its own: the breaker stays paused
 * until `unpause()` or the permissionless `unpauseIfDurationElapsed()` runs.
 *
 * No transition checks permissions. Hosts wrap `pause`, `pauseFor` and
 * `unpause` with their own authorization and leave `unpauseIfDurationElapsed`
 * open so a time-bounded pause can always be lifted.
 *
 * Every check runs before any write; a failed call leaves the state untouched
 * and notifies nobody. Listeners run after the write, each isolated: a
 * throwing listener goes to `onListenerError` and never fails the transition.
 */
export class Pausable {
  private state: PauseState = UNPAUSED_STATE;
  private readonly clockSource: Clock;
  private readonly actor: ActorSupplier;
  private readonly listeners = new Set<PauseListener>();
  private readonly onListenerError: (error: unknown, event: PauseEvent) => void;

  constructor(options: PausableOptions) {
    this.clockSource = options.clock;
    this.actor = options.actor;
    this.onListenerError =
      options.onListenerError ??
      ((error, event) => {
        console.warn(`Pause listener failed on "${event.type}":`, error);
      });
    for (const listener of options.listeners ?? []) {
      this.listeners.add(listener);
    }
  }

  /**
   * Restore a breaker from a packed word (see pause-word.ts).
   */
  static fromWord(word: bigint, options: PausableOptions): Pausable {
    const breaker = new Pausable(options);
    breaker.state = unpackPauseWord(word);
    return breaker;
  }

  // --- Queries ---

  isPaused(): boolean {
    if (this.state.flag === 'paused') return true;
    return this.state.deadline !== 0 && this.clockSource.now() < this.state.deadline;
  }

  /**
   * Raw deadline, 0 when unset. Zero means "never paused", "paused without a
   * duration" or "cleared" alike, so use isPaused() for status checks.
   */
  pauseDeadline(): number {
    return this.state.deadline;
  }

  pauseKind(): PauseKind {
    if (!this.isPaused()) return 'unpaused';
    return this.state.deadline === 0 ? 'indefinite' : 'forDuration';
  }

  clock(): number {
    return this.clockSource.now();
  }

  clockMode(): string {
    return this.clockSource.clockMode();
  }

  snapshot(): PauseState {
    return { ...this.state };
  }

  toWord(): bigint {
    return packPauseWord(this.state);
  }

  status(): PauseStatusView {
    const now = this.clockSource.now();
    const deadline = this.state.deadline;
    return {
      paused: this.isPaused(),
      kind: this.pauseKind(),
      deadline,
      now,
      remaining: deadline > now ? deadline - now : 0,
      clockMode: this.clockSource.clockMode(),
    };
  }

  // --- Guards ---

  requireNotPaused(): void {
    if (this.isPaused()) {
      throw new EnforcedPauseError();
    }
  }

  requirePaused(): void {
    if (!this.isPaused()) {
      throw new ExpectedPauseError();
    }
  }

  // --- Transitions ---

  pause(): void {
    this.requireNotPaused();
    const actor = this.actor();
    this.state = { flag: 'paused', deadline: 0 };
    this.emit({ type: 'paused', actor });
  }

  /**
   * Pause until `now + duration` seconds. A zero duration is a silent no-op
   * (no state change, no notification), but only once the breaker is known
   * to be unpaused.
   */
  pauseFor(duration: number): void {
    this.requireNotPaused();
    if (!Number.isSafeInteger(duration) || duration < 0) {
      throw new InvalidDurationError(duration);
    }
    if (duration === 0) return;

    const now = this.clockSource.now();
    const deadline = addUint48(now, duration);
    if (deadline === null) {
      throw new DeadlineOverflowError(now, duration);
    }

    const actor = this.actor();
    this.state = { flag: 'paused', deadline };
    this.emit({ type: 'pausedFor', actor, duration, deadline });
  }

  unpause(): void {
    this.requirePaused();
    this.reset();
  }

  /**
   * Lift a pause whose deadline has been reached (`now >= deadline`).
   * An indefinite pause has no deadline and is lifted immediately.
   */
  unpauseIfDurationElapsed(): void {
    this.requirePaused();
    const deadline = this.state.deadline;
    if (deadline !== 0) {
      const now = this.clockSource.now();
      if (now < deadline) {
        throw new PauseDurationNotElapsedError(deadline, now);
      }
    }
    this.reset();
  }

  // --- Notifications ---

  /**
   * Subscribe to transition notifications. Returns the unsubscribe function.
   */
  on(listener: PauseListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private reset(): void {
    const actor = this.actor();
    this.state = UNPAUSED_STATE;
    this.emit({ type: 'unpaused', actor });
  }

  private emit(event: PauseEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.onListenerError(error, event);
      }
    }
  }
}
