// Core types for the pause breaker

export type PauseFlag = 'unpaused' | 'paused';

/** In-memory form of the breaker state. The packed form only exists in pause-word.ts. */
export interface PauseState {
  flag: PauseFlag;
  /** uint48 seconds; 0 when no duration was set */
  deadline: number;
}

export type PauseKind = 'unpaused' | 'indefinite' | 'forDuration';

export type Actor = string;

export type ActorSupplier = () => Actor;

export type PauseEvent =
  | { type: 'paused'; actor: Actor }
  | { type: 'pausedFor'; actor: Actor; duration: number; deadline: number }
  | { type: 'unpaused'; actor: Actor };

export type PauseListener = (event: PauseEvent) => void;

export interface Clock {
  /** Current instant as uint48 seconds. Never decreases. */
  now(): number;
  /** Describes how to read `now()` and deadlines, e.g. "mode=timestamp&unit=seconds". */
  clockMode(): string;
}

export interface PausableOptions {
  clock: Clock;
  actor: ActorSupplier;
  listeners?: PauseListener[];
  /**
   * Called for each listener that throws. The transition has already been
   * applied by then and the remaining listeners still run.
   * Defaults to a console warning.
   */
  onListenerError?: (error: unknown, event: PauseEvent) => void;
}

/** Read-only view used by the CLI status output and the state file. */
export interface PauseStatusView {
  paused: boolean;
  kind: PauseKind;
  deadline: number;
  now: number;
  /** seconds until the deadline; 0 when there is none or it has passed */
  remaining: number;
  clockMode: string;
}
