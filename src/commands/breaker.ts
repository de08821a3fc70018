import { Command, InvalidArgumentError } from 'commander';
import {
  SystemClock,
  type Clock,
  type Pausable,
  type PauseEvent,
  type PauseStatusView,
} from '../core/index.js';
import { getActor, getStateFilePath } from '../config.js';
import { openBreaker, saveBreakerState } from '../state.js';
import { ConsoleOutputHandler, type PauseOutputHandler } from '../output-handler.js';

export interface BreakerContext {
  statePath: string;
  clock: Clock;
  actor: () => string;
  output: PauseOutputHandler;
}

export function createDefaultContext(): BreakerContext {
  return {
    statePath: getStateFilePath(),
    clock: new SystemClock(),
    actor: getActor,
    output: new ConsoleOutputHandler(),
  };
}

export function parseDuration(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Duration must be a whole number of seconds.');
  }
  const seconds = Number(value);
  if (!Number.isSafeInteger(seconds)) {
    throw new InvalidArgumentError('Duration is too large.');
  }
  return seconds;
}

/**
 * Load the breaker, apply one transition and save it.
 * Notifications are held back until the save succeeds, so nothing is
 * reported for a transition that did not reach the state file.
 * Returns false (and sets a failing exit code) when the transition or the save throws.
 */
export function runTransition(
  ctx: BreakerContext,
  transition: (breaker: Pausable) => void
): boolean {
  const pending: PauseEvent[] = [];
  const breaker = openBreaker(ctx.statePath, {
    clock: ctx.clock,
    actor: ctx.actor,
    listeners: [(event) => pending.push(event)],
  });

  try {
    transition(breaker);
    saveBreakerState(ctx.statePath, breaker);
  } catch (error) {
    ctx.output.error(error);
    process.exitCode = 1;
    return false;
  }

  for (const event of pending) {
    ctx.output.notify(event);
  }
  return true;
}

export function readStatus(ctx: BreakerContext): PauseStatusView {
  const breaker = openBreaker(ctx.statePath, { clock: ctx.clock, actor: ctx.actor });
  return breaker.status();
}

export function createStatusCommand(getContext: () => BreakerContext = createDefaultContext): Command {
  return new Command('status')
    .description('Show whether the breaker is paused and until when')
    .action(() => {
      const ctx = getContext();
      ctx.output.status(readStatus(ctx), ctx.statePath);
    });
}

export function createPauseCommand(getContext: () => BreakerContext = createDefaultContext): Command {
  return new Command('pause')
    .description('Pause indefinitely, or for a number of seconds with --for')
    .option('--for <seconds>', 'Pause for a duration; anyone may release it afterwards', parseDuration)
    .action((options: { for?: number }) => {
      const duration = options.for;
      runTransition(getContext(), (breaker) => {
        if (duration === undefined) {
          breaker.pause();
        } else {
          breaker.pauseFor(duration);
        }
      });
    });
}

export function createUnpauseCommand(getContext: () => BreakerContext = createDefaultContext): Command {
  return new Command('unpause')
    .description('Lift the pause immediately')
    .action(() => {
      runTransition(getContext(), (breaker) => breaker.unpause());
    });
}

export function createReleaseCommand(getContext: () => BreakerContext = createDefaultContext): Command {
  return new Command('release')
    .description('Lift a pause whose duration has elapsed (no permission needed)')
    .action(() => {
      runTransition(getContext(), (breaker) => breaker.unpauseIfDurationElapsed());
    });
}
