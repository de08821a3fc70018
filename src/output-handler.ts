/**
 * Output handler interface for breaker commands.
 * Transition notifications arrive through notify(); the CLI registers it as a listener.
 */

import chalk from 'chalk';
import { PauseError, type PauseEvent, type PauseStatusView } from './core/index.js';

export interface PauseOutputHandler {
  notify(event: PauseEvent): void;
  status(view: PauseStatusView, statePath: string): void;
  error(error: unknown): void;
}

export function describeEvent(event: PauseEvent): string {
  switch (event.type) {
    case 'paused':
      return `Paused by ${event.actor}`;
    case 'pausedFor':
      return `Paused by ${event.actor} for ${event.duration}s (until ${event.deadline})`;
    case 'unpaused':
      return `Unpaused by ${event.actor}`;
  }
}

/**
 * Console-based output handler
 */
export class ConsoleOutputHandler implements PauseOutputHandler {
  notify(event: PauseEvent): void {
    const line = describeEvent(event);
    if (event.type === 'unpaused') {
      console.log(chalk.green(`✓ ${line}`));
    } else {
      console.log(chalk.yellow(`⏸ ${line}`));
    }
  }

  status(view: PauseStatusView, statePath: string): void {
    console.log(chalk.bold('\nBreaker Status\n'));

    if (!view.paused) {
      console.log(chalk.green('✓ Unpaused'));
    } else if (view.kind === 'indefinite') {
      console.log(chalk.yellow('⏸ Paused indefinitely'));
      console.log(chalk.gray('  Lift with: pausekit unpause'));
    } else if (view.remaining > 0) {
      console.log(chalk.yellow(`⏸ Paused until ${view.deadline} (${view.remaining}s remaining)`));
      console.log(chalk.gray('  Lift early with: pausekit unpause'));
    } else {
      console.log(chalk.yellow(`⏸ Paused, deadline ${view.deadline} has passed`));
      console.log(chalk.gray('  Anyone can lift it with: pausekit release'));
    }

    console.log();
    console.log(chalk.gray(`  Clock:  ${view.now} (${view.clockMode})`));
    console.log(chalk.gray(`  State:  ${statePath}`));
  }

  error(error: unknown): void {
    if (error instanceof PauseError) {
      console.error(chalk.red(`✗ ${error.message}`));
      console.error(chalk.gray(`  Code: ${error.code}`));
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`✗ ${message}`));
  }
}
