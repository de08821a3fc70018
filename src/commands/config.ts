import { Command } from 'commander';
import chalk from 'chalk';
import {
  getActor,
  getActorSource,
  setActor,
  clearActor,
  validateActor,
  getStateFilePath,
  setStateFilePath,
  getConfigFilePath,
} from '../config.js';

interface ConfigOptions {
  show?: boolean;
  setActor?: string;
  clearActor?: boolean;
  stateFile?: string;
}

export function createConfigCommand(): Command {
  return new Command('config')
    .description('Configure pausekit settings')
    .option('--show', 'Show current configuration')
    .option('--set-actor <id>', 'Set the identity recorded on notifications')
    .option('--clear-actor', 'Clear the stored identity')
    .option('--state-file <path>', 'Set where the breaker state is stored')
    .action((options: ConfigOptions) => {
      if (options.clearActor) {
        clearActor();
        console.log(chalk.green('✓ Actor cleared'));
        return;
      }

      if (options.setActor !== undefined) {
        const actor = options.setActor;
        if (!validateActor(actor)) {
          console.log(chalk.red(`\n✗ Invalid actor: "${actor}"`));
          console.log(chalk.gray('  Use 1-64 characters without whitespace\n'));
          process.exitCode = 1;
          return;
        }
        setActor(actor);
        console.log(chalk.green(`\n✓ Actor set to "${actor}"\n`));
        return;
      }

      if (options.stateFile !== undefined) {
        setStateFilePath(options.stateFile);
        console.log(chalk.green(`\n✓ State file set to ${getStateFilePath()}\n`));
        return;
      }

      if (options.show) {
        const sourceLabels: Record<ReturnType<typeof getActorSource>, string> = {
          env: 'PAUSEKIT_ACTOR',
          config: 'config file',
          os: 'OS user',
        };

        console.log(chalk.bold('\nCurrent Configuration\n'));
        console.log(chalk.green(`✓ Actor: ${getActor()}`));
        console.log(chalk.gray(`  Source: ${sourceLabels[getActorSource()]}`));
        console.log();
        console.log(chalk.green(`✓ State file: ${getStateFilePath()}`));
        console.log(chalk.gray(`  Config: ${getConfigFilePath()}`));
        return;
      }

      // Default: show help
      console.log(chalk.bold('\npausekit config\n'));
      console.log(chalk.gray('Options:'));
      console.log(chalk.gray('  --show               Show current configuration'));
      console.log(chalk.gray('  --set-actor <id>     Set the identity recorded on notifications'));
      console.log(chalk.gray('  --clear-actor        Clear the stored identity'));
      console.log(chalk.gray('  --state-file <path>  Set where the breaker state is stored\n'));
    });
}
