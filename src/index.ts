#!/usr/bin/env node

import { Command } from 'commander';
import { createRequire } from 'module';
import { createConfigCommand } from './commands/config.js';
import {
  createStatusCommand,
  createPauseCommand,
  createUnpauseCommand,
  createReleaseCommand,
} from './commands/breaker.js';

const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');

const program = new Command();

program
  .name('pausekit')
  .description('Emergency stop for a component: pause, pause for a duration, unpause')
  .version(packageJson.version);

program.addCommand(createStatusCommand());
program.addCommand(createPauseCommand());
program.addCommand(createUnpauseCommand());
program.addCommand(createReleaseCommand());
program.addCommand(createConfigCommand());

program.parse();
