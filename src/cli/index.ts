#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { registerForwardCommands } from './commands/forward';
import { registerCheckCommands } from './commands/check';
import { registerConfigCommands } from './commands/config';
import chalk from 'chalk';
import { errorMessage } from './options';

const program = new Command();

program
  .name('vfwd')
  .description('Voice Forwarder - relay voice transcripts to a remote shell over ssh');

registerForwardCommands(program);
registerCheckCommands(program);
registerConfigCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`✗ Error: ${errorMessage(error)}`));
  process.exit(1);
});
