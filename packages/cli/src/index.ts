#!/usr/bin/env node
import { Command } from 'commander';
import { stackexchangeCommand } from './commands/stackexchange';
import { gitblameCommand } from './commands/gitblame';
import { cacheCommand } from './commands/cache';
import { configCommand } from './commands/config';

const program = new Command();

program
  .name('harvest')
  .description('Fetch items from software-development data sources as stamped JSON records')
  .version('0.1.0');

// Connectors
program.addCommand(stackexchangeCommand);
program.addCommand(gitblameCommand);

// Storage
program.addCommand(cacheCommand);
program.addCommand(configCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
