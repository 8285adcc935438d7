#!/usr/bin/env node
/**
 * rankctl - Confession ranking admin CLI
 *
 * Entry point for the `rankctl` command.
 *
 * @module cli/bin/rankctl
 */

import { Command } from 'commander';
import { registerCommands } from '../commands/index.js';
import { handleError } from '../utils.js';

const program = new Command();

program
  .name('rankctl')
  .description('Inspect and operate the confession ranking engine')
  .version('0.1.0');

registerCommands(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  handleError(error);
});
