/**
 * @module program
 * Builds the `autodiag` command tree.
 */

import { Command } from 'commander';
import { registerServe } from './commands/serve.js';
import { registerDiagnose } from './commands/diagnose.js';
import { registerHistory } from './commands/history.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('autodiag')
    .description('Rank likely faulty car parts from OBD-II codes and symptoms')
    .version('0.1.0')
    .option('-c, --config <path>', 'autodiag.yaml config file path');

  // Register sub-commands
  registerServe(program);
  registerDiagnose(program);
  registerHistory(program);

  return program;
}
