/**
 * @module commands/serve
 * `autodiag serve`: Start the HTTP API.
 */

import { Command } from 'commander';
import { parsePort } from './options.js';

// ── ANSI colours ──────────────────────────────────────────────────────
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const GRAY = '\x1b[90m';
const RESET = '\x1b[0m';

export function registerServe(program: Command): void {
  program
    .command('serve')
    .description('Start the AutoDiag HTTP API')
    .option('-p, --port <port>', 'Port to listen on (overrides config)', parsePort)
    .action(async (opts: { port?: number }) => {
      // Lazy import to keep --help/--version free of the server stack
      const { startApiServer } = await import('autodiag-api');
      const { errorMessage } = await import('autodiag-core');

      const configPath = program.opts<{ config?: string }>().config;

      try {
        const { loaded } = await startApiServer(configPath, opts.port);
        const { host } = loaded.config.server;
        const port = opts.port ?? loaded.config.server.port;

        console.log(`\n${BOLD}AutoDiag API${RESET} running on ${GREEN}http://${host}:${port}${RESET}`);
        console.log(`${GRAY}   Config: ${loaded.configPath ?? '(defaults)'}${RESET}`);
        console.log(`${GRAY}   Storage: ${loaded.config.database.storage}${RESET}\n`);
      } catch (err) {
        console.error(`${RED}Failed to start AutoDiag API: ${errorMessage(err)}${RESET}`);
        process.exitCode = 1;
      }
    });
}
