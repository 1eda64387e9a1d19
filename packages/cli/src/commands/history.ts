/**
 * @module commands/history
 * `autodiag history`: Show recorded diagnoses from the configured store.
 */

import { Command } from 'commander';
import { parsePositiveInt } from './options.js';

// ── ANSI colours ──────────────────────────────────────────────────────
const BOLD = '\x1b[1m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const GRAY = '\x1b[90m';
const RESET = '\x1b[0m';

export function registerHistory(program: Command): void {
  program
    .command('history')
    .description('List recorded diagnoses, newest first')
    .option('-n, --limit <n>', 'Number of records to show', parsePositiveInt, 20)
    .action(async (opts: { limit: number }) => {
      const {
        loadConfig,
        createDocumentStore,
        DiagnosisService,
        ScoringEngine,
        errorMessage,
      } = await import('autodiag-core');
      const configPath = program.opts<{ config?: string }>().config;

      let loaded;
      try {
        loaded = await loadConfig(configPath);
      } catch (err) {
        console.error(`${RED}Failed to load config: ${errorMessage(err)}${RESET}`);
        process.exitCode = 1;
        return;
      }

      const store = createDocumentStore(loaded.config.database, loaded.configDir);
      try {
        if (!store.describe().connected) {
          console.log(`${YELLOW}Persistence is disabled (database.storage: ${loaded.config.database.storage})${RESET}`);
          return;
        }

        const service = new DiagnosisService(new ScoringEngine(), store);
        const { items } = service.history({ limit: opts.limit });

        console.log(`\n${BOLD}Recent diagnoses (${items.length})${RESET}\n`);
        for (const item of items) {
          const top = Array.isArray(item['suggestions']) ? item['suggestions'][0] : undefined;
          const topPart = isPartEntry(top) ? top.part : '-';
          const code = typeof item['fault_code'] === 'string' ? item['fault_code'] : '-';
          console.log(`  ${GRAY}${item.created_at}${RESET}  ${String(item['name'])} ${String(item['model'])}  [${code}]  → ${topPart}`);
        }
        console.log('');
      } finally {
        store.close();
      }
    });
}

function isPartEntry(value: unknown): value is { part: string } {
  return typeof value === 'object' && value !== null && 'part' in value && typeof value.part === 'string';
}
