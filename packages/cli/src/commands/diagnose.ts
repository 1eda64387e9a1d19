/**
 * @module commands/diagnose
 * `autodiag diagnose`: Rank likely parts for a fault report without recording it.
 */

import { Command } from 'commander';
import type { AutoDiagConfig, KnowledgeBase, Suggestion } from 'autodiag-core';

// ── ANSI colours ──────────────────────────────────────────────────────
const BOLD = '\x1b[1m';
const CYAN = '\x1b[36m';
const RED = '\x1b[31m';
const GRAY = '\x1b[90m';
const RESET = '\x1b[0m';

const PART_COLUMN_WIDTH = 28;

export function formatSuggestion(suggestion: Suggestion, rank: number): string {
  const percent = `${(suggestion.likelihood * 100).toFixed(1)}%`.padStart(6);
  return `  ${rank}. ${suggestion.part.padEnd(PART_COLUMN_WIDTH)} ${CYAN}${percent}${RESET}  ${GRAY}${suggestion.reason}${RESET}`;
}

export async function resolveKnowledgeBase(config: AutoDiagConfig): Promise<KnowledgeBase> {
  const { BUILT_IN_KNOWLEDGE_BASE, loadKnowledgeBase } = await import('autodiag-core');
  return config.knowledge.path ? loadKnowledgeBase(config.knowledge.path) : BUILT_IN_KNOWLEDGE_BASE;
}

export function registerDiagnose(program: Command): void {
  program
    .command('diagnose')
    .description('Rank likely faulty parts for a fault code and description')
    .requiredOption('-d, --description <text>', 'Description of the problem')
    .option('-f, --fault-code <code>', 'OBD-II fault code, e.g. P0300')
    .option('--json', 'Print suggestions as JSON')
    .action(async (opts: { description: string; faultCode?: string; json?: boolean }) => {
      const { loadConfig, ScoringEngine, errorMessage } = await import('autodiag-core');
      const configPath = program.opts<{ config?: string }>().config;

      let suggestions: Suggestion[];
      try {
        const { config } = await loadConfig(configPath);
        const engine = new ScoringEngine(await resolveKnowledgeBase(config));
        suggestions = engine.diagnose(opts.faultCode, opts.description);
      } catch (err) {
        console.error(`${RED}${errorMessage(err)}${RESET}`);
        process.exitCode = 1;
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(suggestions, null, 2));
        return;
      }

      const label = opts.faultCode?.trim() ? opts.faultCode.trim().toUpperCase() : 'no fault code';
      console.log(`\n${BOLD}Likely parts (${label})${RESET}\n`);
      if (suggestions.length === 0) {
        console.log(`  ${GRAY}No candidates in the knowledge base${RESET}`);
      }
      suggestions.forEach((s, i) => console.log(formatSuggestion(s, i + 1)));
      console.log('');
    });
}
