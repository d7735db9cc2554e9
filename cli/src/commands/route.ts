import chalk from 'chalk';
import { Command } from 'commander';
import { parseISO, isValid } from 'date-fns';
import { loadRoutingSettings } from '../core/config.js';
import { routeQuery } from '../core/routing/index.js';
import type { RoutingResult, ToolSuggestion } from '../core/routing/index.js';

/** Stable JSON payload for `route --json`. */
export function toRoutingJson(result: RoutingResult) {
  return {
    query: result.query,
    outcome: result.outcome,
    dateRange: result.dateRange,
    clarificationNeeded: result.clarificationNeeded,
    resultCount: result.matchedTools.length,
    matchedTools: result.matchedTools.map((s, i) => ({
      rank: i + 1,
      toolName: s.toolName,
      score: Math.round(s.score * 100) / 100,
      confidence: s.confidence,
      purpose: s.purpose,
      keyParams: s.keyParams,
      suggestedParams: s.suggestedParams,
    })),
  };
}

/** Parse `--today` as a calendar date; undefined means "now". */
export function parseTodayOption(value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = /^\d{4}-\d{2}-\d{2}$/.test(value) ? parseISO(value) : new Date(Number.NaN);
  if (!isValid(date)) throw new Error(`Invalid --today date: ${value} (expected YYYY-MM-DD)`);
  return date;
}

function printSuggestion(s: ToolSuggestion, rank: number): void {
  const tag = s.confidence === 'definitive' ? chalk.green('definitive') : chalk.yellow('context-dependent');
  console.log(chalk.cyan(`  ${rank}. ${s.toolName}`) + chalk.dim(` (score ${Math.round(s.score * 100) / 100}, `) + tag + chalk.dim(')'));
  if (s.purpose) console.log(chalk.dim(`     ${s.purpose}`));
  const params = Object.entries(s.suggestedParams);
  if (params.length > 0) {
    console.log(chalk.dim(`     params: ${params.map(([k, v]) => `${k}=${String(v)}`).join(', ')}`));
  }
}

export function registerRouteCommand(program: Command): void {
  program
    .command('route')
    .alias('r')
    .description('Route a natural-language question to accounting tools')
    .argument('<query...>', 'Question (e.g. "unpaid invoices", "penjualan bulan ini")')
    .option('--today <date>', 'Reference date for relative phrases (YYYY-MM-DD)')
    .option('--json', 'Output as JSON')
    .action((queryParts: string[], opts: { today?: string; json?: boolean }) => {
      try {
        const query = queryParts.join(' ');
        const result = routeQuery(query, {
          today: parseTodayOption(opts.today),
          settings: loadRoutingSettings(),
        });

        if (opts.json) {
          console.log(JSON.stringify(toRoutingJson(result), null, 2));
          return;
        }

        if (result.outcome === 'clarify') {
          console.log(chalk.yellow(`  ${result.clarificationNeeded ?? ''}`));
          return;
        }

        if (result.matchedTools.length === 0) {
          console.log(chalk.yellow(`  No matching tools for "${query}"`));
          return;
        }

        const via = result.outcome === 'pattern' ? 'matched a known phrase' : 'ranked by keywords';
        console.log('');
        console.log(chalk.bold(`  "${query}"`) + chalk.dim(` (${via})`));
        if (result.dateRange) {
          console.log(chalk.dim(`  dates: ${result.dateRange.startDate} .. ${result.dateRange.endDate}`));
        }
        console.log('');
        result.matchedTools.forEach((s, i) => printSuggestion(s, i + 1));
        console.log('');
      } catch (err) {
        console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
        process.exit(1);
      }
    });
}
