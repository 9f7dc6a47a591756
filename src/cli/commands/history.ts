import type { Command } from 'commander';
import { HISTORY_RANGES, analyzeRange } from '../../core/analysis/history.js';
import { printJson, printLines, withLedger, type CliDeps } from '../context.js';
import { renderHistory } from '../render.js';
import { parsePositiveInt, type JsonOption } from './options.js';

interface HistoryOptions extends JsonOption {
  range?: number;
  all?: boolean;
}

const DEFAULT_RANGE_DAYS = 30;

export function rangeLabel(days: number | null): string {
  if (days === null) return 'All data';
  return HISTORY_RANGES.find((range) => range.days === days)?.label ?? `${days} days`;
}

export async function historyAction(deps: CliDeps, days: number | null, options: JsonOption = {}): Promise<void> {
  await withLedger(deps, (ledger) => {
    const label = rangeLabel(days);
    const analysis = analyzeRange(ledger.entries, ledger.settings, days, deps.now());
    if (options.json) {
      printJson(deps, { range: label, analysis });
      return;
    }
    if (!analysis) {
      deps.print(deps.chalk.yellow(`No data available for the last ${label}.`));
      return;
    }
    printLines(deps, renderHistory(analysis, label, deps.chalk));
  });
}

export function registerHistoryCommand(program: Command, deps: CliDeps): void {
  program
    .command('history')
    .description('Analyze sleep over a range of days')
    .option('-r, --range <days>', 'Days to look back', parsePositiveInt, DEFAULT_RANGE_DAYS)
    .option('--all', 'Use all recorded nights')
    .option('--json', 'Output as JSON')
    .action(async (options: HistoryOptions) => {
      await historyAction(deps, options.all ? null : options.range ?? DEFAULT_RANGE_DAYS, options);
    });
}
