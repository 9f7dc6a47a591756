import type { Command } from 'commander';
import { summarizeStatus } from '../../core/analysis/status.js';
import { printJson, printLines, withLedger, type CliDeps } from '../context.js';
import { renderStatus } from '../render.js';
import type { JsonOption } from './options.js';

export async function statusAction(deps: CliDeps, options: JsonOption = {}): Promise<void> {
  await withLedger(deps, (ledger) => {
    const summary = summarizeStatus(ledger.entries, ledger.settings);
    if (options.json) {
      printJson(deps, { ...ledger.debtSummary(), status: summary });
      return;
    }
    if (!summary) {
      deps.print(deps.chalk.yellow('No sleep data recorded yet.'));
      deps.print('Use: sleepdebt log <date> <hours:minutes>');
      return;
    }
    printLines(deps, renderStatus(summary, deps.chalk));
  });
}

export function registerStatusCommand(program: Command, deps: CliDeps): void {
  program
    .command('status')
    .description('Show sleep status and debt')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOption) => {
      await statusAction(deps, options);
    });
}
