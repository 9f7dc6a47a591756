import type { Command } from 'commander';
import { printJson, printLines, withLedger, type CliDeps } from '../context.js';
import { renderRecommendations } from '../render.js';
import type { JsonOption } from './options.js';

export async function recommendAction(deps: CliDeps, options: JsonOption = {}): Promise<void> {
  await withLedger(deps, (ledger) => {
    if (ledger.isEmpty()) {
      if (options.json) printJson(deps, { debt: 0, recommendations: [] });
      else deps.print(deps.chalk.yellow('No sleep data. Add some entries first.'));
      return;
    }
    const recommendations = ledger.recommendations();
    const nightly = ledger.nightlyTarget();
    if (options.json) {
      printJson(deps, { debt: nightly.debt, tonight: nightly, recommendations });
      return;
    }
    printLines(deps, renderRecommendations(recommendations, nightly, ledger.settings, deps.chalk));
  });
}

export function registerRecommendCommand(program: Command, deps: CliDeps): void {
  program
    .command('recommend')
    .description('Get personalized recommendations')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOption) => {
      await recommendAction(deps, options);
    });
}
