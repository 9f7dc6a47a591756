import type { Command } from 'commander';
import { generateSampleEntries } from '../../core/analysis/sample.js';
import { InputError } from '../../utils/errors.js';
import { formatHours } from '../../utils/format.js';
import { withLedger, type CliDeps } from '../context.js';

const SAMPLE_DAYS = 30;

interface InitOptions {
  force?: boolean;
}

export async function initAction(deps: CliDeps, options: InitOptions = {}): Promise<void> {
  const { chalk } = deps;
  await withLedger(deps, (ledger, store) => {
    if (store.exists() && !options.force) {
      throw new InputError(`${store.location} already has data; use --force to add sample nights anyway`, 'LEDGER_EXISTS');
    }
    for (const entry of generateSampleEntries(deps.now(), SAMPLE_DAYS, deps.random)) {
      ledger.upsert(entry);
    }
    ledger.updateProfile({ notes: 'Sample user data' });

    const debt = ledger.totalDebt();
    deps.print(chalk.green(`Initialized with ${SAMPLE_DAYS} days of sample data`));
    deps.print(`Total sleep debt: ${(debt > 0 ? chalk.red : chalk.green)(formatHours(Math.abs(debt)))} hours`);
    deps.print('');
    deps.print(`Run '${chalk.cyan('sleepdebt status')}' to see full report`);
    deps.print(`Run '${chalk.cyan('sleepdebt recommend')}' for personalized advice`);
    return true;
  });
}

export function registerInitCommand(program: Command, deps: CliDeps): void {
  program
    .command('init')
    .description(`Fill the ledger with ${SAMPLE_DAYS} days of sample data`)
    .option('-f, --force', 'Add sample nights even if data already exists')
    .action(async (options: InitOptions) => {
      await initAction(deps, options);
    });
}
