import type { Command } from 'commander';
import type { SleepLedger } from '../../core/ledger/SleepLedger.js';
import { buildEntry } from '../../adapters/input/entryBuilder.js';
import { parseDuration } from '../../adapters/input/inputParser.js';
import { parseIsoDate } from '../../utils/dates.js';
import { MalformedDurationError } from '../../utils/errors.js';
import { formatHours } from '../../utils/format.js';
import { printJson, printLines, withLedger, type CliDeps } from '../context.js';
import { hoursColor, renderMissing } from '../render.js';
import type { JsonOption } from './options.js';

const DAY_LABEL = new Intl.DateTimeFormat('en-US', { weekday: 'long', month: 'short', day: '2-digit' });

function dayLabel(iso: string): string {
  const date = parseIsoDate(iso);
  return date ? DAY_LABEL.format(date) : iso;
}

/**
 * Ask for the hours slept on each missing day. Blank answers skip the day;
 * malformed ones are reported and skipped. Returns how many nights were added.
 */
export async function catchUp(deps: CliDeps, ledger: SleepLedger): Promise<number> {
  const { chalk } = deps;
  const missing = ledger.missingDays(deps.now());
  if (missing.length === 0) {
    deps.print(chalk.green('All caught up! No missing days.'));
    return 0;
  }

  deps.print(chalk.bold.yellow('Missing Sleep Data'));
  deps.print(chalk.dim(`You have ${missing.length} day(s) without sleep records.`));
  deps.print(chalk.dim('Enter sleep duration for each, or press Enter to skip.'));

  let added = 0;
  for (const date of missing) {
    const answer = await deps.prompter.ask(`  ${chalk.cyan(dayLabel(date))} - Hours slept (h:mm): `);
    if (!answer) {
      deps.print(`    ${chalk.dim('Skipped')}`);
      continue;
    }

    let hours: number;
    try {
      hours = parseDuration(answer);
    } catch (error) {
      if (!(error instanceof MalformedDurationError)) throw error;
      deps.print(`    ${chalk.red('Invalid format, skipped')}`);
      continue;
    }

    ledger.upsert(buildEntry({ date, hours }, ledger.settings));
    added += 1;
    const deficit = ledger.settings.target - hours;
    const signed = deficit <= 0 ? chalk.green(`+${formatHours(-deficit)}`) : chalk.red(`-${formatHours(deficit)}`);
    deps.print(`    ${chalk.green('Added:')} ${hoursColor(hours, chalk)(formatHours(hours))} hrs (${signed})`);
  }

  if (added > 0) {
    const debt = ledger.totalDebt();
    deps.print(`${chalk.green(`${added} night(s) recorded.`)} Total sleep debt: ${(debt > 0 ? chalk.red : chalk.green)(formatHours(Math.abs(debt)))} hours`);
  }
  return added;
}

export async function missingAction(deps: CliDeps, options: JsonOption = {}): Promise<void> {
  await withLedger(deps, (ledger) => {
    const missing = ledger.missingDays(deps.now());
    if (options.json) printJson(deps, missing);
    else printLines(deps, renderMissing(missing, deps.chalk));
  });
}

export async function catchUpAction(deps: CliDeps): Promise<number> {
  let added = 0;
  await withLedger(deps, async (ledger) => {
    added = await catchUp(deps, ledger);
    return added > 0;
  });
  return added;
}

export function registerMissingCommands(program: Command, deps: CliDeps): void {
  program
    .command('missing')
    .description('List days since the last entry that have no record')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOption) => {
      await missingAction(deps, options);
    });

  program
    .command('catchup')
    .description('Fill in missing days one by one')
    .action(async () => {
      await catchUpAction(deps);
    });
}
