import type { Command } from 'commander';
import type { SleepLedger } from '../../core/ledger/SleepLedger.js';
import type { SleepEntry } from '../../core/ledger/types.js';
import { buildEntry, type EntryInput } from '../../adapters/input/entryBuilder.js';
import { parseClockTime, parseDateArg, parseDuration } from '../../adapters/input/inputParser.js';
import { durationBetween } from '../../core/ledger/debt.js';
import { formatClock, formatHours } from '../../utils/format.js';
import { toIsoDate } from '../../utils/dates.js';
import { printJson, printLines, withLedger, type CliDeps } from '../context.js';
import { renderLogged } from '../render.js';
import type { JsonOption } from './options.js';

interface AddOptions extends JsonOption {
  date?: string;
  bedtime?: string;
  waketime?: string;
}

export function recordEntry(deps: CliDeps, ledger: SleepLedger, entry: SleepEntry, json = false): void {
  const action = ledger.upsert(entry);
  if (json) {
    printJson(deps, { action, entry, totalDebt: ledger.totalDebt() });
    return;
  }
  printLines(deps, renderLogged(action, entry, ledger.totalDebt(), ledger.nightlyTarget(), ledger.settings, deps.chalk));
}

/** `log <date> <hours>`: bedtime is derived from the profile wake time. */
export async function logAction(deps: CliDeps, dateArg: string, hoursArg: string, options: JsonOption = {}): Promise<void> {
  const date = parseDateArg(dateArg, deps.now());
  const hours = parseDuration(hoursArg);
  await withLedger(deps, (ledger) => {
    recordEntry(deps, ledger, buildEntry({ date, hours }, ledger.settings), options.json);
    return true;
  });
}

interface PromptDefaults {
  date?: string;
  waketime?: number;
}

// Values given as options become the defaults offered by the prompts.
async function promptForEntry(deps: CliDeps, ledger: SleepLedger, defaults: PromptDefaults = {}): Promise<EntryInput> {
  const { prompter } = deps;
  const wakeDefault = defaults.waketime ?? ledger.settings.wakeTime;
  const dateDefault = defaults.date ?? toIsoDate(deps.now());

  deps.print(deps.chalk.bold.cyan('Add Sleep Entry'));
  const dateInput = await prompter.ask(`Date [${dateDefault}]: `);
  const date = dateInput ? parseDateArg(dateInput, deps.now()) : dateDefault;
  const bedInput = await prompter.ask('Bedtime (HH:MM, e.g., 23:30): ');
  const wakeInput = await prompter.ask(`Wake time (HH:MM) [${formatClock(wakeDefault)}]: `);
  const waketime = wakeInput ? parseClockTime(wakeInput) : wakeDefault;

  if (!bedInput) {
    const hours = parseDuration(await prompter.ask('Total sleep (h:mm or decimal, e.g., 7:30 or 7.5): '));
    return { date, hours, waketime };
  }

  const bedtime = parseClockTime(bedInput);
  const hours = durationBetween(bedtime, waketime);
  deps.print(`Calculated sleep: ${deps.chalk.green(formatHours(hours))} hours`);
  const confirm = (await prompter.ask('Correct? [Y/n]: ')).toLowerCase();
  if (confirm !== 'n') {
    return { date, hours, bedtime, waketime };
  }
  // Time asleep differs from time in bed: keep the duration and wake time, derive the bedtime.
  const actual = parseDuration(await prompter.ask('Enter actual hours (h:mm or decimal): '));
  return { date, hours: actual, waketime };
}

/** `add [hours] -d -b -w`: explicit times; prompts when neither hours nor bedtime is given, offering -d and -w as defaults. */
export async function addAction(deps: CliDeps, hoursArg: string | undefined, options: AddOptions = {}): Promise<void> {
  await withLedger(deps, async (ledger) => {
    let input: EntryInput;
    if (hoursArg === undefined && options.bedtime === undefined) {
      const defaults: PromptDefaults = {};
      if (options.date !== undefined) defaults.date = parseDateArg(options.date, deps.now());
      if (options.waketime !== undefined) defaults.waketime = parseClockTime(options.waketime);
      input = await promptForEntry(deps, ledger, defaults);
    } else {
      input = { date: parseDateArg(options.date ?? 'today', deps.now()) };
      if (hoursArg !== undefined) input.hours = parseDuration(hoursArg);
      if (options.bedtime !== undefined) input.bedtime = parseClockTime(options.bedtime);
      if (options.waketime !== undefined) input.waketime = parseClockTime(options.waketime);
    }
    recordEntry(deps, ledger, buildEntry(input, ledger.settings), options.json);
    return true;
  });
}

export function registerLogCommands(program: Command, deps: CliDeps): void {
  program
    .command('log <date> <hours>')
    .description('Log sleep: date is YYYY-MM-DD, MM-DD, today or yesterday; hours is h:mm or decimal')
    .option('--json', 'Output as JSON')
    .action(async (date: string, hours: string, options: JsonOption) => {
      await logAction(deps, date, hours, options);
    });

  program
    .command('add [hours]')
    .description('Add an entry with bedtime and wake time')
    .option('-d, --date <date>', 'Date (YYYY-MM-DD, MM-DD, today, yesterday)')
    .option('-b, --bedtime <time>', 'Bedtime (HH:MM)')
    .option('-w, --waketime <time>', 'Wake time (HH:MM)')
    .option('--json', 'Output as JSON')
    .action(async (hours: string | undefined, options: AddOptions) => {
      await addAction(deps, hours, options);
    });
}
