import type { Command } from 'commander';
import { buildCalendar } from '../../core/analysis/calendar.js';
import { printJson, printLines, withLedger, type CliDeps } from '../context.js';
import { renderCalendar } from '../render.js';
import { parsePositiveInt, type JsonOption } from './options.js';

interface CalendarOptions extends JsonOption {
  weeks?: number;
}

export async function calendarAction(deps: CliDeps, options: CalendarOptions = {}): Promise<void> {
  await withLedger(deps, (ledger) => {
    if (ledger.isEmpty()) {
      deps.print(deps.chalk.yellow("No sleep data. Run 'sleepdebt init' first."));
      return;
    }
    const weeks = buildCalendar(ledger.entries, options.weeks ?? 3, deps.now());
    if (options.json) {
      printJson(deps, weeks);
      return;
    }
    printLines(deps, renderCalendar(weeks, deps.chalk));
  });
}

export function registerCalendarCommand(program: Command, deps: CliDeps): void {
  program
    .command('calendar')
    .description('Show calendar view')
    .option('-w, --weeks <weeks>', 'Weeks ahead', parsePositiveInt, 3)
    .option('--json', 'Output as JSON')
    .action(async (options: CalendarOptions) => {
      await calendarAction(deps, options);
    });
}
