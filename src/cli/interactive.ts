import { average } from '../core/analysis/status.js';
import { formatClock, formatHours } from '../utils/format.js';
import { InputError } from '../utils/errors.js';
import { withLedger, type CliDeps } from './context.js';
import { banner, hoursColor } from './render.js';
import { HISTORY_RANGES } from '../core/analysis/history.js';
import { catchUp, catchUpAction } from './commands/missing.js';
import { initAction } from './commands/init.js';
import { logAction } from './commands/log.js';
import { recommendAction } from './commands/recommend.js';
import { planAction } from './commands/plan.js';
import { statusAction } from './commands/status.js';
import { historyAction } from './commands/history.js';

interface Dashboard {
  missing: number;
  bedtime?: string;
}

async function showDashboard(deps: CliDeps): Promise<Dashboard> {
  const { chalk } = deps;
  const dashboard: Dashboard = { missing: 0 };

  await withLedger(deps, (ledger) => {
    const entries = ledger.entries;
    const recent = ledger.recent();
    const debt = ledger.totalDebt();
    const avg = average(entries.map((entry) => entry.hours));
    const recentAvg = average(recent.map((entry) => entry.hours));
    dashboard.missing = ledger.missingDays(deps.now()).length;

    for (const line of banner('SLEEPDEBT - Sleep Debt Tracker', chalk)) deps.print(line);
    deps.print(`  ${chalk.bold('Total nights tracked:')} ${entries.length}`);
    deps.print(`  ${chalk.bold('Average sleep:')}        ${hoursColor(avg, chalk)(formatHours(avg))} hrs/night`);
    deps.print(`  ${chalk.bold('Last 7 nights avg:')}    ${hoursColor(recentAvg, chalk)(formatHours(recentAvg))} hrs/night`);
    deps.print(`  ${chalk.bold('Total sleep debt:')}     ${(debt > 0 ? chalk.red : chalk.green)(formatHours(Math.abs(debt)))} hours`);

    const nightly = ledger.nightlyTarget();
    dashboard.bedtime = formatClock(nightly.bedtime);
    if (!nightly.atOrAboveTarget) {
      deps.print('');
      deps.print(
        `  ${chalk.bold('Tonight:')} Sleep ${chalk.green(formatHours(nightly.targetTonight))} hrs → Bed by ${chalk.magenta(dashboard.bedtime)}`
      );
    }

    const last = ledger.latest();
    if (last) {
      deps.print('');
      deps.print(`  ${chalk.dim(`Last entry: ${last.date} - ${formatHours(last.hours)} hrs`)}`);
    }
  });
  return dashboard;
}

function showMenu(deps: CliDeps, missing: number): void {
  const { chalk } = deps;
  deps.print('');
  deps.print(chalk.bold('─'.repeat(60)));
  if (missing > 0) {
    deps.print(`  ${chalk.yellow('0')}  Catch up on missing days (${chalk.yellow(`${missing} day${missing > 1 ? 's' : ''}`)})`);
  } else {
    deps.print(`  ${chalk.dim('0  Catch up on missing days (none)')}`);
  }
  deps.print(`  ${chalk.cyan('1')}  Log sleep`);
  deps.print(`  ${chalk.cyan('2')}  View recommendations`);
  deps.print(`  ${chalk.cyan('3')}  View recovery plan`);
  deps.print(`  ${chalk.cyan('4')}  View full status`);
  deps.print(`  ${chalk.cyan('5')}  View history`);
  deps.print(`  ${chalk.cyan('q')}  Quit`);
  deps.print(chalk.bold('─'.repeat(60)));
}

async function promptLog(deps: CliDeps): Promise<void> {
  deps.print(deps.chalk.bold.cyan('Log Sleep Entry'));
  const date = await deps.prompter.ask('Date (YYYY-MM-DD, MM-DD, today, yesterday) [today]: ');
  const hours = await deps.prompter.ask('Hours slept (h:mm, e.g., 7:30): ');
  if (!hours) {
    deps.print(deps.chalk.yellow('Cancelled.'));
    return;
  }
  await logAction(deps, date || 'today', hours);
}

async function promptHistory(deps: CliDeps): Promise<void> {
  const { chalk } = deps;
  deps.print(chalk.bold.cyan('View Sleep History'));
  HISTORY_RANGES.forEach((range, index) => deps.print(`  ${chalk.cyan(String(index + 1))}  ${range.label}`));
  deps.print(`  ${chalk.dim('b  Back to main menu')}`);

  const choice = (await deps.prompter.ask('Select range: ')).toLowerCase();
  if (choice === 'b') return;
  const range = HISTORY_RANGES[Number(choice) - 1];
  if (!/^\d+$/.test(choice) || !range) {
    deps.print(chalk.yellow('Invalid selection.'));
    return;
  }
  await historyAction(deps, range.days);
}

async function offerSetup(deps: CliDeps): Promise<void> {
  let empty = false;
  let missing = 0;
  await withLedger(deps, (ledger) => {
    empty = ledger.isEmpty();
    missing = ledger.missingDays(deps.now()).length;
  });

  if (empty) {
    deps.print(deps.chalk.yellow('No sleep data found.'));
    const answer = (await deps.prompter.ask('Load 30 days of sample data? [y/N]: ')).toLowerCase();
    if (answer === 'y') await initAction(deps);
    return;
  }

  if (missing > 0) {
    deps.print(deps.chalk.yellow.bold(`You have ${missing} day(s) with missing sleep data.`));
    const answer = (await deps.prompter.ask('Would you like to fill them in now? [Y/n]: ')).toLowerCase();
    if (answer !== 'n') {
      await withLedger(deps, async (ledger) => (await catchUp(deps, ledger)) > 0);
    }
  }
}

/** Menu loop run when no command is given. Input errors are reported and the loop continues. */
export async function runInteractive(deps: CliDeps): Promise<void> {
  await offerSetup(deps);

  for (;;) {
    const { missing, bedtime } = await showDashboard(deps);
    showMenu(deps, missing);
    const choice = (await deps.prompter.ask('Choose option: ')).toLowerCase();

    if (choice === 'q' || choice === 'quit' || choice === 'exit') {
      deps.print(deps.chalk.green(`Sleep well! Aim for bed by ${bedtime ?? '--:--'} tonight.`));
      return;
    }

    try {
      switch (choice) {
        case '0':
          await catchUpAction(deps);
          break;
        case '1':
          await promptLog(deps);
          break;
        case '2':
          await recommendAction(deps);
          break;
        case '3':
          await planAction(deps);
          break;
        case '4':
          await statusAction(deps);
          break;
        case '5':
          await promptHistory(deps);
          break;
        default:
          deps.print(deps.chalk.yellow('Invalid option. Please enter 0-5 or q.'));
      }
    } catch (error) {
      if (!(error instanceof InputError)) throw error;
      deps.print(deps.chalk.red(error.message));
    }

    await deps.prompter.ask(deps.chalk.dim('Press Enter to continue...'));
    deps.print('');
  }
}
