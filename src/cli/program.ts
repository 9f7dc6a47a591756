import { Command } from 'commander';
import type { CliDeps } from './context.js';
import { runInteractive } from './interactive.js';
import { registerStatusCommand } from './commands/status.js';
import { registerLogCommands } from './commands/log.js';
import { registerRecommendCommand } from './commands/recommend.js';
import { registerPlanCommand } from './commands/plan.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerCalendarCommand } from './commands/calendar.js';
import { registerMissingCommands } from './commands/missing.js';
import { registerInitCommand } from './commands/init.js';
import { registerProfileCommand } from './commands/profile.js';

export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('sleepdebt')
    .description('Track sleep debt and plan recovery')
    .version('1.0.0')
    .addHelpText(
      'after',
      `
Run without a command for the interactive menu.

Examples:
  sleepdebt status                  Show current sleep status
  sleepdebt log 12-16 7:30          Log 7h30m for Dec 16 this year
  sleepdebt log yesterday 6:45      Log 6h45m for last night
  sleepdebt add -b 23:15 -w 06:45   Log from bedtime and wake time
  sleepdebt plan -w 4               Four-week recovery plan`
    )
    .action(async () => {
      await runInteractive(deps);
    });

  registerStatusCommand(program, deps);
  registerLogCommands(program, deps);
  registerRecommendCommand(program, deps);
  registerPlanCommand(program, deps);
  registerHistoryCommand(program, deps);
  registerCalendarCommand(program, deps);
  registerMissingCommands(program, deps);
  registerInitCommand(program, deps);
  registerProfileCommand(program, deps);

  return program;
}
