import type { Command } from 'commander';
import { DEFAULT_PLAN_WEEKS } from '../../core/recovery/RecoverySchedule.js';
import { printJson, printLines, withLedger, type CliDeps } from '../context.js';
import { renderPlan } from '../render.js';
import { parsePositiveInt, type JsonOption } from './options.js';

interface PlanOptions extends JsonOption {
  weeks?: number;
}

export async function planAction(deps: CliDeps, options: PlanOptions = {}): Promise<void> {
  await withLedger(deps, (ledger) => {
    const plan = ledger.recoveryPlan(options.weeks ?? DEFAULT_PLAN_WEEKS, deps.now());
    if (options.json) {
      printJson(deps, plan);
      return;
    }
    printLines(deps, renderPlan(plan, ledger.settings, deps.chalk));
  });
}

export function registerPlanCommand(program: Command, deps: CliDeps): void {
  program
    .command('plan')
    .description('Show recovery plan')
    .option('-w, --weeks <weeks>', 'Weeks to plan', parsePositiveInt, DEFAULT_PLAN_WEEKS)
    .option('--json', 'Output as JSON')
    .action(async (options: PlanOptions) => {
      await planAction(deps, options);
    });
}
