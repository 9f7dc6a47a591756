import type { Command } from 'commander';
import type { SleepProfile } from '../../core/ledger/types.js';
import { parseClockTime, parseDateArg, parseDuration } from '../../adapters/input/inputParser.js';
import { InputError } from '../../utils/errors.js';
import { printJson, printLines, withLedger, type CliDeps } from '../context.js';
import { renderProfile } from '../render.js';
import { parseAge, type JsonOption } from './options.js';

interface ProfileOptions extends JsonOption {
  target?: string;
  wake?: string;
  age?: number;
  birthdate?: string;
  name?: string;
  notes?: string;
}

function profileChanges(options: ProfileOptions, now: Date): Partial<SleepProfile> {
  const changes: Partial<SleepProfile> = {};
  if (options.target !== undefined) {
    const target = parseDuration(options.target);
    if (target <= 0) throw new InputError('Target sleep must be more than zero hours', 'INVALID_TARGET');
    changes.target = target;
  }
  if (options.wake !== undefined) changes.wakeTime = parseClockTime(options.wake);
  if (options.age !== undefined) changes.age = options.age;
  if (options.birthdate !== undefined) changes.birthdate = parseDateArg(options.birthdate, now);
  if (options.name !== undefined) changes.name = options.name;
  if (options.notes !== undefined) changes.notes = options.notes;
  return changes;
}

export async function profileAction(deps: CliDeps, options: ProfileOptions = {}): Promise<void> {
  const changes = profileChanges(options, deps.now());
  const changed = Object.keys(changes).length > 0;
  await withLedger(deps, (ledger) => {
    const profile = changed ? ledger.updateProfile(changes) : ledger.profile;
    if (options.json) printJson(deps, profile);
    else printLines(deps, renderProfile(profile, deps.now(), deps.chalk));
    return changed;
  });
}

export function registerProfileCommand(program: Command, deps: CliDeps): void {
  program
    .command('profile')
    .description('Show or update the sleep profile')
    .option('-t, --target <hours>', 'Target sleep per night (h:mm or decimal)')
    .option('-w, --wake <time>', 'Usual wake time (HH:MM)')
    .option('--age <years>', 'Age in years', parseAge)
    .option('--birthdate <date>', 'Birthdate (YYYY-MM-DD)')
    .option('--name <name>', 'Display name')
    .option('--notes <notes>', 'Free-form notes')
    .option('--json', 'Output as JSON')
    .action(async (options: ProfileOptions) => {
      await profileAction(deps, options);
    });
}
