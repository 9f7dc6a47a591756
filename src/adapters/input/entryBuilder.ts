import type { LedgerSettings, SleepEntry } from '../../core/ledger/types.js';
import { bedtimeFromDuration, durationBetween } from '../../core/ledger/debt.js';
import { InconsistentEntryError, InputError } from '../../utils/errors.js';
import { formatClock, formatHours } from '../../utils/format.js';

const ONE_MINUTE = 1 / 60;

export interface EntryInput {
  date: string;
  hours?: number;
  bedtime?: number;
  waketime?: number;
}

/**
 * Complete an entry so that hours, bedtime and waketime agree under overnight
 * wrap. A missing waketime falls back to the profile wake time; a missing
 * bedtime is derived from hours, a missing duration from the two times.
 * @throws InconsistentEntryError when all three are given and disagree
 */
export function buildEntry(input: EntryInput, settings: Pick<LedgerSettings, 'wakeTime'>): SleepEntry {
  const waketime = input.waketime ?? settings.wakeTime;

  if (input.hours === undefined) {
    if (input.bedtime === undefined) {
      throw new InputError('Either hours slept or a bedtime is required', 'MISSING_DURATION');
    }
    return { date: input.date, hours: durationBetween(input.bedtime, waketime), bedtime: input.bedtime, waketime };
  }

  if (input.bedtime === undefined) {
    return { date: input.date, hours: input.hours, bedtime: bedtimeFromDuration(input.hours, waketime), waketime };
  }

  const span = durationBetween(input.bedtime, waketime);
  if (Math.abs(span - input.hours) > ONE_MINUTE) {
    throw new InconsistentEntryError(
      `${formatHours(input.hours)} hours does not fit bedtime ${formatClock(input.bedtime)} and wake ${formatClock(waketime)} (${formatHours(span)} in bed)`
    );
  }
  return { date: input.date, hours: input.hours, bedtime: input.bedtime, waketime };
}
