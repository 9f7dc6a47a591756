import type { LedgerSettings, NightlyTarget, ProgressivePoint, SleepEntry } from './types.js';

const RECOVERY_WINDOW_DAYS = 7;

export function sortByDate<T extends { date: string }>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/** Σ(target − hours). Positive is debt, zero or negative is surplus. */
export function totalDeficit(entries: readonly SleepEntry[], target: number): number {
  return entries.reduce((sum, entry) => sum + (target - entry.hours), 0);
}

/** Running total of daily deficits in date order, one point per entry. */
export function progressiveDebt(entries: readonly SleepEntry[], target: number): ProgressivePoint[] {
  let cumulativeDebt = 0;
  return sortByDate(entries).map((entry) => {
    const dailyDeficit = target - entry.hours;
    cumulativeDebt += dailyDeficit;
    return { date: entry.date, hours: entry.hours, dailyDeficit, cumulativeDebt };
  });
}

/**
 * Time to get into bed to sleep `targetSleep` hours before `wakeTime`,
 * allowing `onsetBufferMinutes` to fall asleep. Wrapped into [0, 24).
 */
export function recommendedBedtime(targetSleep: number, wakeTime: number, onsetBufferMinutes = 15): number {
  const bedtime = (wakeTime - targetSleep - onsetBufferMinutes / 60) % 24;
  if (bedtime < 0) {
    const wrapped = bedtime + 24;
    return wrapped >= 24 ? 0 : wrapped;
  }
  // normalizes -0
  return bedtime + 0;
}

/** Extra sleep for tonight: debt spread over a week, capped per night. */
export function nightlyRecoveryTarget(debt: number, settings: LedgerSettings): NightlyTarget {
  const extra = debt > 0 ? Math.min(debt / RECOVERY_WINDOW_DAYS, settings.maxRecoveryPerNight) : 0;
  const targetTonight = settings.target + extra;
  return {
    debt,
    extra,
    targetTonight,
    bedtime: recommendedBedtime(targetTonight, settings.wakeTime, settings.onsetBufferMinutes),
    atOrAboveTarget: debt <= 0,
    daysToRecover: extra > 0 ? Math.floor(debt / extra) : 0,
  };
}

/** Bedtime implied by sleeping `hours` and waking at `waketime`, no onset buffer. */
export function bedtimeFromDuration(hours: number, waketime: number): number {
  return recommendedBedtime(hours, waketime, 0);
}

/** Hours between bedtime and waketime under overnight wrap. */
export function durationBetween(bedtime: number, waketime: number): number {
  const span = (waketime - bedtime) % 24;
  return span < 0 ? span + 24 : span;
}
