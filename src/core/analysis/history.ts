import type { LedgerSettings, ProgressivePoint, SleepEntry } from '../ledger/types.js';
import { progressiveDebt, sortByDate, totalDeficit } from '../ledger/debt.js';
import { addDays, mondayIndex, parseIsoDate, startOfDay, toIsoDate } from '../../utils/dates.js';
import { sleepBand } from './bands.js';
import { average } from './status.js';

export const HISTORY_RANGES: ReadonlyArray<{ days: number | null; label: string }> = [
  { days: 15, label: '15 days' },
  { days: 30, label: '30 days' },
  { days: 45, label: '45 days' },
  { days: 90, label: '90 days (3 months)' },
  { days: 120, label: '120 days (4 months)' },
  { days: 365, label: '365 days (1 year)' },
  { days: null, label: 'All data' },
];

const DAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;
const TREND_MIN_NIGHTS = 14;
const TREND_THRESHOLD = 0.25;

export type Trend = 'improving' | 'declining' | 'stable';

export interface DayOfWeekAverage {
  day: (typeof DAY_NAMES)[number];
  average: number | null;
  nights: number;
}

export interface RangeAnalysis {
  nights: number;
  averageSleep: number;
  totalDebt: number;
  target: number;
  quality: { good: number; short: number; severe: number };
  best: SleepEntry;
  worst: SleepEntry;
  dayOfWeek: DayOfWeekAverage[];
  trend?: { firstAverage: number; lastAverage: number; change: number; direction: Trend };
  progression: ProgressivePoint[];
}

/** Entries from the last `days` days (today included); `null` means all of them. */
export function filterRange(entries: readonly SleepEntry[], days: number | null, now: Date = new Date()): SleepEntry[] {
  const sorted = sortByDate(entries);
  if (days === null) return sorted;
  const cutoff = toIsoDate(addDays(startOfDay(now), -days));
  return sorted.filter((entry) => entry.date > cutoff);
}

export function analyzeRange(
  entries: readonly SleepEntry[],
  settings: LedgerSettings,
  days: number | null,
  now: Date = new Date()
): RangeAnalysis | null {
  const filtered = filterRange(entries, days, now);
  const first = filtered[0];
  if (!first) return null;

  const quality = { good: 0, short: 0, severe: 0 };
  let best = first;
  let worst = first;
  const perDay: number[][] = DAY_NAMES.map(() => []);

  for (const entry of filtered) {
    quality[sleepBand(entry.hours)] += 1;
    if (entry.hours > best.hours) best = entry;
    if (entry.hours < worst.hours) worst = entry;
    const date = parseIsoDate(entry.date);
    if (date) perDay[mondayIndex(date)]?.push(entry.hours);
  }

  const analysis: RangeAnalysis = {
    nights: filtered.length,
    averageSleep: average(filtered.map((entry) => entry.hours)),
    totalDebt: totalDeficit(filtered, settings.target),
    target: settings.target,
    quality,
    best,
    worst,
    dayOfWeek: DAY_NAMES.map((day, index) => {
      const hours = perDay[index] ?? [];
      return { day, average: hours.length > 0 ? average(hours) : null, nights: hours.length };
    }),
    progression: [],
  };

  if (filtered.length >= TREND_MIN_NIGHTS) {
    const firstAverage = average(filtered.slice(0, 7).map((entry) => entry.hours));
    const lastAverage = average(filtered.slice(-7).map((entry) => entry.hours));
    const change = lastAverage - firstAverage;
    const direction: Trend =
      change > TREND_THRESHOLD ? 'improving' : change < -TREND_THRESHOLD ? 'declining' : 'stable';
    analysis.trend = { firstAverage, lastAverage, change, direction };
  }

  if (filtered.length > 1) {
    const progressive = progressiveDebt(filtered, settings.target);
    const indexes = [0, Math.floor(progressive.length / 2), progressive.length - 1];
    analysis.progression = indexes.flatMap((index) => {
      const point = progressive[index];
      return point ? [point] : [];
    });
  }

  return analysis;
}
