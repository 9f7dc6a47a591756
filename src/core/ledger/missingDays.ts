import type { SleepEntry } from './types.js';
import { addDays, parseIsoDate, startOfDay, toIsoDate } from '../../utils/dates.js';

/**
 * Dates after the latest entry, up to and including yesterday, that have no
 * entry. Today is never missing: that night has not happened yet.
 */
export function getMissingDays(entries: readonly SleepEntry[], now: Date = new Date()): string[] {
  if (entries.length === 0) return [];

  const latest = entries.reduce((max, entry) => (entry.date > max ? entry.date : max), entries[0]?.date ?? '');
  const latestDate = parseIsoDate(latest);
  if (!latestDate) return [];

  const yesterday = addDays(startOfDay(now), -1);
  if (latestDate.getTime() >= yesterday.getTime()) return [];

  const recorded = new Set(entries.map((entry) => entry.date));
  const missing: string[] = [];
  for (let day = addDays(latestDate, 1); day.getTime() <= yesterday.getTime(); day = addDays(day, 1)) {
    const iso = toIsoDate(day);
    if (!recorded.has(iso)) missing.push(iso);
  }
  return missing;
}
