import type { SleepEntry } from '../ledger/types.js';
import { addDays, mondayIndex, parseIsoDate, startOfDay, toIsoDate } from '../../utils/dates.js';

export type CalendarCell =
  | { date: string; kind: 'recorded'; hours: number }
  | { date: string; kind: 'missing' }
  | { date: string; kind: 'future' };

export interface CalendarWeek {
  weekOf: string; // Monday
  days: CalendarCell[];
}

/**
 * Monday-aligned weeks from the week of the first entry through the later of
 * the last entry and `weeksAhead` weeks from today.
 */
export function buildCalendar(
  entries: readonly SleepEntry[],
  weeksAhead = 3,
  now: Date = new Date()
): CalendarWeek[] {
  const hoursByDate = new Map(entries.map((entry) => [entry.date, entry.hours]));
  const dates = [...hoursByDate.keys()].sort();
  const firstIso = dates[0];
  const lastIso = dates[dates.length - 1];
  if (firstIso === undefined || lastIso === undefined) return [];

  const first = parseIsoDate(firstIso);
  const last = parseIsoDate(lastIso);
  if (!first || !last) return [];

  const today = startOfDay(now);
  const horizon = addDays(today, weeksAhead * 7);
  const end = last.getTime() > horizon.getTime() ? last : horizon;

  const weeks: CalendarWeek[] = [];
  for (let monday = addDays(first, -mondayIndex(first)); monday.getTime() <= end.getTime(); monday = addDays(monday, 7)) {
    const days: CalendarCell[] = [];
    for (let offset = 0; offset < 7; offset++) {
      const day = addDays(monday, offset);
      const date = toIsoDate(day);
      const hours = hoursByDate.get(date);
      if (hours !== undefined) {
        days.push({ date, kind: 'recorded', hours });
      } else if (day.getTime() <= today.getTime()) {
        days.push({ date, kind: 'missing' });
      } else {
        days.push({ date, kind: 'future' });
      }
    }
    weeks.push({ weekOf: toIsoDate(monday), days });
  }
  return weeks;
}
