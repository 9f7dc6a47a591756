import { MalformedDateError, MalformedDurationError, MalformedTimeError } from '../../utils/errors.js';
import { addDays, parseIsoDate, startOfDay, toIsoDate } from '../../utils/dates.js';

const DECIMAL = /^\d+(\.\d+)?$|^\.\d+$/;
const HOURS_MINUTES = /^(\d+):([0-5]\d)$/;
const CLOCK = /^([01]?\d|2[0-3]):([0-5]\d)$/;
const MONTH_DAY = /^(\d{2})-(\d{2})$/;

/**
 * Hours slept, as decimal hours ("7.5") or h:mm ("7:30").
 * @throws MalformedDurationError
 */
export function parseDuration(input: string): number {
  const value = input.trim();
  const hm = HOURS_MINUTES.exec(value);
  const hours = hm ? Number(hm[1]) + Number(hm[2]) / 60 : DECIMAL.test(value) ? Number(value) : Number.NaN;
  if (!Number.isFinite(hours) || hours > 24) {
    throw new MalformedDurationError(input);
  }
  return hours;
}

/**
 * Clock time "HH:MM" as hours since midnight.
 * @throws MalformedTimeError
 */
export function parseClockTime(input: string): number {
  const m = CLOCK.exec(input.trim());
  if (!m) throw new MalformedTimeError(input);
  return Number(m[1]) + Number(m[2]) / 60;
}

/**
 * "today", "yesterday", "MM-DD" (current year) or "YYYY-MM-DD".
 * @throws MalformedDateError
 */
export function parseDateArg(input: string, now: Date = new Date()): string {
  const value = input.trim().toLowerCase();
  if (value === '' || value === 'today') return toIsoDate(now);
  if (value === 'yesterday') return toIsoDate(addDays(startOfDay(now), -1));

  const candidate = MONTH_DAY.test(value) ? `${now.getFullYear()}-${value}` : value;
  if (!parseIsoDate(candidate)) throw new MalformedDateError(input);
  return candidate;
}
