import type { SleepEntry } from '../ledger/types.js';
import { addDays, startOfDay, toIsoDate } from '../../utils/dates.js';

function uniform(random: () => number, min: number, max: number): number {
  return min + (max - min) * random();
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Demo nights ending yesterday: mostly 6.5-7.8h around midnight, with some
 * short late nights and some long early ones.
 */
export function generateSampleEntries(
  now: Date = new Date(),
  days = 30,
  random: () => number = Math.random
): SleepEntry[] {
  const start = addDays(startOfDay(now), -days);
  const entries: SleepEntry[] = [];

  for (let i = 0; i < days; i++) {
    const roll = random();
    let hours: number;
    let bedtime: number;
    if (roll < 0.15) {
      hours = uniform(random, 5.0, 6.0);
      bedtime = uniform(random, 0.5, 2.0);
    } else if (roll < 0.25) {
      hours = uniform(random, 8.0, 8.5);
      bedtime = uniform(random, 22.5, 23.0);
    } else {
      hours = uniform(random, 6.5, 7.8);
      bedtime = uniform(random, 23.0, 24.5) % 24;
    }
    hours = round2(hours);
    bedtime = round2(bedtime) % 24;
    const waketime = round2((bedtime + hours) % 24) % 24;
    entries.push({ date: toIsoDate(addDays(start, i)), hours, bedtime, waketime });
  }
  return entries;
}
