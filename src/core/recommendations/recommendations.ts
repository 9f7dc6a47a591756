import type { LedgerSettings, SleepEntry } from '../ledger/types.js';
import { recommendedBedtime, sortByDate } from '../ledger/debt.js';
import { weekendTarget } from '../recovery/dayPolicy.js';
import { formatClock, formatHours } from '../../utils/format.js';

export type Priority = 'HIGH' | 'MEDIUM' | 'LOW';

export const PRIORITIES: readonly Priority[] = ['HIGH', 'MEDIUM', 'LOW'];

export interface Recommendation {
  priority: Priority;
  category: string;
  action: string;
  detail: string;
}

const RECENT_NIGHTS = 7;
const MIN_RECOVERY_DAYS = 7;
const MAX_RECOVERY_DAYS = 14;
const BEDTIME_SPREAD_LIMIT = 2;
const HIGH_DEBT = 10;
// Average bedtime strictly between 00:30 and noon counts as past midnight.
const LATE_BEDTIME_AFTER = 0.5;
const LATE_BEDTIME_BEFORE = 12;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Rule-based advice for the most recent nights. Every rule whose condition
 * holds contributes, in rule order; the two hygiene tips always close the list.
 */
export function buildRecommendations(
  entries: readonly SleepEntry[],
  debt: number,
  settings: LedgerSettings
): Recommendation[] {
  const recommendations: Recommendation[] = [];
  const recent = sortByDate(entries).slice(-RECENT_NIGHTS);
  const bedtimes = recent.flatMap((entry) => (entry.bedtime !== undefined ? [entry.bedtime] : []));

  if (debt > 0) {
    const recoveryDays = clamp(Math.round(debt / 1.0), MIN_RECOVERY_DAYS, MAX_RECOVERY_DAYS);
    const extraPerNight = Math.min(debt / recoveryDays, settings.maxRecoveryPerNight);
    const targetTonight = settings.target + extraPerNight;
    const idealBedtime = recommendedBedtime(targetTonight, settings.wakeTime, settings.onsetBufferMinutes);

    recommendations.push({
      priority: 'HIGH',
      category: 'Sleep Duration',
      action: `Tonight: Aim for ${formatHours(targetTonight)} hours of sleep`,
      detail: `You need ${formatHours(extraPerNight)} extra to start recovering your ${formatHours(debt)} debt`,
    });
    recommendations.push({
      priority: 'HIGH',
      category: 'Bedtime',
      action: `Go to bed by ${formatClock(idealBedtime)}`,
      detail: `For ${formatClock(settings.wakeTime)} wake with ${formatHours(targetTonight)} sleep (includes ${settings.onsetBufferMinutes}min to fall asleep)`,
    });
  }

  if (bedtimes.length >= 3) {
    const spread = Math.max(...bedtimes) - Math.min(...bedtimes);
    if (spread > BEDTIME_SPREAD_LIMIT) {
      recommendations.push({
        priority: 'MEDIUM',
        category: 'Consistency',
        action: 'Stabilize your bedtime',
        detail: `Your bedtime varies by ${formatHours(spread)} hours. Aim for same time +/- 30min`,
      });
    }
  }

  if (bedtimes.length > 0) {
    const averageBedtime = bedtimes.reduce((sum, value) => sum + value, 0) / bedtimes.length;
    if (averageBedtime > LATE_BEDTIME_AFTER && averageBedtime < LATE_BEDTIME_BEFORE) {
      recommendations.push({
        priority: 'HIGH',
        category: 'Circadian Rhythm',
        action: 'Move bedtime earlier',
        detail: `Average bedtime ${formatClock(averageBedtime)} is too late. Shift 15-30min earlier each night`,
      });
    }
  }

  if (debt > HIGH_DEBT) {
    recommendations.push({
      priority: 'HIGH',
      category: 'Recovery Protocol',
      action: 'Prioritize weekend recovery',
      detail: `Sleep ${formatHours(weekendTarget(settings))}+ hours Sat/Sun. Naps OK but before 3pm and under 30min`,
    });
    recommendations.push({
      priority: 'MEDIUM',
      category: 'Exercise',
      action: 'Reduce training intensity',
      detail: 'With significant debt, intense exercise increases injury/syncope risk. Light activity only.',
    });
  }

  recommendations.push({
    priority: 'LOW',
    category: 'Sleep Hygiene',
    action: 'No screens 1 hour before bed',
    detail: 'Blue light suppresses melatonin. Use night mode or blue-blocking glasses if needed.',
  });
  recommendations.push({
    priority: 'LOW',
    category: 'Caffeine',
    action: 'No caffeine after 2:00 PM',
    detail: 'Caffeine half-life is 5-6 hours. Late caffeine fragments sleep architecture.',
  });

  return recommendations;
}

export function groupByPriority(recommendations: readonly Recommendation[]): Array<[Priority, Recommendation[]]> {
  return PRIORITIES.map((priority): [Priority, Recommendation[]] => [
    priority,
    recommendations.filter((rec) => rec.priority === priority),
  ]).filter(([, recs]) => recs.length > 0);
}
