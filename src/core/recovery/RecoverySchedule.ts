import type { LedgerSettings } from '../ledger/types.js';
import { recommendedBedtime } from '../ledger/debt.js';
import { WEEKDAY_SHORT, addDays, startOfDay, toIsoDate } from '../../utils/dates.js';
import { formatHours } from '../../utils/format.js';
import { weekendBoostPolicy, type DayPolicy, type RecoveryRates } from './dayPolicy.js';

export const DEFAULT_PLAN_WEEKS = 3;
export const DAILY_VIEW_DAYS = 14;

export interface ScheduledNight {
  date: string;
  weekday: string;
  weekend: boolean;
  target: number;
  bedtime: number;
  recoveryCredit: number;
  remaining: number;
  recovered: number;
}

export interface WeeklyTarget {
  week: number;
  startDate: string;
  endDate: string;
  target: number;
  bedtime: number;
  recovered: number;
  remainingDebt: number;
}

export interface NoDebtPlan {
  status: 'no-debt';
  debt: number;
  message: string;
}

export interface ScheduledPlan {
  status: 'scheduled';
  debt: number;
  weeks: number;
  dailyRecovery: number;
  dailyTarget: number;
  bedtime: number;
  estimatedRecoveryDays: number;
  /** First night on which the schedule pays the debt off, if it does. */
  clearedOn?: string;
  weekly: WeeklyTarget[];
  daily: ScheduledNight[];
}

export type RecoveryPlan = NoDebtPlan | ScheduledPlan;

export interface RecoveryPlanOptions {
  weeks?: number;
  start?: Date;
  policy?: DayPolicy;
}

export function recoveryRates(debt: number, weeks: number, settings: LedgerSettings): RecoveryRates {
  const days = weeks * 7;
  const dailyRecovery = debt > 0 && days > 0 ? Math.min(debt / days, settings.maxRecoveryPerNight) : 0;
  return { dailyRecovery, dailyTarget: settings.target + dailyRecovery };
}

/**
 * Walk `days` calendar nights from `start`, paying the debt down by each
 * night's recovery credit. Remaining debt never goes below zero.
 */
export function generateSchedule(
  debt: number,
  rates: RecoveryRates,
  settings: LedgerSettings,
  start: Date,
  days: number,
  policy: DayPolicy = weekendBoostPolicy
): ScheduledNight[] {
  const nights: ScheduledNight[] = [];
  const first = startOfDay(start);
  let remaining = Math.max(0, debt);

  for (let offset = 0; offset < days; offset++) {
    const date = addDays(first, offset);
    const night = policy(date, rates, settings);
    remaining = Math.max(0, remaining - night.recoveryCredit);
    nights.push({
      date: toIsoDate(date),
      weekday: WEEKDAY_SHORT[date.getDay()] ?? '',
      weekend: night.weekend,
      target: night.target,
      bedtime: recommendedBedtime(night.target, settings.wakeTime, settings.onsetBufferMinutes),
      recoveryCredit: night.recoveryCredit,
      remaining,
      recovered: debt - remaining,
    });
  }
  return nights;
}

/** Group a nightly schedule into 7-night weeks; each week ends where its last night ends. */
export function summarizeWeeks(
  nights: readonly ScheduledNight[],
  debt: number,
  rates: RecoveryRates,
  settings: LedgerSettings
): WeeklyTarget[] {
  const weeks: WeeklyTarget[] = [];
  const bedtime = recommendedBedtime(rates.dailyTarget, settings.wakeTime, settings.onsetBufferMinutes);
  let carried = Math.max(0, debt);

  for (let index = 0; index + 7 <= nights.length; index += 7) {
    const first = nights[index];
    const last = nights[index + 6];
    if (!first || !last) break;
    weeks.push({
      week: index / 7 + 1,
      startDate: first.date,
      endDate: last.date,
      target: rates.dailyTarget,
      bedtime,
      recovered: carried - last.remaining,
      remainingDebt: last.remaining,
    });
    carried = last.remaining;
  }
  return weeks;
}

/**
 * Recovery plan over `weeks` weeks. The weekly and the 14-night views are
 * both cut from one nightly schedule, so they always agree.
 */
export function buildRecoveryPlan(
  debt: number,
  settings: LedgerSettings,
  options: RecoveryPlanOptions = {}
): RecoveryPlan {
  if (debt <= 0) {
    return {
      status: 'no-debt',
      debt,
      message: `No sleep debt to recover! Keep maintaining ${formatHours(settings.target)}+ hours/night.`,
    };
  }

  const weeks = Math.max(1, Math.floor(options.weeks ?? DEFAULT_PLAN_WEEKS));
  const rates = recoveryRates(debt, weeks, settings);
  const nights = generateSchedule(
    debt,
    rates,
    settings,
    options.start ?? new Date(),
    Math.max(weeks * 7, DAILY_VIEW_DAYS),
    options.policy
  );

  const plan: ScheduledPlan = {
    status: 'scheduled',
    debt,
    weeks,
    dailyRecovery: rates.dailyRecovery,
    dailyTarget: rates.dailyTarget,
    bedtime: recommendedBedtime(rates.dailyTarget, settings.wakeTime, settings.onsetBufferMinutes),
    estimatedRecoveryDays: rates.dailyRecovery > 0 ? debt / rates.dailyRecovery : 0,
    weekly: summarizeWeeks(nights.slice(0, weeks * 7), debt, rates, settings),
    daily: nights.slice(0, DAILY_VIEW_DAYS),
  };
  const cleared = nights.find((night) => night.remaining === 0);
  if (cleared) plan.clearedOn = cleared.date;
  return plan;
}
