import type { LedgerSettings } from '../ledger/types.js';
import { isWeekend } from '../../utils/dates.js';

export interface RecoveryRates {
  dailyTarget: number;
  dailyRecovery: number;
}

export interface NightPolicy {
  target: number;
  recoveryCredit: number;
  weekend: boolean;
}

export type DayPolicy = (date: Date, rates: RecoveryRates, settings: LedgerSettings) => NightPolicy;

/** Saturday and Sunday sleep target before the plan's own daily rate is applied. */
export function weekendTarget(settings: LedgerSettings): number {
  return Math.max(
    settings.target,
    Math.min(settings.optimalSleep + 1, settings.weekendCeiling, settings.target + settings.maxRecoveryPerNight)
  );
}

/**
 * Weeknights follow the plan's daily rate. Saturday and Sunday nights aim for
 * one hour over optimal sleep, bounded by the weekend ceiling and by the
 * per-night recovery cap, and never below the weeknight target.
 */
export const weekendBoostPolicy: DayPolicy = (date, rates, settings) => {
  if (!isWeekend(date)) {
    return { target: rates.dailyTarget, recoveryCredit: rates.dailyRecovery, weekend: false };
  }
  const target = Math.max(rates.dailyTarget, weekendTarget(settings));
  return { target, recoveryCredit: target - settings.target, weekend: true };
};

/** Same target every night. */
export const flatPolicy: DayPolicy = (date, rates) => ({
  target: rates.dailyTarget,
  recoveryCredit: rates.dailyRecovery,
  weekend: isWeekend(date),
});
