import type { LedgerSettings, ProgressivePoint, SleepEntry } from '../ledger/types.js';
import { progressiveDebt, sortByDate, totalDeficit } from '../ledger/debt.js';

const RECENT_NIGHTS = 7;
const LOG_ROWS = 10;
const SIGNIFICANT_DEBT = 10;

export interface StatusRow extends ProgressivePoint {
  bedtime?: number;
  waketime?: number;
}

export interface StatusSummary {
  nights: number;
  averageSleep: number;
  totalDebt: number;
  target: number;
  recentNights: number;
  recentAverage: number;
  recentDebt: number;
  averageBedtime?: number;
  averageWaketime?: number;
  rows: StatusRow[];
  significantDebt: boolean;
}

export function average(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

export function summarizeStatus(entries: readonly SleepEntry[], settings: LedgerSettings): StatusSummary | null {
  if (entries.length === 0) return null;

  const sorted = sortByDate(entries);
  const recent = sorted.slice(-RECENT_NIGHTS);
  const totalDebt = totalDeficit(sorted, settings.target);
  const byDate = new Map(sorted.map((entry) => [entry.date, entry]));

  const rows = progressiveDebt(sorted, settings.target)
    .slice(-LOG_ROWS)
    .map((point): StatusRow => {
      const entry = byDate.get(point.date);
      const row: StatusRow = { ...point };
      if (entry?.bedtime !== undefined) row.bedtime = entry.bedtime;
      if (entry?.waketime !== undefined) row.waketime = entry.waketime;
      return row;
    });

  const summary: StatusSummary = {
    nights: sorted.length,
    averageSleep: average(sorted.map((entry) => entry.hours)),
    totalDebt,
    target: settings.target,
    recentNights: recent.length,
    recentAverage: average(recent.map((entry) => entry.hours)),
    recentDebt: totalDeficit(recent, settings.target),
    rows,
    significantDebt: totalDebt > SIGNIFICANT_DEBT,
  };

  const timed = sorted.flatMap((entry) =>
    entry.bedtime !== undefined && entry.waketime !== undefined
      ? [{ bedtime: entry.bedtime, waketime: entry.waketime }]
      : []
  );
  if (timed.length > 0) {
    summary.averageBedtime = average(timed.map((t) => t.bedtime));
    summary.averageWaketime = average(timed.map((t) => t.waketime));
  }
  return summary;
}
