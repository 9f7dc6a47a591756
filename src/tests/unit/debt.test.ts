import { describe, it, expect } from 'vitest';
import {
  durationBetween,
  nightlyRecoveryTarget,
  progressiveDebt,
  recommendedBedtime,
  totalDeficit,
} from '../../core/ledger/debt.js';
import { DEFAULT_SETTINGS } from '../../core/ledger/settings.js';
import type { SleepEntry } from '../../core/ledger/types.js';

describe('debt', () => {
  const entries: SleepEntry[] = [
    { date: '2025-01-02', hours: 9 },
    { date: '2025-01-01', hours: 5 },
  ];

  it('sums deficits against the target', () => {
    expect(totalDeficit(entries, 7)).toBe(0);
    expect(totalDeficit([{ date: '2025-01-01', hours: 6.5 }], 7)).toBe(0.5);
    expect(totalDeficit([], 7)).toBe(0);
  });

  it('builds a running total in date order', () => {
    expect(progressiveDebt(entries, 7)).toEqual([
      { date: '2025-01-01', hours: 5, dailyDeficit: 2, cumulativeDebt: 2 },
      { date: '2025-01-02', hours: 9, dailyDeficit: -2, cumulativeDebt: 0 },
    ]);
  });

  it('ends the running total at the overall deficit', () => {
    const nights: SleepEntry[] = [
      { date: '2025-02-03', hours: 6.25 },
      { date: '2025-02-01', hours: 7.5 },
      { date: '2025-02-02', hours: 4 },
      { date: '2025-02-04', hours: 8 },
    ];
    const series = progressiveDebt(nights, 7);
    expect(series).toHaveLength(4);
    expect(series.map((p) => p.date)).toEqual(['2025-02-01', '2025-02-02', '2025-02-03', '2025-02-04']);
    expect(series[series.length - 1]?.cumulativeDebt).toBe(totalDeficit(nights, 7));
  });

  it('wraps the recommended bedtime into the previous evening', () => {
    expect(recommendedBedtime(7.0, 6.75, 15)).toBe(23.5);
    expect(recommendedBedtime(7.0, 6.75)).toBe(23.5);
    expect(recommendedBedtime(1, 6.75, 15)).toBe(5.5);
  });

  it('keeps bedtimes within a day', () => {
    for (const target of [0, 3.3, 7, 12, 24, 30]) {
      for (const wake of [0, 6.75, 12, 23.99]) {
        const bedtime = recommendedBedtime(target, wake);
        expect(bedtime).toBeGreaterThanOrEqual(0);
        expect(bedtime).toBeLessThan(24);
        expect(recommendedBedtime(target, wake)).toBe(bedtime);
      }
    }
  });

  it('measures overnight spans', () => {
    expect(durationBetween(23, 7)).toBe(8);
    expect(durationBetween(1.5, 6.75)).toBe(5.25);
  });

  describe('nightlyRecoveryTarget', () => {
    it('spreads debt over a week', () => {
      const nightly = nightlyRecoveryTarget(3.5, DEFAULT_SETTINGS);
      expect(nightly.extra).toBe(0.5);
      expect(nightly.targetTonight).toBe(7.5);
      expect(nightly.bedtime).toBe(23);
      expect(nightly.daysToRecover).toBe(7);
      expect(nightly.atOrAboveTarget).toBe(false);
    });

    it('caps the extra sleep per night', () => {
      const nightly = nightlyRecoveryTarget(40, DEFAULT_SETTINGS);
      expect(nightly.extra).toBe(1.5);
      expect(nightly.targetTonight).toBe(8.5);
      expect(nightly.daysToRecover).toBe(26);
    });

    it('recommends nothing extra without debt', () => {
      const nightly = nightlyRecoveryTarget(-2, DEFAULT_SETTINGS);
      expect(nightly.extra).toBe(0);
      expect(nightly.targetTonight).toBe(7);
      expect(nightly.atOrAboveTarget).toBe(true);
      expect(nightly.daysToRecover).toBe(0);
    });
  });
});
