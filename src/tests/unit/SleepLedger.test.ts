import { describe, it, expect } from 'vitest';
import { SleepLedger } from '../../core/ledger/SleepLedger.js';
import { getMissingDays } from '../../core/ledger/missingDays.js';
import type { LedgerDocument } from '../../core/ledger/types.js';

function ledgerOf(entries: LedgerDocument['entries']): SleepLedger {
  return new SleepLedger({ entries, profile: { target: 7, wakeTime: 6.75 } });
}

describe('SleepLedger', () => {
  it('replaces an entry for an existing date', () => {
    const ledger = ledgerOf([
      { date: '2025-01-01', hours: 6 },
      { date: '2025-01-02', hours: 7 },
    ]);
    expect(ledger.upsert({ date: '2025-01-01', hours: 8 })).toBe('updated');
    expect(ledger.size).toBe(2);
    expect(ledger.get('2025-01-01')?.hours).toBe(8);
  });

  it('adds an entry for a new date and keeps date order', () => {
    const ledger = ledgerOf([{ date: '2025-01-03', hours: 6 }]);
    expect(ledger.upsert({ date: '2025-01-01', hours: 7.5 })).toBe('added');
    expect(ledger.size).toBe(2);
    expect(ledger.entries.map((e) => e.date)).toEqual(['2025-01-01', '2025-01-03']);
    expect(ledger.latest()?.date).toBe('2025-01-03');
  });

  it('keeps the later record when a stored document repeats a date', () => {
    const ledger = ledgerOf([
      { date: '2025-01-01', hours: 5 },
      { date: '2025-01-01', hours: 6 },
    ]);
    expect(ledger.size).toBe(1);
    expect(ledger.get('2025-01-01')?.hours).toBe(6);
  });

  it('reports total and last-seven debt', () => {
    const entries = Array.from({ length: 9 }, (_, i) => ({
      date: `2025-01-0${i + 1}`,
      hours: i < 2 ? 4 : 6,
    }));
    const summary = ledgerOf(entries).debtSummary();
    expect(summary).toEqual({ nights: 9, totalDebt: 13, recentNights: 7, recentDebt: 7 });
  });

  it('uses the profile target for debt', () => {
    const ledger = ledgerOf([{ date: '2025-01-01', hours: 7 }]);
    ledger.updateProfile({ target: 8 });
    expect(ledger.totalDebt()).toBe(1);
    expect(ledger.settings.target).toBe(8);
  });

  it('merges profile changes without dropping other fields', () => {
    const ledger = ledgerOf([]);
    ledger.updateProfile({ name: 'Sam', age: 40 });
    const profile = ledger.updateProfile({ wakeTime: 7 });
    expect(profile).toEqual({ target: 7, wakeTime: 7, name: 'Sam', age: 40 });
  });

  it('short-circuits the plan without debt', () => {
    const plan = ledgerOf([{ date: '2025-01-01', hours: 7 }]).recoveryPlan(3, new Date(2025, 0, 2));
    expect(plan.status).toBe('no-debt');
  });

  it('passes settings overrides to the recovery math', () => {
    const ledger = new SleepLedger(
      { entries: [{ date: '2025-01-01', hours: 0 }], profile: { target: 7, wakeTime: 6.75 } },
      { maxRecoveryPerNight: 0.5 }
    );
    expect(ledger.nightlyTarget().extra).toBe(0.5);
  });

  it('returns a copy of its document', () => {
    const ledger = ledgerOf([{ date: '2025-01-01', hours: 7 }]);
    const document = ledger.toDocument();
    document.entries.push({ date: '2025-01-02', hours: 1 });
    expect(ledger.size).toBe(1);
  });
});

describe('getMissingDays', () => {
  const now = new Date(2025, 0, 10, 9, 30);

  it('lists the days between the last entry and yesterday', () => {
    expect(getMissingDays([{ date: '2025-01-07', hours: 7 }], now)).toEqual(['2025-01-08', '2025-01-09']);
  });

  it('returns nothing when yesterday or today is recorded', () => {
    expect(getMissingDays([{ date: '2025-01-09', hours: 7 }], now)).toEqual([]);
    expect(getMissingDays([{ date: '2025-01-10', hours: 7 }], now)).toEqual([]);
  });

  it('only looks after the latest entry', () => {
    const entries = [
      { date: '2025-01-02', hours: 7 },
      { date: '2025-01-08', hours: 7 },
    ];
    expect(getMissingDays(entries, now)).toEqual(['2025-01-09']);
  });

  it('returns nothing for an empty ledger', () => {
    expect(getMissingDays([], now)).toEqual([]);
  });

  it('crosses month boundaries', () => {
    expect(getMissingDays([{ date: '2025-02-27', hours: 7 }], new Date(2025, 2, 3))).toEqual([
      '2025-02-28',
      '2025-03-01',
      '2025-03-02',
    ]);
  });
});
