import type {
  DebtSummary,
  LedgerDocument,
  LedgerSettings,
  NightlyTarget,
  ProgressivePoint,
  SleepEntry,
  SleepProfile,
  UpsertAction,
} from './types.js';
import { nightlyRecoveryTarget, progressiveDebt, sortByDate, totalDeficit } from './debt.js';
import { getMissingDays } from './missingDays.js';
import { settingsFromProfile } from './settings.js';
import { buildRecommendations, type Recommendation } from '../recommendations/recommendations.js';
import { buildRecoveryPlan, type RecoveryPlan } from '../recovery/RecoverySchedule.js';

const RECENT_NIGHTS = 7;

export type SettingsOverrides = Partial<Omit<LedgerSettings, 'target' | 'wakeTime'>>;

/**
 * In-memory owner of one person's sleep entries and profile. Entries are kept
 * in date order, one per date. Every derived view is computed on demand.
 */
export class SleepLedger {
  private entryList: SleepEntry[];
  private currentProfile: SleepProfile;

  constructor(
    document: LedgerDocument,
    private readonly overrides: SettingsOverrides = {}
  ) {
    this.entryList = dedupeByDate(document.entries);
    this.currentProfile = { ...document.profile };
  }

  get entries(): readonly SleepEntry[] {
    return this.entryList;
  }

  get profile(): Readonly<SleepProfile> {
    return this.currentProfile;
  }

  get settings(): LedgerSettings {
    return settingsFromProfile(this.currentProfile, this.overrides);
  }

  get size(): number {
    return this.entryList.length;
  }

  isEmpty(): boolean {
    return this.entryList.length === 0;
  }

  get(date: string): SleepEntry | undefined {
    return this.entryList.find((entry) => entry.date === date);
  }

  latest(): SleepEntry | undefined {
    return this.entryList[this.entryList.length - 1];
  }

  /** The last `count` entries by date. */
  recent(count = RECENT_NIGHTS): SleepEntry[] {
    return this.entryList.slice(-count);
  }

  /** Insert, or replace the entry with the same date. */
  upsert(entry: SleepEntry): UpsertAction {
    const index = this.entryList.findIndex((existing) => existing.date === entry.date);
    const next = [...this.entryList];
    let action: UpsertAction;
    if (index >= 0) {
      next[index] = { ...entry };
      action = 'updated';
    } else {
      next.push({ ...entry });
      action = 'added';
    }
    this.entryList = sortByDate(next);
    return action;
  }

  updateProfile(changes: Partial<SleepProfile>): SleepProfile {
    const current = this.currentProfile;
    const next: SleepProfile = {
      target: changes.target ?? current.target,
      wakeTime: changes.wakeTime ?? current.wakeTime,
    };
    const age = changes.age ?? current.age;
    const birthdate = changes.birthdate ?? current.birthdate;
    const name = changes.name ?? current.name;
    const notes = changes.notes ?? current.notes;
    if (age !== undefined) next.age = age;
    if (birthdate !== undefined) next.birthdate = birthdate;
    if (name !== undefined) next.name = name;
    if (notes !== undefined) next.notes = notes;
    this.currentProfile = next;
    return next;
  }

  totalDebt(): number {
    return totalDeficit(this.entryList, this.currentProfile.target);
  }

  debtSummary(): DebtSummary {
    const recent = this.recent();
    return {
      nights: this.entryList.length,
      totalDebt: this.totalDebt(),
      recentNights: recent.length,
      recentDebt: totalDeficit(recent, this.currentProfile.target),
    };
  }

  progressive(): ProgressivePoint[] {
    return progressiveDebt(this.entryList, this.currentProfile.target);
  }

  nightlyTarget(): NightlyTarget {
    return nightlyRecoveryTarget(this.totalDebt(), this.settings);
  }

  recommendations(): Recommendation[] {
    return buildRecommendations(this.recent(), this.totalDebt(), this.settings);
  }

  recoveryPlan(weeks = 3, now: Date = new Date()): RecoveryPlan {
    return buildRecoveryPlan(this.totalDebt(), this.settings, { weeks, start: now });
  }

  missingDays(now: Date = new Date()): string[] {
    return getMissingDays(this.entryList, now);
  }

  toDocument(): LedgerDocument {
    return {
      entries: this.entryList.map((entry) => ({ ...entry })),
      profile: { ...this.currentProfile },
    };
  }
}

// A stored document may repeat a date; the later record wins, as with upsert.
function dedupeByDate(entries: readonly SleepEntry[]): SleepEntry[] {
  const byDate = new Map<string, SleepEntry>();
  for (const entry of entries) {
    byDate.set(entry.date, { ...entry });
  }
  return sortByDate([...byDate.values()]);
}
