export interface SleepEntry {
  date: string; // ISO date, unique within a ledger
  hours: number;
  bedtime?: number; // hours since midnight, [0, 24)
  waketime?: number; // hours since midnight, [0, 24)
}

export interface SleepProfile {
  target: number;
  wakeTime: number;
  age?: number;
  birthdate?: string;
  name?: string;
  notes?: string;
}

export interface LedgerDocument {
  entries: SleepEntry[];
  profile: SleepProfile;
}

/**
 * Everything the debt and recovery math depends on. Built once per invocation
 * from the stored profile and the configuration.
 */
export interface LedgerSettings {
  target: number;
  wakeTime: number;
  optimalSleep: number;
  maxRecoveryPerNight: number;
  onsetBufferMinutes: number;
  weekendCeiling: number;
}

export interface ProgressivePoint {
  date: string;
  hours: number;
  dailyDeficit: number;
  cumulativeDebt: number;
}

export interface DebtSummary {
  nights: number;
  totalDebt: number;
  recentNights: number;
  recentDebt: number;
}

export interface NightlyTarget {
  debt: number;
  extra: number;
  targetTonight: number;
  bedtime: number;
  atOrAboveTarget: boolean;
  daysToRecover: number;
}

export type UpsertAction = 'added' | 'updated';
