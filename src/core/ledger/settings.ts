import type { LedgerSettings, SleepProfile } from './types.js';

export const DEFAULT_TARGET_HOURS = 7.0;
export const DEFAULT_WAKE_TIME = 6.75;
export const MAX_AGE_YEARS = 130;

export const DEFAULT_SETTINGS: LedgerSettings = {
  target: DEFAULT_TARGET_HOURS,
  wakeTime: DEFAULT_WAKE_TIME,
  optimalSleep: 8.0,
  maxRecoveryPerNight: 1.5,
  onsetBufferMinutes: 15,
  weekendCeiling: 9.0,
};

export function settingsFromProfile(
  profile: SleepProfile,
  overrides: Partial<Omit<LedgerSettings, 'target' | 'wakeTime'>> = {}
): LedgerSettings {
  return {
    ...DEFAULT_SETTINGS,
    ...overrides,
    target: profile.target,
    wakeTime: profile.wakeTime,
  };
}
