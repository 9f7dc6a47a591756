import { z } from 'zod';
import type { LedgerDocument, SleepEntry, SleepProfile } from '../../core/ledger/types.js';
import { MAX_AGE_YEARS } from '../../core/ledger/settings.js';
import { isIsoDate } from '../../utils/dates.js';

const isoDate = z.string().refine(isIsoDate, { message: 'expected a YYYY-MM-DD date' });
const timeOfDay = z.number().min(0).lt(24);

const storedEntrySchema = z.object({
  date: isoDate,
  hours: z.number().min(0).max(24),
  bedtime: timeOfDay.optional(),
  waketime: timeOfDay.optional(),
});

const storedProfileSchema = z.object({
  target: z.number().positive().max(24).optional(),
  wake_time: timeOfDay.optional(),
  age: z.number().int().min(0).max(MAX_AGE_YEARS).optional(),
  birthdate: isoDate.optional(),
  name: z.string().optional(),
  notes: z.string().optional(),
});

export const storedDocumentSchema = z.object({
  entries: z.array(storedEntrySchema).default([]),
  profile: storedProfileSchema.default({}),
});

export type StoredDocument = z.infer<typeof storedDocumentSchema>;
export type StoredProfile = z.infer<typeof storedProfileSchema>;

export function profileFromStored(stored: StoredProfile, fallback: SleepProfile): SleepProfile {
  const profile: SleepProfile = {
    target: stored.target ?? fallback.target,
    wakeTime: stored.wake_time ?? fallback.wakeTime,
  };
  if (stored.age !== undefined) profile.age = stored.age;
  if (stored.birthdate !== undefined) profile.birthdate = stored.birthdate;
  if (stored.name !== undefined) profile.name = stored.name;
  if (stored.notes !== undefined) profile.notes = stored.notes;
  return profile;
}

export function profileToStored(profile: SleepProfile): StoredProfile {
  const stored: StoredProfile = { target: profile.target, wake_time: profile.wakeTime };
  if (profile.age !== undefined) stored.age = profile.age;
  if (profile.birthdate !== undefined) stored.birthdate = profile.birthdate;
  if (profile.name !== undefined) stored.name = profile.name;
  if (profile.notes !== undefined) stored.notes = profile.notes;
  return stored;
}

function entryToStored(entry: SleepEntry): SleepEntry {
  const stored: SleepEntry = { date: entry.date, hours: entry.hours };
  if (entry.bedtime !== undefined) stored.bedtime = entry.bedtime;
  if (entry.waketime !== undefined) stored.waketime = entry.waketime;
  return stored;
}

export function documentFromStored(stored: StoredDocument, fallback: SleepProfile): LedgerDocument {
  return {
    entries: stored.entries.map(entryToStored),
    profile: profileFromStored(stored.profile, fallback),
  };
}

export function documentToStored(document: LedgerDocument): StoredDocument {
  return {
    entries: document.entries.map(entryToStored),
    profile: profileToStored(document.profile),
  };
}
