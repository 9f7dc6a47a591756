export type SleepBand = 'good' | 'short' | 'severe';

export function sleepBand(hours: number): SleepBand {
  if (hours >= 7) return 'good';
  if (hours >= 6) return 'short';
  return 'severe';
}

export interface RecommendedRange {
  label: string;
  min: number;
  max: number;
}

// National Sleep Foundation guidance, by age in years.
const AGE_RANGES: ReadonlyArray<{ upTo: number; range: RecommendedRange }> = [
  { upTo: 5, range: { label: 'preschool (3-5)', min: 10, max: 13 } },
  { upTo: 13, range: { label: 'school age (6-13)', min: 9, max: 11 } },
  { upTo: 17, range: { label: 'teen (14-17)', min: 8, max: 10 } },
  { upTo: 25, range: { label: 'young adult (18-25)', min: 7, max: 9 } },
  { upTo: 64, range: { label: 'adult (26-64)', min: 7, max: 9 } },
  { upTo: Number.POSITIVE_INFINITY, range: { label: 'older adult (65+)', min: 7, max: 8 } },
];

export function recommendedRangeForAge(age: number | undefined): RecommendedRange {
  const fallback = { label: 'adult', min: 7, max: 9 };
  if (age === undefined || age < 3) return fallback;
  return AGE_RANGES.find((band) => age <= band.upTo)?.range ?? fallback;
}

/** Whole years between an ISO birthdate and `now`. */
export function ageFromBirthdate(birthdate: string, now: Date = new Date()): number | undefined {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(birthdate);
  if (!m) return undefined;
  const year = Number(m[1]);
  const month = Number(m[2]) - 1;
  const day = Number(m[3]);
  let age = now.getFullYear() - year;
  if (now.getMonth() < month || (now.getMonth() === month && now.getDate() < day)) age -= 1;
  return age >= 0 ? age : undefined;
}
