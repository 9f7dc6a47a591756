import type { Database } from 'better-sqlite3';
import type { SleepProfile } from '../../core/ledger/types.js';

type ProfileRow = {
  target: number;
  wake_time: number;
  age: number | null;
  birthdate: string | null;
  name: string | null;
  notes: string | null;
};

export class ProfileRepository {
  constructor(private readonly db: Database) {}

  get(): SleepProfile | null {
    const row = this.db
      .prepare('SELECT target, wake_time, age, birthdate, name, notes FROM profile WHERE id = 1')
      .get() as ProfileRow | undefined;

    if (!row) return null;

    const profile: SleepProfile = { target: row.target, wakeTime: row.wake_time };
    if (row.age != null) profile.age = row.age;
    if (row.birthdate != null) profile.birthdate = row.birthdate;
    if (row.name != null) profile.name = row.name;
    if (row.notes != null) profile.notes = row.notes;
    return profile;
  }

  upsert(profile: SleepProfile): void {
    this.db
      .prepare(
        `INSERT INTO profile (id, target, wake_time, age, birthdate, name, notes, updated_at)
         VALUES (1, ?, ?, ?, ?, ?, ?, strftime('%s', 'now'))
         ON CONFLICT(id) DO UPDATE SET
           target = excluded.target,
           wake_time = excluded.wake_time,
           age = excluded.age,
           birthdate = excluded.birthdate,
           name = excluded.name,
           notes = excluded.notes,
           updated_at = strftime('%s', 'now')`
      )
      .run(
        profile.target,
        profile.wakeTime,
        profile.age ?? null,
        profile.birthdate ?? null,
        profile.name ?? null,
        profile.notes ?? null
      );
  }
}
