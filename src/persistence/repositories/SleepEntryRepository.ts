import type { Database } from 'better-sqlite3';
import type { SleepEntry } from '../../core/ledger/types.js';

type SleepEntryRow = {
  date: string;
  hours: number;
  bedtime: number | null;
  waketime: number | null;
};

function rowToEntry(row: SleepEntryRow): SleepEntry {
  const entry: SleepEntry = { date: row.date, hours: row.hours };
  if (row.bedtime != null) entry.bedtime = row.bedtime;
  if (row.waketime != null) entry.waketime = row.waketime;
  return entry;
}

export class SleepEntryRepository {
  constructor(private readonly db: Database) {}

  upsert(entry: SleepEntry): void {
    this.db
      .prepare(
        `INSERT INTO sleep_entries (date, hours, bedtime, waketime, updated_at)
         VALUES (?, ?, ?, ?, strftime('%s', 'now'))
         ON CONFLICT(date) DO UPDATE SET
           hours = excluded.hours,
           bedtime = excluded.bedtime,
           waketime = excluded.waketime,
           updated_at = strftime('%s', 'now')`
      )
      .run(entry.date, entry.hours, entry.bedtime ?? null, entry.waketime ?? null);
  }

  getAll(): SleepEntry[] {
    const rows = this.db
      .prepare('SELECT date, hours, bedtime, waketime FROM sleep_entries ORDER BY date ASC')
      .all() as SleepEntryRow[];
    return rows.map(rowToEntry);
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS n FROM sleep_entries').get() as { n: number };
    return row.n;
  }
}
