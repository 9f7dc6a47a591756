import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ component: 'database' });

export const IN_MEMORY = ':memory:';

export function openDatabase(dbPath: string): Database.Database {
  logger.debug({ dbPath }, 'Opening database');

  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  runMigrations(db);
  return db;
}

function runMigrations(db: Database.Database): void {
  logger.debug('Running database migrations');

  // One row per night
  db.exec(`
    CREATE TABLE IF NOT EXISTS sleep_entries (
      date TEXT PRIMARY KEY,
      hours REAL NOT NULL,
      bedtime REAL,
      waketime REAL,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  // Single-row profile
  db.exec(`
    CREATE TABLE IF NOT EXISTS profile (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      target REAL NOT NULL,
      wake_time REAL NOT NULL,
      age INTEGER,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  // Columns added after the first release
  const profileInfo = db.prepare('PRAGMA table_info(profile)').all() as Array<{ name: string }>;
  const profileColumns = new Set(profileInfo.map((c) => c.name));
  for (const col of ['birthdate', 'name', 'notes']) {
    if (!profileColumns.has(col)) {
      db.exec(`ALTER TABLE profile ADD COLUMN ${col} TEXT`);
      logger.info({ column: col }, 'Added column to profile table');
    }
  }

  logger.debug('Database migrations completed');
}
