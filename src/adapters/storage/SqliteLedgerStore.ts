import type { Database } from 'better-sqlite3';
import type { LedgerStorePort } from '../../ports/LedgerStorePort.js';
import type { LedgerDocument, SleepProfile } from '../../core/ledger/types.js';
import { openDatabase } from '../../persistence/database.js';
import { SleepEntryRepository } from '../../persistence/repositories/SleepEntryRepository.js';
import { ProfileRepository } from '../../persistence/repositories/ProfileRepository.js';
import { StorageError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export class SqliteLedgerStore implements LedgerStorePort {
  private readonly logger = createLogger({ component: 'SqliteLedgerStore' });
  private readonly db: Database;
  private readonly entries: SleepEntryRepository;
  private readonly profiles: ProfileRepository;

  constructor(
    private readonly dbPath: string,
    private readonly fallbackProfile: SleepProfile,
    db?: Database
  ) {
    this.db = db ?? openDatabase(dbPath);
    this.entries = new SleepEntryRepository(this.db);
    this.profiles = new ProfileRepository(this.db);
  }

  get location(): string {
    return this.dbPath;
  }

  exists(): boolean {
    return this.entries.count() > 0 || this.profiles.get() !== null;
  }

  load(): LedgerDocument {
    const entries = this.entries.getAll();
    const profile = this.profiles.get() ?? { ...this.fallbackProfile };
    this.logger.debug({ dbPath: this.dbPath, entries: entries.length }, 'Loaded ledger');
    return { entries, profile };
  }

  // Entries are upserted, never deleted.
  save(document: LedgerDocument): void {
    const write = this.db.transaction((doc: LedgerDocument) => {
      for (const entry of doc.entries) {
        this.entries.upsert(entry);
      }
      this.profiles.upsert(doc.profile);
    });
    try {
      write(document);
    } catch (error) {
      this.logger.error({ error, dbPath: this.dbPath }, 'Failed to save ledger');
      throw new StorageError(`Could not write ${this.dbPath}`, { cause: error });
    }
    this.logger.debug({ dbPath: this.dbPath, entries: document.entries.length }, 'Saved ledger');
  }

  close(): void {
    this.db.close();
  }
}
