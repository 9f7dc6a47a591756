import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { LedgerStorePort } from '../../ports/LedgerStorePort.js';
import type { LedgerDocument, SleepProfile } from '../../core/ledger/types.js';
import { StorageError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { documentFromStored, documentToStored, storedDocumentSchema } from './ledgerDocument.js';

/** The whole ledger as one pretty-printed JSON document. */
export class JsonLedgerStore implements LedgerStorePort {
  private readonly logger = createLogger({ component: 'JsonLedgerStore' });

  constructor(
    private readonly filePath: string,
    private readonly fallbackProfile: SleepProfile
  ) {}

  get location(): string {
    return this.filePath;
  }

  exists(): boolean {
    return existsSync(this.filePath);
  }

  load(): LedgerDocument {
    if (!this.exists()) {
      this.logger.debug({ filePath: this.filePath }, 'No ledger file, starting empty');
      return { entries: [], profile: { ...this.fallbackProfile } };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new StorageError(`Could not read ${this.filePath}`, { cause: error });
    }

    try {
      const document = documentFromStored(storedDocumentSchema.parse(raw), this.fallbackProfile);
      this.logger.debug({ filePath: this.filePath, entries: document.entries.length }, 'Loaded ledger');
      return document;
    } catch (error) {
      if (error instanceof z.ZodError) {
        const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new StorageError(`Invalid ledger file ${this.filePath}:\n${issues.join('\n')}`, { cause: error });
      }
      throw error;
    }
  }

  // Write beside the target and rename over it, so a crash never leaves half a file.
  save(document: LedgerDocument): void {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tmpPath, `${JSON.stringify(documentToStored(document), null, 2)}\n`);
      renameSync(tmpPath, this.filePath);
    } catch (error) {
      this.logger.error({ error, filePath: this.filePath }, 'Failed to save ledger');
      throw new StorageError(`Could not write ${this.filePath}`, { cause: error });
    }
    this.logger.debug({ filePath: this.filePath, entries: document.entries.length }, 'Saved ledger');
  }

  close(): void {}
}
