import type { LedgerDocument } from '../core/ledger/types.js';

export interface LedgerStorePort {
  /** Where the ledger lives, for messages. */
  readonly location: string;
  /** Whether anything has been stored yet. */
  exists(): boolean;
  /** The stored ledger, or an empty one with the default profile. */
  load(): LedgerDocument;
  save(document: LedgerDocument): void;
  close(): void;
}
