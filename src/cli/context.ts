import type { ChalkInstance } from 'chalk';
import type { LedgerStorePort } from '../ports/LedgerStorePort.js';
import type { Prompter } from './prompter.js';
import { SleepLedger, type SettingsOverrides } from '../core/ledger/SleepLedger.js';

export interface CliDeps {
  openStore: () => LedgerStorePort;
  settings: SettingsOverrides;
  now: () => Date;
  print: (line?: string) => void;
  prompter: Prompter;
  chalk: ChalkInstance;
  random?: () => number;
}

/**
 * Load the ledger, run `fn`, and save only when it reports a change. The store
 * is closed whatever happens; a thrown error means nothing is written.
 */
export async function withLedger(
  deps: CliDeps,
  fn: (ledger: SleepLedger, store: LedgerStorePort) => boolean | void | Promise<boolean | void>
): Promise<void> {
  const store = deps.openStore();
  try {
    const ledger = new SleepLedger(store.load(), deps.settings);
    const changed = await fn(ledger, store);
    if (changed === true) {
      store.save(ledger.toDocument());
    }
  } finally {
    store.close();
  }
}

export function printLines(deps: CliDeps, lines: readonly string[]): void {
  for (const line of lines) deps.print(line);
}

export function printJson(deps: CliDeps, value: unknown): void {
  deps.print(JSON.stringify(value, null, 2));
}
