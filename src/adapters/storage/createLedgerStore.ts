import type { Config } from '../../config/index.js';
import type { LedgerStorePort } from '../../ports/LedgerStorePort.js';
import type { SleepProfile } from '../../core/ledger/types.js';
import { JsonLedgerStore } from './JsonLedgerStore.js';
import { SqliteLedgerStore } from './SqliteLedgerStore.js';

export function storePath(config: Pick<Config, 'dataPath' | 'store'>): string {
  if (config.store === 'sqlite' && config.dataPath.endsWith('.json')) {
    return `${config.dataPath.slice(0, -'.json'.length)}.db`;
  }
  return config.dataPath;
}

export function createLedgerStore(config: Pick<Config, 'dataPath' | 'store'>, fallbackProfile: SleepProfile): LedgerStorePort {
  const path = storePath(config);
  return config.store === 'sqlite'
    ? new SqliteLedgerStore(path, fallbackProfile)
    : new JsonLedgerStore(path, fallbackProfile);
}
