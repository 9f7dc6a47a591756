import { describe, it, expect } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../../config/index.js';
import { storePath } from '../../adapters/storage/createLedgerStore.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      dataPath: join(homedir(), '.sleepdebt', 'sleep_data.json'),
      store: 'json',
      targetHours: 7,
      wakeTime: '06:45',
      maxRecoveryPerNight: 1.5,
      optimalHours: 8,
      onsetBufferMinutes: 15,
      logLevel: 'warn',
    });
  });

  it('reads and coerces environment values', () => {
    const config = loadConfig({
      SLEEPDEBT_DATA_PATH: '/tmp/sleep.json',
      SLEEPDEBT_STORE: 'sqlite',
      SLEEPDEBT_TARGET_HOURS: '7.5',
      SLEEPDEBT_WAKE_TIME: '07:15',
      SLEEPDEBT_MAX_RECOVERY: '2',
      LOG_LEVEL: 'silent',
    });
    expect(config.dataPath).toBe('/tmp/sleep.json');
    expect(config.store).toBe('sqlite');
    expect(config.targetHours).toBe(7.5);
    expect(config.wakeTime).toBe('07:15');
    expect(config.maxRecoveryPerNight).toBe(2);
    expect(config.logLevel).toBe('silent');
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ SLEEPDEBT_STORE: '', SLEEPDEBT_TARGET_HOURS: '' }).targetHours).toBe(7);
  });

  it('reports every invalid value', () => {
    const load = () => loadConfig({ SLEEPDEBT_STORE: 'csv', SLEEPDEBT_WAKE_TIME: '25:00' });
    expect(load).toThrow(ConfigError);
    expect(load).toThrow(/store:/);
    expect(load).toThrow(/wakeTime:/);
  });
});

describe('storePath', () => {
  it('swaps the extension for the sqlite store', () => {
    expect(storePath({ dataPath: '/tmp/a.json', store: 'sqlite' })).toBe('/tmp/a.db');
    expect(storePath({ dataPath: '/tmp/a.json', store: 'json' })).toBe('/tmp/a.json');
  });
});
