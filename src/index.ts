#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import chalk from 'chalk';
import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { SleepDebtError } from './utils/errors.js';
import { parseClockTime } from './adapters/input/inputParser.js';
import { createLedgerStore } from './adapters/storage/createLedgerStore.js';
import { ReadlinePrompter } from './cli/prompter.js';
import { createProgram } from './cli/program.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  const config = loadConfig();
  const fallbackProfile = { target: config.targetHours, wakeTime: parseClockTime(config.wakeTime) };
  const prompter = new ReadlinePrompter();

  const program = createProgram({
    openStore: () => createLedgerStore(config, fallbackProfile),
    settings: {
      maxRecoveryPerNight: config.maxRecoveryPerNight,
      optimalSleep: config.optimalHours,
      onsetBufferMinutes: config.onsetBufferMinutes,
    },
    now: () => new Date(),
    print: (line = '') => console.log(line),
    prompter,
    chalk,
  });

  try {
    await program.parseAsync(process.argv);
  } finally {
    prompter.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof SleepDebtError) {
    logger.debug({ code: error.code }, error.message);
    console.error(chalk.red(`✗ ${error.message}`));
  } else {
    logger.error({ error }, 'Unexpected failure');
    console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exitCode = 1;
});
