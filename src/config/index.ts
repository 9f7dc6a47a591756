import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const clockTime = /^([0-1]?[0-9]|2[0-3]):[0-5][0-9]$/;

const configSchema = z.object({
  // Storage
  dataPath: z.string().min(1).default(join(homedir(), '.sleepdebt', 'sleep_data.json')),
  store: z.enum(['json', 'sqlite']).default('json'),

  // Profile fallbacks (the stored profile wins when it has a value)
  targetHours: z.coerce.number().positive().max(24).default(7),
  wakeTime: z.string().regex(clockTime).default('06:45'),

  // Recovery model
  maxRecoveryPerNight: z.coerce.number().positive().max(12).default(1.5),
  optimalHours: z.coerce.number().positive().max(24).default(8),
  onsetBufferMinutes: z.coerce.number().int().min(0).max(180).default(15),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
  nodeEnv: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    dataPath: env('SLEEPDEBT_DATA_PATH'),
    store: env('SLEEPDEBT_STORE'),
    targetHours: env('SLEEPDEBT_TARGET_HOURS'),
    wakeTime: env('SLEEPDEBT_WAKE_TIME'),
    maxRecoveryPerNight: env('SLEEPDEBT_MAX_RECOVERY'),
    optimalHours: env('SLEEPDEBT_OPTIMAL_HOURS'),
    onsetBufferMinutes: env('SLEEPDEBT_ONSET_BUFFER_MINUTES'),
    logLevel: env('LOG_LEVEL'),
    nodeEnv: env('NODE_ENV'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }
}
