import { z } from 'zod';
import dotenv from 'dotenv';
import { MAX_TIMER_MS } from '../utils/timer.js';

// Load environment variables from .env file
dotenv.config();

// Logging configuration schema
const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

// Definition files (empty string means the bundled config/ directory)
const definitionsSchema = z.object({
  toolsPath: z.string().default(''),
  profilesPath: z.string().default(''),
});

// Dispatcher defaults applied when a batch does not override them
const dispatchSchema = z.object({
  concurrencyLimit: z.number().int().positive().default(3),
  batchDeadlineMs: z.number().int().positive().max(MAX_TIMER_MS).optional(),
});

// Main configuration schema
export const configSchema = z.object({
  logging: loggingSchema.default({ level: 'info' }),
  definitions: definitionsSchema.default({ toolsPath: '', profilesPath: '' }),
  dispatch: dispatchSchema.default({ concurrencyLimit: 3 }),
});

// Type inference from schema
export type Config = z.infer<typeof configSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;
export type DefinitionsConfig = z.infer<typeof definitionsSchema>;
export type DispatchConfig = z.infer<typeof dispatchSchema>;

/**
 * Load configuration from environment variables
 * @returns Validated configuration object
 * @throws Error if configuration is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
    definitions: {
      toolsPath: env.COUNCIL_TOOLS_PATH || '',
      profilesPath: env.COUNCIL_PROFILES_PATH || '',
    },
    dispatch: {
      concurrencyLimit: env.COUNCIL_CONCURRENCY ? parseInt(env.COUNCIL_CONCURRENCY, 10) : 3,
      batchDeadlineMs: env.COUNCIL_BATCH_DEADLINE_MS
        ? parseInt(env.COUNCIL_BATCH_DEADLINE_MS, 10)
        : undefined,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errorMessages}`);
  }

  return result.data;
}

// Export a singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
