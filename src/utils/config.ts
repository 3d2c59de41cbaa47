import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';

import { ConfigurationError } from '../core/errors.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const envSchema = z.object({
  // Page access token. Optional here: it is re-read per request by the credential resolver
  PAGE_ACCESS_TOKEN: z.string().optional(),

  // Graph API
  GRAPH_API_VERSION: z.string()
    .regex(/^v\d+\.\d+$/, 'GRAPH_API_VERSION must look like v3.1')
    .default('v3.1'),
  GRAPH_API_BASE_URL: z.string().url().default('https://graph.facebook.com'),

  // Infrastructure. Unset leaves the logger at its startup level
  LOG_LEVEL: LogLevelSchema.optional(),
});

export type MessengerConfig = z.infer<typeof envSchema>;

/** Environment-shaped record; `process.env` satisfies it. */
export type EnvRecord = Record<string, string | undefined>;

export interface LoadConfigOptions {
  env?: EnvRecord;
  /**
   * Load this `.env` file into `process.env` first. Ignored when `env` is
   * given. Variables already set in `process.env` win over the file.
   */
  dotenvPath?: string;
}

/**
 * Parse the messenger configuration from the environment.
 *
 * Unlike a bot process, a library must not exit on bad configuration, so
 * every issue is collected into a single `ConfigurationError`.
 */
export function loadMessengerConfig(options: LoadConfigOptions = {}): MessengerConfig {
  if (!options.env && options.dotenvPath) {
    loadDotenv({ path: options.dotenvPath });
  }

  const env = options.env ?? process.env;
  const parsed = envSchema.safeParse({
    ...env,
    // Treat blank values as unset so defaults still apply
    GRAPH_API_VERSION: env.GRAPH_API_VERSION || undefined,
    GRAPH_API_BASE_URL: env.GRAPH_API_BASE_URL || undefined,
    LOG_LEVEL: env.LOG_LEVEL || undefined,
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment variables: ${details}`);
  }

  return {
    ...parsed.data,
    GRAPH_API_BASE_URL: parsed.data.GRAPH_API_BASE_URL.replace(/\/+$/, ''),
  };
}
