import { createCredentialResolver, type SettingsProvider } from '../core/credentials.js';
import { createGraphTransport, type FetchLike } from '../core/graph-transport.js';
import { logger } from '../middleware/logger.js';
import { loadMessengerConfig, type EnvRecord, type MessengerConfig } from '../utils/config.js';
import { createProfileApi, type ProfileApi } from './profile-api.js';
import { createSendApi, type SendApi } from './send-api.js';
import { createUserProfileApi, type UserProfileApi } from './user-profile.js';

export interface MessengerClientOptions {
  /**
   * Parsed configuration; read from `env` when omitted. Its
   * `PAGE_ACCESS_TOKEN` is used when `env` has none, and its `LOG_LEVEL`
   * is applied to the shared logger.
   */
  config?: MessengerConfig;
  /** Where the access token is looked up on every request. Defaults to `process.env`. */
  env?: EnvRecord;
  /** `.env` file loaded into `process.env` when neither `config` nor `env` is given. */
  dotenvPath?: string;
  /** Consulted last, when neither `env` nor `config` has a token. */
  fallback?: SettingsProvider;
  fetch?: FetchLike;
}

export type MessengerClient = ProfileApi & SendApi & UserProfileApi;

export function createMessengerClient(options: MessengerClientOptions = {}): MessengerClient {
  const config = options.config
    ?? loadMessengerConfig({ env: options.env, dotenvPath: options.dotenvPath });

  if (config.LOG_LEVEL) {
    logger.level = config.LOG_LEVEL;
  }

  const transport = createGraphTransport({
    credentials: createCredentialResolver({
      env: options.env,
      // A config loaded here mirrors `env`, which is already read live per request
      configured: options.config?.PAGE_ACCESS_TOKEN,
      fallback: options.fallback,
    }),
    baseUrl: config.GRAPH_API_BASE_URL,
    apiVersion: config.GRAPH_API_VERSION,
    fetch: options.fetch,
  });

  return {
    ...createProfileApi(transport),
    ...createSendApi(transport),
    ...createUserProfileApi(transport),
  };
}
