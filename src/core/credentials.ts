import { ConfigurationError } from './errors.js';
import type { EnvRecord } from '../utils/config.js';

export const CREDENTIAL_KEY = 'PAGE_ACCESS_TOKEN';

/** A host application's settings object, or a function that looks one up lazily. */
export type SettingsProvider =
  | { PAGE_ACCESS_TOKEN?: string | null }
  | (() => { PAGE_ACCESS_TOKEN?: string | null } | undefined);

export interface CredentialResolver {
  /** Resolve the page access token. Never cached. */
  resolveCredential(): string;
}

export interface CredentialResolverParams {
  env?: EnvRecord;
  /** Token from an explicitly parsed configuration; checked after `env`. */
  configured?: string;
  fallback?: SettingsProvider;
}

function readFallback(fallback: SettingsProvider | undefined): string | null {
  if (!fallback) return null;
  const settings = typeof fallback === 'function' ? fallback() : fallback;
  const value = settings?.PAGE_ACCESS_TOKEN;
  return typeof value === 'string' && value ? value : null;
}

export function createCredentialResolver(params: CredentialResolverParams = {}): CredentialResolver {
  return {
    resolveCredential(): string {
      const env = params.env ?? process.env;
      const fromEnv = env[CREDENTIAL_KEY];
      if (fromEnv) return fromEnv;

      if (params.configured) return params.configured;

      const fromSettings = readFallback(params.fallback);
      if (fromSettings) return fromSettings;

      throw new ConfigurationError();
    },
  };
}
