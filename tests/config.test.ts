import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '../src/core/errors.js';
import { createMessengerClient } from '../src/messenger/client.js';
import { loadMessengerConfig } from '../src/utils/config.js';
import { capturedRequest, createFetchStub } from './helpers/graph-fetch.js';

describe('loadMessengerConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadMessengerConfig({ env: {} });

    expect(config.PAGE_ACCESS_TOKEN).toBeUndefined();
    expect(config.GRAPH_API_VERSION).toBe('v3.1');
    expect(config.GRAPH_API_BASE_URL).toBe('https://graph.facebook.com');
    expect(config.LOG_LEVEL).toBeUndefined();
  });

  it('treats blank values as unset', () => {
    const config = loadMessengerConfig({
      env: { GRAPH_API_VERSION: '', GRAPH_API_BASE_URL: '', LOG_LEVEL: '' },
    });

    expect(config.GRAPH_API_VERSION).toBe('v3.1');
    expect(config.GRAPH_API_BASE_URL).toBe('https://graph.facebook.com');
    expect(config.LOG_LEVEL).toBeUndefined();
  });

  it('reads overrides and trims a trailing slash from the base URL', () => {
    const config = loadMessengerConfig({
      env: {
        PAGE_ACCESS_TOKEN: 'test-token',
        GRAPH_API_VERSION: 'v19.0',
        GRAPH_API_BASE_URL: 'https://graph.example.test/',
        LOG_LEVEL: 'debug',
      },
    });

    expect(config).toEqual({
      PAGE_ACCESS_TOKEN: 'test-token',
      GRAPH_API_VERSION: 'v19.0',
      GRAPH_API_BASE_URL: 'https://graph.example.test',
      LOG_LEVEL: 'debug',
    });
  });

  it('collects every invalid value into one ConfigurationError', () => {
    const load = () => loadMessengerConfig({
      env: { GRAPH_API_VERSION: 'latest', GRAPH_API_BASE_URL: 'not a url' },
    });

    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow('GRAPH_API_VERSION: GRAPH_API_VERSION must look like v3.1');
    expect(load).toThrow('GRAPH_API_BASE_URL: Invalid url');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadMessengerConfig({ env: { LOG_LEVEL: 'verbose' } })).toThrow(/^Invalid environment variables: LOG_LEVEL: /);
  });
});

describe('loadMessengerConfig with a .env file', () => {
  const DOTENV_KEYS = ['PAGE_ACCESS_TOKEN', 'GRAPH_API_VERSION', 'GRAPH_API_BASE_URL'] as const;
  const saved = new Map<string, string | undefined>();
  let dir = '';
  let dotenvPath = '';

  beforeEach(() => {
    for (const key of DOTENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    dir = mkdtempSync(join(tmpdir(), 'messenger-config-'));
    dotenvPath = join(dir, '.env');
    writeFileSync(dotenvPath, [
      'PAGE_ACCESS_TOKEN=dotenv-token',
      'GRAPH_API_VERSION=v18.0',
      'GRAPH_API_BASE_URL=https://graph.example.test/',
    ].join('\n'));
  });

  afterEach(() => {
    for (const key of DOTENV_KEYS) {
      const value = saved.get(key);
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the file into process.env before parsing', () => {
    const config = loadMessengerConfig({ dotenvPath });

    expect(config.PAGE_ACCESS_TOKEN).toBe('dotenv-token');
    expect(config.GRAPH_API_VERSION).toBe('v18.0');
    expect(config.GRAPH_API_BASE_URL).toBe('https://graph.example.test');
    expect(process.env.PAGE_ACCESS_TOKEN).toBe('dotenv-token');
  });

  it('does not override variables that are already set', () => {
    process.env.GRAPH_API_VERSION = 'v20.0';

    expect(loadMessengerConfig({ dotenvPath }).GRAPH_API_VERSION).toBe('v20.0');
  });

  it('ignores the file when an explicit env is given', () => {
    const config = loadMessengerConfig({ env: {}, dotenvPath });

    expect(config.GRAPH_API_VERSION).toBe('v3.1');
    expect(process.env.PAGE_ACCESS_TOKEN).toBeUndefined();
  });

  it('is forwarded by createMessengerClient', async () => {
    const fetchStub = createFetchStub();
    const client = createMessengerClient({ dotenvPath, fetch: fetchStub });

    await client.postSenderAction('1254459154682919', 'mark_seen');

    expect(capturedRequest(fetchStub).url.toString()).toBe(
      'https://graph.example.test/v18.0/me/messages?access_token=dotenv-token',
    );
  });
});
