import { describe, expect, it, vi } from 'vitest';

import { createCredentialResolver } from '../src/core/credentials.js';
import { ConfigurationError } from '../src/core/errors.js';
import { MESSAGES_PATH, MESSENGER_PROFILE_PATH, createGraphTransport } from '../src/core/graph-transport.js';
import { TEST_TOKEN, capturedRequest, createFetchStub, jsonResponse } from './helpers/graph-fetch.js';

function transportWith(fetchStub: ReturnType<typeof createFetchStub>, env: Record<string, string> = { PAGE_ACCESS_TOKEN: TEST_TOKEN }) {
  return createGraphTransport({
    credentials: createCredentialResolver({ env }),
    baseUrl: 'https://graph.facebook.com',
    apiVersion: 'v3.1',
    fetch: fetchStub,
  });
}

describe('Graph transport', () => {
  it('posts JSON to the versioned endpoint with the token in the query string', async () => {
    const fetchStub = createFetchStub();
    await transportWith(fetchStub).post(MESSAGES_PATH, { hello: 'world' });

    expect(fetchStub).toHaveBeenCalledTimes(1);
    const [url, init] = fetchStub.mock.calls[0];
    expect(url).toBe('https://graph.facebook.com/v3.1/me/messages?access_token=test-token');
    expect(init).toEqual({
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"hello":"world"}',
    });
  });

  it('sends DELETE with a JSON body', async () => {
    const fetchStub = createFetchStub();
    await transportWith(fetchStub).delete(MESSENGER_PROFILE_PATH, { fields: ['whitelisted_domains'] });

    const request = capturedRequest(fetchStub);
    expect(request.method).toBe('DELETE');
    expect(request.url.pathname).toBe('/v3.1/me/messenger_profile');
    expect(request.body).toEqual({ fields: ['whitelisted_domains'] });
  });

  it('puts query fields before the access token on GET and sends no body', async () => {
    const fetchStub = createFetchStub();
    await transportWith(fetchStub).get('1254459154682919', { fields: 'name,first_name' });

    const [url, init] = fetchStub.mock.calls[0];
    expect(url).toBe('https://graph.facebook.com/v3.1/1254459154682919?fields=name%2Cfirst_name&access_token=test-token');
    expect(init).toEqual({ method: 'GET' });
  });

  it('returns non-success responses unmodified', async () => {
    const failure = jsonResponse({ error: { message: 'Invalid OAuth access token.', code: 190 } }, 400);
    const fetchStub = createFetchStub(() => failure);

    const response = await transportWith(fetchStub).post(MESSAGES_PATH, {});

    expect(response).toBe(failure);
    expect(response.status).toBe(400);
  });

  it('lets fetch rejections propagate', async () => {
    const fetchStub = vi.fn(async (): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const transport = createGraphTransport({
      credentials: createCredentialResolver({ env: { PAGE_ACCESS_TOKEN: TEST_TOKEN } }),
      baseUrl: 'https://graph.facebook.com',
      apiVersion: 'v3.1',
      fetch: fetchStub,
    });

    await expect(transport.post(MESSAGES_PATH, {})).rejects.toThrow('fetch failed');
  });

  it('fails on a missing token before any request is made', async () => {
    const fetchStub = createFetchStub();

    await expect(transportWith(fetchStub, {}).post(MESSAGES_PATH, {})).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetchStub).not.toHaveBeenCalled();
  });

  it('uses the global fetch when none is injected', async () => {
    const spy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ result: 'success' }));
    const transport = createGraphTransport({
      credentials: createCredentialResolver({ env: { PAGE_ACCESS_TOKEN: TEST_TOKEN } }),
      baseUrl: 'https://graph.example.test',
      apiVersion: 'v19.0',
    });

    await transport.post(MESSENGER_PROFILE_PATH, {});

    expect(spy).toHaveBeenCalledWith(
      'https://graph.example.test/v19.0/me/messenger_profile?access_token=test-token',
      expect.objectContaining({ method: 'POST' }),
    );
    spy.mockRestore();
  });
});
