import { logger } from '../middleware/logger.js';
import type { CredentialResolver } from './credentials.js';

export const THREAD_SETTINGS_PATH = 'me/thread_settings';
export const MESSENGER_PROFILE_PATH = 'me/messenger_profile';
export const MESSAGES_PATH = 'me/messages';
export const MESSAGE_ATTACHMENTS_PATH = 'me/message_attachments';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface GraphTransport {
  post(path: string, body: object): Promise<Response>;
  delete(path: string, body: object): Promise<Response>;
  get(path: string, query?: Record<string, string>): Promise<Response>;
}

export interface GraphTransportParams {
  credentials: CredentialResolver;
  baseUrl: string;
  apiVersion: string;
  /** Defaults to the global `fetch`, looked up per request. */
  fetch?: FetchLike;
}

/**
 * Thin HTTP layer over the Graph API. Responses come back exactly as `fetch`
 * produced them: non-2xx statuses are logged and returned, rejections
 * propagate, and nothing is retried.
 */
export function createGraphTransport(params: GraphTransportParams): GraphTransport {
  function buildUrl(path: string, query: Record<string, string>): string {
    // Resolve before anything else so a missing token fails without a URL or request
    const token = params.credentials.resolveCredential();
    const search = new URLSearchParams({ ...query, access_token: token });
    return `${params.baseUrl}/${params.apiVersion}/${path}?${search.toString()}`;
  }

  async function request(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    init: { query?: Record<string, string>; body?: object },
  ): Promise<Response> {
    const url = buildUrl(path, init.query ?? {});
    const doFetch = params.fetch ?? fetch;

    logger.debug({ method, path, apiVersion: params.apiVersion }, 'Calling Graph API');

    const response = await doFetch(url, {
      method,
      ...(init.body !== undefined
        ? { headers: JSON_HEADERS, body: JSON.stringify(init.body) }
        : {}),
    });

    if (!response.ok) {
      logger.warn({ method, path, status: response.status }, 'Graph API returned non-success status');
    }

    return response;
  }

  return {
    post: (path, body) => request('POST', path, { body }),
    delete: (path, body) => request('DELETE', path, { body }),
    get: (path, query) => request('GET', path, { query }),
  };
}
