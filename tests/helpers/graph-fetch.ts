import { vi } from 'vitest';

import type { FetchLike } from '../../src/core/graph-transport.js';

export const TEST_TOKEN = 'test-token';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** A `fetch` stand-in answering every call with a fresh success response. */
export function createFetchStub(
  respond: () => Response = () => jsonResponse({ recipient_id: '1254459154682919', message_id: 'mid.test' }),
) {
  return vi.fn<FetchLike>(async () => respond());
}

export interface CapturedRequest {
  url: URL;
  method: string | undefined;
  headers: RequestInit['headers'];
  body: unknown;
}

export function capturedRequest(stub: ReturnType<typeof createFetchStub>, index = 0): CapturedRequest {
  const call = stub.mock.calls[index];
  if (!call) throw new Error(`Expected fetch call #${index}`);
  const [input, init] = call;
  return {
    url: new URL(input),
    method: init?.method,
    headers: init?.headers,
    body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
  };
}
