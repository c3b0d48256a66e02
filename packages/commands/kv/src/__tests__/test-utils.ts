import { vi } from 'vitest';
import type { Target } from '@kvctl/schemas';

// Mock fetch globally
export const mockFetch = vi.fn<typeof fetch>();
vi.stubGlobal('fetch', mockFetch);

export const BASE_URL = 'https://api.example.test/client/v4';

export function createTarget(overrides?: Partial<Target>): Target {
  return {
    name: 'my-worker',
    account_id: 'acc123',
    kv_namespaces: [
      { binding: 'CACHE', id: 'ns-cache' },
      { binding: 'SESSIONS', id: 'ns-sessions' },
    ],
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function successEnvelope(
  result: unknown,
  resultInfo?: Record<string, unknown>,
): Record<string, unknown> {
  return {
    success: true,
    errors: [],
    messages: [],
    result,
    ...(resultInfo ? { result_info: resultInfo } : {}),
  };
}

export function errorEnvelope(
  errors: Array<{ code: number; message: string }>,
): Record<string, unknown> {
  return { success: false, errors, messages: [], result: null };
}

/**
 * URL and init of the nth fetch call.
 */
export function fetchCall(index = 0): { url: string; init: RequestInit } {
  const call = mockFetch.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  const [input, init = {}] = call;
  return { url: String(input), init };
}
