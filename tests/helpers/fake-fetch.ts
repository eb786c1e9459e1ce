/**
 * In-process HTTP fakes for tests.
 */

import { vi } from 'vitest';
import type { FetchLike } from '../../src/core/http.js';

export type RouteHandler = (request: Request) => Response | Promise<Response>;

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Headers;
  body: string;
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function textResponse(
  body: string,
  status: number,
  statusText: string,
  headers: Record<string, string> = {}
): Response {
  return new Response(body, { status, statusText, headers });
}

/**
 * A fetch that answers from `routes`, keyed by `"METHOD url"` or by url
 * alone. Anything else gets a 404.
 */
export function createFakeFetch(routes: Record<string, RouteHandler>) {
  const requests: RecordedRequest[] = [];

  const fetchMock = vi.fn<FetchLike>(async (input, init) => {
    const request = new Request(input, init);
    requests.push({
      method: request.method,
      url: request.url,
      headers: request.headers,
      body: typeof init?.body === 'string' ? init.body : '',
    });
    const handler = routes[`${request.method} ${request.url}`] ?? routes[request.url];
    if (!handler) {
      return textResponse('Not Found', 404, 'Not Found');
    }
    return handler(request);
  });

  return { fetch: fetchMock, requests };
}

/**
 * A fetch that never answers and rejects once its signal aborts.
 */
export const hangingFetch: FetchLike = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
  });

export const AUTH_SERVER_METADATA = {
  issuer: 'https://auth.example.com',
  authorization_endpoint: 'https://auth.example.com/oauth/authorize',
  token_endpoint: 'https://auth.example.com/oauth/token',
  registration_endpoint: 'https://auth.example.com/oauth/register',
  scopes_supported: ['read', 'write'],
  grant_types_supported: ['authorization_code', 'refresh_token'],
  code_challenge_methods_supported: ['S256'],
};
