/**
 * Outbound HTTP
 *
 * One helper for every call the OAuth core makes: bounded timeout,
 * optional caller cancellation, body read inside the timeout window.
 */

import { TransportError } from './utils/errors.js';
import type { Logger } from './utils/logger.js';

export const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * Options accepted by every network operation.
 */
export interface HttpOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface HttpResult {
  url: string;
  status: number;
  statusText: string;
  ok: boolean;
  headers: Headers;
  body: string;
}

export async function requestText(
  url: string,
  init: RequestInit,
  options: HttpOptions = {}
): Promise<HttpResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;
  const method = init.method ?? 'GET';

  if (options.signal?.aborted) {
    throw new TransportError('aborted', `${method} ${url} was cancelled`);
  }

  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(
      new TransportError('timeout', `${method} ${url} timed out after ${timeoutMs}ms`)
    );
  }, timeoutMs);
  const onAbort = () => {
    controller.abort(new TransportError('aborted', `${method} ${url} was cancelled`));
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  options.logger?.debug(`${method} ${url}`);

  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });
    const body = await response.text();
    return {
      url,
      status: response.status,
      statusText: response.statusText,
      ok: response.ok,
      headers: response.headers,
      body,
    };
  } catch (error) {
    const reason: unknown = controller.signal.reason;
    if (controller.signal.aborted && reason instanceof TransportError) {
      throw reason;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new TransportError('network', `${method} ${url} failed: ${detail}`, { cause: error });
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
}

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: string };

export function parseJsonBody(body: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Clip text for error messages, marking the cut with an ellipsis.
 */
export function truncate(text: string, length: number): string {
  const trimmed = text.trim();
  return trimmed.length <= length ? trimmed : `${trimmed.slice(0, length)}…`;
}
