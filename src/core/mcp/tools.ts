/**
 * MCP tools probe
 *
 * Connects to the MCP server over Streamable HTTP and lists its tools.
 * A 401 is returned as a challenge rather than thrown, so the caller can
 * feed its `WWW-Authenticate` header back into discovery.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { VERSION } from '../../version.js';
import { DEFAULT_TIMEOUT_MS, type FetchLike } from '../http.js';
import type { UnauthorizedChallenge } from '../oauth/types.js';
import { OAuthClientError, TransportError } from '../utils/errors.js';
import { noopLogger, type Logger } from '../utils/logger.js';

export interface McpToolSummary {
  name: string;
  description?: string;
}

export type ListToolsResult =
  | { status: 'ok'; tools: McpToolSummary[] }
  | { status: 'unauthorized'; challenge: UnauthorizedChallenge };

export interface ListToolsOptions {
  accessToken?: string;
  fetch?: FetchLike;
  logger?: Logger;
  /** Deadline for the whole exchange (connect and tools/list) */
  timeoutMs?: number;
}

export async function listMcpTools(serverUrl: string, options: ListToolsOptions = {}): Promise<ListToolsResult> {
  const logger = options.logger ?? noopLogger;
  const baseFetch = options.fetch ?? fetch;

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const deadline = new AbortController();
  const timer = setTimeout(() => {
    deadline.abort(new TransportError('timeout', `MCP request to ${serverUrl} timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const refused: { challenge?: UnauthorizedChallenge } = {};
  const probeFetch: FetchLike = async (input, init) => {
    const controller = new AbortController();
    const sources = [deadline.signal, init?.signal].filter((signal): signal is AbortSignal => signal != null);
    for (const signal of sources) {
      if (signal.aborted) {
        controller.abort(signal.reason);
      } else {
        signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
      }
    }

    const response = await baseFetch(input, { ...init, signal: controller.signal });
    if (response.status === 401) {
      refused.challenge = { status: 401, wwwAuthenticate: response.headers.get('WWW-Authenticate') };
    }
    return response;
  };

  const headers: Record<string, string> = {};
  if (options.accessToken) {
    headers.Authorization = `Bearer ${options.accessToken}`;
  }

  const client = new Client({ name: 'mybooks-mcp', version: VERSION });
  const transport = new StreamableHTTPClientTransport(new URL(serverUrl), {
    requestInit: { headers },
    fetch: probeFetch,
  });

  try {
    await client.connect(transport);
    const result = await client.listTools();
    return {
      status: 'ok',
      tools: result.tools.map((tool) => ({ name: tool.name, description: tool.description })),
    };
  } catch (error) {
    const { challenge } = refused;
    if (challenge) {
      logger.debug(`MCP server refused the request: ${challenge.wwwAuthenticate ?? '(no WWW-Authenticate)'}`);
      return { status: 'unauthorized', challenge };
    }
    const reason: unknown = deadline.signal.reason;
    const failure = deadline.signal.aborted && reason instanceof TransportError ? reason : error;
    const detail = failure instanceof Error ? failure.message : String(failure);
    throw new OAuthClientError(`Unable to list tools from ${serverUrl}: ${detail}`, { cause: failure });
  } finally {
    clearTimeout(timer);
    await client.close();
  }
}
