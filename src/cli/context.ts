/**
 * Wiring shared by the CLI commands.
 */

import type { Hono } from 'hono';
import type { FetchLike } from '../core/http.js';
import { listMcpTools, type ListToolsResult } from '../core/mcp/tools.js';
import { OAuthSession } from '../core/session.js';
import { createFileStores, type FileStores } from '../core/storage/file.js';
import { formatErrorForDisplay } from '../core/utils/errors.js';
import { logger as stderrLogger, type Logger } from '../core/utils/logger.js';
import { openBrowser } from './browser.js';
import { closeServer, listen } from './callback-server.js';
import type { CliConfig } from './config.js';

export interface CallbackListener {
  close(): Promise<void>;
}

/**
 * Collaborators of the commands; tests replace them.
 */
export interface CliDeps {
  logger?: Logger;
  fetch?: FetchLike;
  openUrl?: (url: string) => Promise<unknown>;
  serve?: (app: Hono, port: number, hostname: string) => Promise<CallbackListener>;
  callbackTimeoutMs?: number;
}

export interface ResolvedDeps {
  logger: Logger;
  fetch?: FetchLike;
  openUrl: (url: string) => Promise<unknown>;
  serve: (app: Hono, port: number, hostname: string) => Promise<CallbackListener>;
  callbackTimeoutMs?: number;
}

async function serveOnLoopback(app: Hono, port: number, hostname: string): Promise<CallbackListener> {
  const server = await listen(app, port, hostname);
  return { close: () => closeServer(server) };
}

export function resolveDeps(deps: CliDeps = {}): ResolvedDeps {
  return {
    logger: deps.logger ?? stderrLogger,
    fetch: deps.fetch,
    openUrl: deps.openUrl ?? openBrowser,
    serve: deps.serve ?? serveOnLoopback,
    callbackTimeoutMs: deps.callbackTimeoutMs,
  };
}

export interface CliSession {
  session: OAuthSession;
  stores: FileStores;
}

export function createCliSession(config: CliConfig, deps: ResolvedDeps): CliSession {
  const stores = createFileStores(config.profile, config.dataDir, deps.logger);
  const session = new OAuthSession(
    {
      serverUrl: config.serverUrl,
      redirectUri: config.redirectUri,
      scope: config.scope,
      clientName: config.clientName,
      userAuthClientId: config.userAuthClientId,
      registrationRequiresAuth: config.registrationRequiresAuth,
    },
    {
      flows: stores.flows,
      credentials: stores.credentials,
      fetch: deps.fetch,
      timeoutMs: config.timeoutMs,
      logger: deps.logger,
    }
  );
  return { session, stores };
}

/**
 * Anonymous request to the MCP server. Its 401 challenge, if any, points
 * discovery at the right metadata. An unreachable server is logged and
 * reported as undefined; discovery then guesses from the host.
 */
export async function probeServer(config: CliConfig, deps: ResolvedDeps): Promise<ListToolsResult | undefined> {
  try {
    return await listMcpTools(config.serverUrl, {
      fetch: deps.fetch,
      logger: deps.logger,
      timeoutMs: config.timeoutMs,
    });
  } catch (error) {
    deps.logger.warn(`Could not probe ${config.serverUrl}: ${formatErrorForDisplay(error)}`);
    return undefined;
  }
}
