/**
 * Read-only commands: `discover` and `tools`.
 */

import { listMcpTools } from '../core/mcp/tools.js';
import { OAuthClientError } from '../core/utils/errors.js';
import type { CliConfig } from './config.js';
import { createCliSession, probeServer, resolveDeps, type CliDeps } from './context.js';

/**
 * Print the discovered metadata as JSON on stdout.
 */
export async function runDiscover(config: CliConfig, cliDeps: CliDeps = {}): Promise<void> {
  const deps = resolveDeps(cliDeps);
  const { session } = createCliSession(config, deps);

  const probe = await probeServer(config, deps);
  const metadata = await session.getMetadata(probe?.status === 'unauthorized' ? { unauthorized: probe.challenge } : {});
  console.log(JSON.stringify(metadata, null, 2));
}

export async function runTools(config: CliConfig, cliDeps: CliDeps = {}): Promise<void> {
  const deps = resolveDeps(cliDeps);
  const { session } = createCliSession(config, deps);

  const credentials = await session.loadCredentials();
  if (!credentials.accessToken) {
    throw new OAuthClientError('Not authorized. Run `mybooks-mcp auth` first.');
  }

  const result = await listMcpTools(config.serverUrl, {
    accessToken: credentials.accessToken,
    fetch: deps.fetch,
    logger: deps.logger,
    timeoutMs: config.timeoutMs,
  });
  if (result.status === 'unauthorized') {
    throw new OAuthClientError(
      'The MCP server rejected the stored access token. Run `mybooks-mcp auth --force` to re-authorize.'
    );
  }

  if (result.tools.length === 0) {
    console.log('The server exposes no tools.');
    return;
  }
  for (const tool of result.tools) {
    console.log(tool.description ? `- ${tool.name}: ${tool.description}` : `- ${tool.name}`);
  }
}
