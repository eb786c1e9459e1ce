#!/usr/bin/env node
/**
 * MyBooks MCP - CLI Entry Point
 *
 * Usage:
 *   mybooks-mcp auth [--force]   - Authorize this CLI with the MCP server (opens browser)
 *   mybooks-mcp logout [--all]   - Remove tokens (and the client registration with --all)
 *   mybooks-mcp status           - Show registration and authorization state
 *   mybooks-mcp discover         - Print discovered OAuth metadata as JSON
 *   mybooks-mcp tools            - List the MCP server's tools
 *   mybooks-mcp --help           - Show help
 */

import { formatErrorForDisplay } from '../core/utils/errors.js';
import { logger } from '../core/utils/logger.js';
import { VERSION } from '../version.js';
import { runAuth, runLogout, runStatus } from './auth.js';
import { applyTlsSetting, loadConfig } from './config.js';
import { runDiscover, runTools } from './inspect.js';

function showHelp(): void {
  console.log(`
MyBooks MCP v${VERSION}
OAuth 2.1 client for MyBooks MCP servers

USAGE:
  mybooks-mcp <command> [options]

COMMANDS:
  auth      Authorize with the MCP server (opens browser)
              --force, -f   Re-authorize even when already authorized
  logout    Remove saved tokens and pending flows
              --all         Also remove the client registration
  status    Show registration and authorization status
  discover  Print the discovered OAuth metadata as JSON
  tools     List the tools of the MCP server
  --help    Show this help message
  --version Show version

ENVIRONMENT:
  MYBOOKS_MCP_SERVER_URL       MCP server URL (default: http://localhost:8000/mcp)
  MYBOOKS_REDIRECT_URI         Loopback redirect URI (default: http://127.0.0.1:8765/callback)
  MYBOOKS_OAUTH_SCOPES         Requested scopes (default: "read write")
  MYBOOKS_CLIENT_NAME          Client name sent at registration
  MYBOOKS_USER_AUTH_CLIENT_ID  Client id used to sign the user in before registering
  MYBOOKS_DCR_REQUIRES_AUTH    Registration needs a signed-in user (default: false)
  MYBOOKS_PROFILE              Name under which credentials are kept (default: default)
  MYBOOKS_DATA_DIR             Credentials directory (default: ~/.mybooks-mcp)
  MYBOOKS_HTTP_TIMEOUT_MS      Timeout of each HTTP request (default: 10000)
  REQUESTS_VERIFY_SSL          Verify TLS certificates (default: true)
  DEBUG                        Set to 1 for debug logging

EXAMPLES:
  mybooks-mcp auth                       # Register and authorize in the browser
  mybooks-mcp status                     # Check auth status
  MYBOOKS_PROFILE=work mybooks-mcp auth  # Keep a second set of credentials
`);
}

function showVersion(): void {
  console.log(`mybooks-mcp v${VERSION}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case '--help':
    case '-h':
    case 'help':
    case undefined:
      showHelp();
      return;

    case '--version':
    case '-v':
      showVersion();
      return;
  }

  const config = loadConfig();
  applyTlsSetting(config, logger);

  switch (command) {
    case 'auth': {
      const force = args.includes('--force') || args.includes('-f');
      await runAuth(config, { force });
      break;
    }

    case 'logout':
      await runLogout(config, { all: args.includes('--all') });
      break;

    case 'status':
      await runStatus(config);
      break;

    case 'discover':
      await runDiscover(config);
      break;

    case 'tools':
      await runTools(config);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run `mybooks-mcp --help` for usage.');
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error(formatErrorForDisplay(error));
  logger.debug('Failure detail', error);
  process.exit(1);
});
