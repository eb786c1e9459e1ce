/**
 * MyBooks MCP OAuth Core
 *
 * Platform-agnostic OAuth 2.1 client: PKCE, discovery, dynamic client
 * registration and the authorization code flow. Hosts supply the stores,
 * and optionally fetch and a logger.
 */

// Session
export { OAuthSession } from './session.js';
export type {
  OAuthSessionConfig,
  OAuthSessionDeps,
  CallbackParams,
  CallbackResult,
  SessionStatus,
  RegisterOptions,
} from './session.js';

// OAuth
export * from './oauth/types.js';
export * from './oauth/pkce.js';
export * from './oauth/discovery.js';
export * from './oauth/registration.js';
export * from './oauth/token.js';
export * from './oauth/flow.js';

// Storage
export * from './storage/types.js';
export * from './storage/credentials.js';
export * from './storage/memory.js';
export * from './storage/file.js';

// MCP
export { listMcpTools } from './mcp/tools.js';
export type { ListToolsOptions, ListToolsResult, McpToolSummary } from './mcp/tools.js';

// Utils
export * from './http.js';
export * from './utils/errors.js';
export * from './utils/logger.js';
