/**
 * CLI configuration, read from the environment.
 */

import { z } from 'zod';
import { DEFAULT_DATA_DIR } from '../core/storage/file.js';
import { DEFAULT_TIMEOUT_MS } from '../core/http.js';
import { ConfigError } from '../core/utils/errors.js';
import type { Logger } from '../core/utils/logger.js';

export const DEFAULT_SERVER_URL = 'http://localhost:8000/mcp';
export const DEFAULT_REDIRECT_URI = 'http://127.0.0.1:8765/callback';
export const DEFAULT_SCOPES = 'read write';
export const DEFAULT_CLIENT_NAME = 'MyBooks MCP CLI';

const TRUTHY = new Set(['y', 'yes', 't', 'true', 'on', '1']);
const LOOPBACK_HOSTS = new Set(['127.0.0.1', 'localhost', '[::1]']);

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return TRUTHY.has(value.trim().toLowerCase());
}

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => parseBoolean(value, fallback));

const optionalValue = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const serverUrl = z
  .string()
  .trim()
  .default(DEFAULT_SERVER_URL)
  .superRefine((value, ctx) => {
    let url: URL;
    try {
      url = new URL(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a valid URL` });
      return;
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be an http or https URL' });
    }
  });

const redirectUri = z
  .string()
  .trim()
  .default(DEFAULT_REDIRECT_URI)
  .superRefine((value, ctx) => {
    let url: URL;
    try {
      url = new URL(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a valid URL` });
      return;
    }
    if (url.protocol !== 'http:' || !LOOPBACK_HOSTS.has(url.hostname)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be an http URL on a loopback host' });
    }
    if (!url.port) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must name an explicit port' });
    }
  });

const envSchema = z.object({
  MYBOOKS_MCP_SERVER_URL: serverUrl,
  MYBOOKS_REDIRECT_URI: redirectUri,
  MYBOOKS_OAUTH_SCOPES: z.string().trim().min(1, 'must not be empty').default(DEFAULT_SCOPES),
  MYBOOKS_CLIENT_NAME: z.string().trim().min(1, 'must not be empty').default(DEFAULT_CLIENT_NAME),
  MYBOOKS_USER_AUTH_CLIENT_ID: optionalValue,
  MYBOOKS_DCR_REQUIRES_AUTH: flag(false),
  MYBOOKS_PROFILE: z.string().trim().min(1, 'must not be empty').default('default'),
  MYBOOKS_DATA_DIR: optionalValue,
  MYBOOKS_HTTP_TIMEOUT_MS: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be a whole number of milliseconds')
    .positive('must be positive')
    .default(DEFAULT_TIMEOUT_MS),
  REQUESTS_VERIFY_SSL: flag(true),
});

export interface CliConfig {
  serverUrl: string;
  redirectUri: string;
  /** Loopback host and port the callback server listens on */
  callbackHost: string;
  callbackPort: number;
  callbackPath: string;
  scope: string;
  clientName: string;
  userAuthClientId?: string;
  registrationRequiresAuth: boolean;
  profile: string;
  dataDir: string;
  timeoutMs: number;
  verifySsl: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  const redirect = new URL(values.MYBOOKS_REDIRECT_URI);
  return {
    serverUrl: values.MYBOOKS_MCP_SERVER_URL,
    redirectUri: values.MYBOOKS_REDIRECT_URI,
    callbackHost: redirect.hostname.replace(/^\[|\]$/g, ''),
    callbackPort: Number(redirect.port),
    callbackPath: redirect.pathname,
    scope: values.MYBOOKS_OAUTH_SCOPES,
    clientName: values.MYBOOKS_CLIENT_NAME,
    userAuthClientId: values.MYBOOKS_USER_AUTH_CLIENT_ID,
    registrationRequiresAuth: values.MYBOOKS_DCR_REQUIRES_AUTH,
    profile: values.MYBOOKS_PROFILE,
    dataDir: values.MYBOOKS_DATA_DIR ?? DEFAULT_DATA_DIR,
    timeoutMs: values.MYBOOKS_HTTP_TIMEOUT_MS,
    verifySsl: values.REQUESTS_VERIFY_SSL,
  };
}

/**
 * Turn off TLS certificate checks for the whole process when asked to.
 */
export function applyTlsSetting(config: CliConfig, logger: Logger, env: NodeJS.ProcessEnv = process.env): void {
  if (config.verifySsl) return;
  env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
  logger.warn('TLS certificate verification is disabled (REQUESTS_VERIFY_SSL is off)');
}
