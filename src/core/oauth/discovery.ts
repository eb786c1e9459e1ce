/**
 * Metadata Discovery
 *
 * Resolves authorization server metadata (RFC 8414, OpenID Connect
 * Discovery) and protected resource metadata (RFC 9728) by walking the
 * well-known URL candidates in priority order.
 *
 * Candidate order for a base URL with path `p`:
 *   /.well-known/oauth-authorization-server/{p}
 *   /.well-known/openid-configuration/{p}
 *   /{p}/.well-known/openid-configuration
 *   /.well-known/oauth-authorization-server
 *   /.well-known/openid-configuration
 *
 * A non-200 answer moves on to the next candidate. A transport failure,
 * or a 200 answer that is not a valid document, stops discovery.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { requestText, parseJsonBody, isJsonObject, type HttpOptions, type HttpResult } from '../http.js';
import { DiscoveryError, TransportError, type DiscoveryAttempt } from '../utils/errors.js';
import { noopLogger } from '../utils/logger.js';
import { describeIssue, protectedResourceMetadataSchema, serverMetadataSchema } from './schemas.js';
import type {
  OAuthMetadata,
  OAuthProtectedResourceMetadata,
  OAuthServerMetadata,
  UnauthorizedChallenge,
} from './types.js';

const AUTH_SERVER_DOCUMENT = 'OAuth metadata';
const PROTECTED_RESOURCE_DOCUMENT = 'OAuth protected resource metadata';

export interface Discovered<T> {
  url: string;
  metadata: T;
}

interface SplitUrl {
  origin: string;
  path: string;
}

function splitUrl(raw: string): SplitUrl {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new DiscoveryError('invalid_url', `Cannot discover OAuth metadata: '${raw}' is not a valid URL.`, raw);
  }
  return {
    origin: `${parsed.protocol}//${parsed.host}`,
    path: parsed.pathname.replace(/^\/+|\/+$/g, ''),
  };
}

/**
 * Normalized cache key for a server URL.
 */
export function normalizeServerUrl(raw: string): string {
  const { origin, path } = splitUrl(raw);
  return path ? `${origin}/${path}` : origin;
}

export function authorizationServerMetadataUrls(serverUrl: string): string[] {
  const { origin, path } = splitUrl(serverUrl);
  const urls: string[] = [];
  if (path) {
    urls.push(
      `${origin}/.well-known/oauth-authorization-server/${path}`,
      `${origin}/.well-known/openid-configuration/${path}`,
      `${origin}/${path}/.well-known/openid-configuration`
    );
  }
  urls.push(
    `${origin}/.well-known/oauth-authorization-server`,
    `${origin}/.well-known/openid-configuration`
  );
  return urls;
}

export function protectedResourceMetadataUrls(resourceUrl: string): string[] {
  const { origin, path } = splitUrl(resourceUrl);
  const urls: string[] = [];
  if (path) {
    urls.push(`${origin}/.well-known/oauth-protected-resource/${path}`);
  }
  urls.push(`${origin}/.well-known/oauth-protected-resource`);
  return urls;
}

/**
 * Pull `resource_metadata` out of a `WWW-Authenticate` header, quoted or bare.
 */
export function extractResourceMetadataUrl(header: string | null | undefined): string | null {
  if (!header) return null;
  const match = /resource_metadata=(?:"([^"]*)"|([^\s,]+))/i.exec(header);
  if (!match) return null;
  const value = (match[1] ?? match[2] ?? '').trim();
  return value || null;
}

type FetchOutcome =
  | { found: true; document: Record<string, unknown> }
  | { found: false; status: number };

async function fetchDocument(url: string, options: HttpOptions): Promise<FetchOutcome> {
  let result: HttpResult;
  try {
    result = await requestText(url, { method: 'GET', headers: { Accept: 'application/json' } }, options);
  } catch (error) {
    if (error instanceof TransportError) {
      throw new DiscoveryError(
        'network',
        `OAuth discovery request failed for ${url}: ${error.message}`,
        url,
        [],
        { cause: error }
      );
    }
    throw error;
  }

  if (result.status !== 200) {
    return { found: false, status: result.status };
  }

  const parsed = parseJsonBody(result.body);
  if (!parsed.ok) {
    throw new DiscoveryError(
      'invalid_json',
      `OAuth discovery document at ${url} is not valid JSON: ${parsed.error}`,
      url
    );
  }
  if (!isJsonObject(parsed.value)) {
    throw new DiscoveryError('invalid_json', `OAuth discovery document at ${url} is not a JSON object.`, url);
  }
  return { found: true, document: parsed.value };
}

async function discoverFromUrls<T>(
  urls: string[],
  schema: ZodType<T, ZodTypeDef, unknown>,
  documentName: string,
  options: HttpOptions
): Promise<Discovered<T> | DiscoveryAttempt[]> {
  const logger = options.logger ?? noopLogger;
  const attempts: DiscoveryAttempt[] = [];
  const seen = new Set<string>();

  for (const candidate of urls) {
    const url = candidate.trim();
    if (!url || seen.has(url)) continue;
    seen.add(url);

    const outcome = await fetchDocument(url, options);
    if (!outcome.found) {
      logger.debug(`Discovery miss: ${url} (${outcome.status})`);
      attempts.push({ url, status: outcome.status });
      continue;
    }

    const parsed = schema.safeParse(outcome.document);
    if (!parsed.success) {
      throw new DiscoveryError(
        'missing_field',
        describeIssue(parsed.error.issues[0], documentName),
        url,
        attempts
      );
    }

    logger.debug(`Discovered ${documentName} at ${url}`);
    return { url, metadata: parsed.data };
  }

  return attempts;
}

function isDiscovered<T>(value: Discovered<T> | DiscoveryAttempt[]): value is Discovered<T> {
  return !Array.isArray(value);
}

/**
 * Find authorization server metadata, trying each hinted authorization
 * server before the well-known locations derived from `serverUrl`.
 * With `serverUrl` omitted only the hints are tried.
 */
export async function discoverAuthorizationServerMetadata(
  serverUrl: string | undefined,
  options: HttpOptions = {},
  authorizationServers: string[] = []
): Promise<Discovered<OAuthServerMetadata>> {
  const urls = authorizationServers.flatMap((server) => authorizationServerMetadataUrls(server));
  if (serverUrl) {
    urls.push(...authorizationServerMetadataUrls(serverUrl));
  }

  const result = await discoverFromUrls(urls, serverMetadataSchema, AUTH_SERVER_DOCUMENT, options);
  if (isDiscovered(result)) return result;

  const target = serverUrl ?? authorizationServers.join(', ');
  throw new DiscoveryError(
    'status',
    `No OAuth authorization server metadata found for ${target}.`,
    undefined,
    result
  );
}

export async function discoverProtectedResourceMetadata(
  resourceUrl: string,
  options: HttpOptions = {}
): Promise<Discovered<OAuthProtectedResourceMetadata>> {
  const result = await discoverFromUrls(
    protectedResourceMetadataUrls(resourceUrl),
    protectedResourceMetadataSchema,
    PROTECTED_RESOURCE_DOCUMENT,
    options
  );
  if (isDiscovered(result)) return result;

  throw new DiscoveryError(
    'status',
    `No OAuth protected resource metadata found for ${resourceUrl}.`,
    undefined,
    result
  );
}

/**
 * Fetch protected resource metadata from an exact URL, as named by a
 * `resource_metadata` challenge parameter.
 */
export async function fetchProtectedResourceMetadata(
  metadataUrl: string,
  options: HttpOptions = {}
): Promise<Discovered<OAuthProtectedResourceMetadata>> {
  splitUrl(metadataUrl);
  const result = await discoverFromUrls(
    [metadataUrl],
    protectedResourceMetadataSchema,
    PROTECTED_RESOURCE_DOCUMENT,
    options
  );
  if (isDiscovered(result)) return result;

  const status = result[0]?.status;
  throw new DiscoveryError(
    'status',
    `OAuth protected resource metadata at ${metadataUrl} returned HTTP ${status ?? '?'}.`,
    metadataUrl,
    result
  );
}

export interface DiscoverOptions {
  /** 401 from the resource; its challenge is tried first and the cache is bypassed */
  unauthorized?: UnauthorizedChallenge;
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

/**
 * Discovery with a cache keyed by normalized server URL.
 *
 * Entries are replaced whole, so concurrent discoveries of the same
 * server at worst fetch twice and keep the last result.
 */
export class MetadataDiscoverer {
  private readonly cache = new Map<string, OAuthMetadata>();

  constructor(private readonly options: HttpOptions = {}) {}

  cached(serverUrl: string): OAuthMetadata | undefined {
    return this.cache.get(normalizeServerUrl(serverUrl));
  }

  invalidate(serverUrl?: string): void {
    if (serverUrl === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(normalizeServerUrl(serverUrl));
    }
  }

  async discover(serverUrl: string, discoverOptions: DiscoverOptions = {}): Promise<OAuthMetadata> {
    const key = normalizeServerUrl(serverUrl);
    const force = discoverOptions.forceRefresh === true || discoverOptions.unauthorized !== undefined;

    const hit = this.cache.get(key);
    if (hit && !force) {
      return hit;
    }

    const options: HttpOptions = { ...this.options, signal: discoverOptions.signal ?? this.options.signal };
    const logger = options.logger ?? noopLogger;
    const headerUrl = extractResourceMetadataUrl(discoverOptions.unauthorized?.wwwAuthenticate);

    let metadata: OAuthMetadata | undefined;
    if (headerUrl) {
      try {
        metadata = await this.discoverFromResourceMetadata(headerUrl, options);
      } catch (error) {
        if (!(error instanceof DiscoveryError)) throw error;
        logger.warn(`Discovery via resource_metadata ${headerUrl} failed: ${error.message}`);
      }
    }

    if (!metadata) {
      try {
        metadata = await this.discoverFromServer(serverUrl, options);
      } catch (error) {
        if (error instanceof DiscoveryError && headerUrl) {
          throw new DiscoveryError(
            error.reason,
            `Unable to discover OAuth metadata for ${serverUrl} (tried resource metadata: ${headerUrl}). ${error.message}`,
            error.url,
            error.attempts,
            { cause: error }
          );
        }
        throw error;
      }
    }

    this.cache.set(key, metadata);
    return metadata;
  }

  private async discoverFromResourceMetadata(
    metadataUrl: string,
    options: HttpOptions
  ): Promise<OAuthMetadata> {
    const protectedResource = await fetchProtectedResourceMetadata(metadataUrl, options);
    const authorizationServer = await discoverAuthorizationServerMetadata(
      undefined,
      options,
      protectedResource.metadata.authorizationServers
    );
    return {
      authorizationServer: authorizationServer.metadata,
      authorizationServerUrl: authorizationServer.url,
      protectedResource: protectedResource.metadata,
      protectedResourceUrl: protectedResource.url,
    };
  }

  private async discoverFromServer(serverUrl: string, options: HttpOptions): Promise<OAuthMetadata> {
    let protectedResource: Discovered<OAuthProtectedResourceMetadata> | undefined;
    try {
      protectedResource = await discoverProtectedResourceMetadata(serverUrl, options);
    } catch (error) {
      // A resource without RFC 9728 metadata is still discoverable by host.
      if (!(error instanceof DiscoveryError && error.reason === 'status')) throw error;
    }

    const authorizationServer = await discoverAuthorizationServerMetadata(
      serverUrl,
      options,
      protectedResource?.metadata.authorizationServers
    );
    return {
      authorizationServer: authorizationServer.metadata,
      authorizationServerUrl: authorizationServer.url,
      protectedResource: protectedResource?.metadata,
      protectedResourceUrl: protectedResource?.url,
    };
  }
}
