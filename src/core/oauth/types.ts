/**
 * OAuth client types
 */

export type CodeChallengeMethod = 'S256';

/**
 * Transient state of one authorization attempt.
 * Persisted at start(), read once at complete(), then deleted.
 */
export interface OAuthFlowState {
  clientId: string;
  /** Must equal the redirect URI sent on the authorize request */
  redirectUri: string;
  /** Space-delimited scope list */
  scope: string;
  codeVerifier: string;
  codeChallenge: string;
  codeChallengeMethod: CodeChallengeMethod;
  /** CSRF binding echoed back on the callback */
  state: string;
}

/**
 * Authorization server metadata (RFC 8414 / OpenID discovery).
 */
export interface OAuthServerMetadata {
  issuer: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  registrationEndpoint?: string;
  revocationEndpoint?: string;
  introspectionEndpoint?: string;
  scopesSupported: string[];
  grantTypesSupported: string[];
  codeChallengeMethodsSupported: string[];
}

/**
 * Protected resource metadata (RFC 9728).
 */
export interface OAuthProtectedResourceMetadata {
  issuer: string;
  authorizationServers: string[];
  resource?: string;
  resourceName?: string;
  resourceDocumentation?: string;
  bearerMethodsSupported?: string[];
  scopesSupported?: string[];
}

/**
 * Everything discovery resolved for one MCP server, with the URLs
 * the documents were found at.
 */
export interface OAuthMetadata {
  authorizationServer: OAuthServerMetadata;
  authorizationServerUrl: string;
  protectedResource?: OAuthProtectedResourceMetadata;
  protectedResourceUrl?: string;
}

/**
 * Token endpoint response (RFC 6749 §5.1), kept as decoded JSON.
 */
export interface TokenResponse {
  access_token?: string;
  refresh_token?: string;
  token_type?: string;
  expires_in?: number;
  scope?: string;
  [key: string]: unknown;
}

/**
 * Dynamic client registration response (RFC 7591 §3.2.1).
 */
export interface ClientRegistration {
  client_id: string;
  client_name?: string;
  redirect_uris?: string[];
  registration_access_token?: string;
  registration_client_uri?: string;
  [key: string]: unknown;
}

/**
 * Parsed `WWW-Authenticate` details from a 401 returned by the resource.
 */
export interface UnauthorizedChallenge {
  status: number;
  wwwAuthenticate: string | null;
}

/**
 * Purposes a flow can be started for. Both may be pending at once and
 * share one redirect URI; callbacks are routed by `state`.
 */
export const FLOW_NAMES = ['user_login', 'app_authorize'] as const;

export type FlowName = (typeof FLOW_NAMES)[number];
