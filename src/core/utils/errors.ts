/**
 * Error types
 *
 * Every failure a caller can see is one of these. Transport failures are
 * caught by the component that made the call and re-raised as its own type.
 */

export class OAuthClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OAuthClientError';
  }
}

export type TransportFailure = 'timeout' | 'aborted' | 'network';

/**
 * Raised by the shared HTTP helper. Never escapes a component API.
 */
export class TransportError extends OAuthClientError {
  constructor(
    public reason: TransportFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export type DiscoveryFailure = 'invalid_url' | 'network' | 'status' | 'invalid_json' | 'missing_field';

export interface DiscoveryAttempt {
  url: string;
  status?: number;
}

export class DiscoveryError extends OAuthClientError {
  constructor(
    public reason: DiscoveryFailure,
    message: string,
    public url?: string,
    public attempts: DiscoveryAttempt[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DiscoveryError';
  }
}

export type RegistrationFailure =
  | 'network'
  | 'status'
  | 'html_response'
  | 'invalid_json'
  | 'missing_client_id'
  | 'missing_endpoint';

export class RegistrationError extends OAuthClientError {
  constructor(
    public reason: RegistrationFailure,
    message: string,
    public status?: number,
    public statusText?: string,
    public bodySnippet?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RegistrationError';
  }
}

export type FlowErrorCode =
  | 'state_missing'
  | 'state_mismatch'
  | 'client_id_missing'
  | 'missing_access_token'
  | 'code_missing'
  | 'unknown_flow'
  | 'authorization_denied'
  | 'not_registered'
  | 'user_client_missing'
  | 'user_login_required';

export class FlowError extends OAuthClientError {
  constructor(
    public code: FlowErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'FlowError';
  }
}

export type TokenExchangeFailure = 'http' | 'network' | 'invalid_response';

export class TokenExchangeError extends OAuthClientError {
  constructor(
    public kind: TokenExchangeFailure,
    message: string,
    public status?: number,
    public statusText?: string,
    public body?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TokenExchangeError';
  }
}

export class ConfigError extends OAuthClientError {
  constructor(public issues: string[]) {
    super(`Invalid configuration:\n- ${issues.join('\n- ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Render an error as a single line for the terminal or the callback page.
 */
export function formatErrorForDisplay(error: unknown): string {
  if (error instanceof DiscoveryError && error.attempts.length > 0 && error.reason === 'status') {
    const tried = error.attempts.map((a) => `${a.url} (${a.status ?? 'no response'})`).join(', ');
    return `${error.message} Tried: ${tried}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return 'An unexpected error occurred.';
}
