/**
 * Dynamic Client Registration (RFC 7591)
 *
 * Registers a public client (`token_endpoint_auth_method: none`); PKCE
 * stands in for the client secret. Not retried: every successful call
 * creates a new client record on the server.
 */

import { requestText, parseJsonBody, isJsonObject, truncate, type HttpOptions, type HttpResult } from '../http.js';
import { RegistrationError, TransportError } from '../utils/errors.js';
import { noopLogger } from '../utils/logger.js';
import { clientRegistrationSchema } from './schemas.js';
import type { ClientRegistration } from './types.js';

/** Body preview length for non-2xx answers */
export const STATUS_SNIPPET_LENGTH = 150;
/** Body preview length for 2xx answers that are not JSON */
export const INVALID_BODY_SNIPPET_LENGTH = 2000;

export interface RegisterClientParams {
  registrationEndpoint: string | undefined;
  clientName: string;
  redirectUri: string;
  scope: string;
  contacts?: string[];
  /** Bearer token for servers that only accept authenticated registration */
  initialAccessToken?: string;
}

export function buildRegistrationRequest(params: RegisterClientParams): Record<string, unknown> {
  const body: Record<string, unknown> = {
    client_name: params.clientName,
    redirect_uris: [params.redirectUri],
    grant_types: ['authorization_code', 'refresh_token'],
    response_types: ['code'],
    scope: params.scope,
    token_endpoint_auth_method: 'none',
  };
  if (params.contacts && params.contacts.length > 0) {
    body.contacts = params.contacts;
  }
  return body;
}

function statusFailure(result: HttpResult): RegistrationError {
  const snippet = truncate(result.body, STATUS_SNIPPET_LENGTH);
  let message = `Registration failed: ${result.status} ${result.statusText}`.trimEnd();
  if (snippet) {
    message += `: ${snippet}`;
  }
  if (result.status === 401 || result.status === 403) {
    message += ' Authentication is required to register a client; sign in first.';
  }
  return new RegistrationError('status', message, result.status, result.statusText, snippet);
}

function invalidBodyFailure(result: HttpResult, parseError: string): RegistrationError {
  const snippet = truncate(result.body, INVALID_BODY_SNIPPET_LENGTH);
  const contentType = result.headers.get('Content-Type') ?? '';

  let reason: 'html_response' | 'invalid_json';
  let message: string;
  if (contentType.toLowerCase().includes('html')) {
    reason = 'html_response';
    message =
      'Registration endpoint responded with HTML instead of JSON. ' +
      'Ensure the request is authorized and the endpoint URL is correct.';
  } else {
    reason = 'invalid_json';
    message = `Registration endpoint returned invalid JSON (${parseError}).`;
  }
  if (snippet) {
    message += ` Body preview: ${snippet}`;
  }
  return new RegistrationError(reason, message, result.status, result.statusText, snippet);
}

export async function registerClient(
  params: RegisterClientParams,
  options: HttpOptions = {}
): Promise<ClientRegistration> {
  const logger = options.logger ?? noopLogger;
  const endpoint = params.registrationEndpoint?.trim();
  if (!endpoint) {
    throw new RegistrationError(
      'missing_endpoint',
      'The authorization server does not advertise a registration_endpoint; dynamic client registration is unavailable.'
    );
  }

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };
  if (params.initialAccessToken) {
    headers.Authorization = `Bearer ${params.initialAccessToken}`;
  }

  logger.info(`Registering client '${params.clientName}' at ${endpoint}`);

  let result: HttpResult;
  try {
    result = await requestText(
      endpoint,
      { method: 'POST', headers, body: JSON.stringify(buildRegistrationRequest(params)) },
      options
    );
  } catch (error) {
    if (error instanceof TransportError) {
      throw new RegistrationError(
        'network',
        `Registration request to ${endpoint} failed: ${error.message}`,
        undefined,
        undefined,
        undefined,
        { cause: error }
      );
    }
    throw error;
  }

  if (!result.ok) {
    logger.warn('Client registration rejected', { status: result.status });
    throw statusFailure(result);
  }

  const parsed = parseJsonBody(result.body);
  if (!parsed.ok) {
    throw invalidBodyFailure(result, parsed.error);
  }
  if (!isJsonObject(parsed.value)) {
    throw new RegistrationError(
      'invalid_json',
      'Registration endpoint returned invalid payload: expected a JSON object.',
      result.status,
      result.statusText
    );
  }

  const registration = clientRegistrationSchema.safeParse(parsed.value);
  if (!registration.success) {
    throw new RegistrationError(
      'missing_client_id',
      'Registration response did not include a client_id.',
      result.status,
      result.statusText,
      truncate(result.body, STATUS_SNIPPET_LENGTH)
    );
  }

  logger.info(`Client registered: ${registration.data.client_id}`);
  return registration.data;
}
