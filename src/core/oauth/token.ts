/**
 * Authorization code exchange (RFC 6749 §4.1.3 with RFC 7636 verifier)
 */

import { requestText, parseJsonBody, isJsonObject, truncate, type HttpOptions, type HttpResult } from '../http.js';
import { TokenExchangeError, TransportError } from '../utils/errors.js';
import { tokenResponseSchema } from './schemas.js';
import type { TokenResponse } from './types.js';

const BODY_SNIPPET_LENGTH = 500;

export interface TokenExchangeParams {
  tokenEndpoint: string;
  code: string;
  clientId: string;
  redirectUri: string;
  codeVerifier: string;
  /** Only sent when set; token endpoints do not use it */
  state?: string;
}

export function buildTokenRequestBody(params: TokenExchangeParams): URLSearchParams {
  const body = new URLSearchParams({
    grant_type: 'authorization_code',
    code: params.code,
    redirect_uri: params.redirectUri,
    client_id: params.clientId,
    code_verifier: params.codeVerifier,
  });
  if (params.state) {
    body.set('state', params.state);
  }
  return body;
}

export async function exchangeCodeForTokens(
  params: TokenExchangeParams,
  options: HttpOptions = {}
): Promise<TokenResponse> {
  let result: HttpResult;
  try {
    result = await requestText(
      params.tokenEndpoint,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Cache-Control': 'no-cache',
          Accept: 'application/json',
        },
        body: buildTokenRequestBody(params).toString(),
      },
      options
    );
  } catch (error) {
    if (error instanceof TransportError) {
      throw new TokenExchangeError(
        'network',
        `Token request to ${params.tokenEndpoint} failed: ${error.message}`,
        undefined,
        undefined,
        undefined,
        { cause: error }
      );
    }
    throw error;
  }

  if (!result.ok) {
    const snippet = truncate(result.body, BODY_SNIPPET_LENGTH);
    let message = `Token exchange failed: ${result.status} ${result.statusText}`.trimEnd();
    if (snippet) {
      message += `: ${snippet}`;
    }
    throw new TokenExchangeError('http', message, result.status, result.statusText, snippet);
  }

  const parsed = parseJsonBody(result.body);
  if (!parsed.ok || !isJsonObject(parsed.value)) {
    throw new TokenExchangeError(
      'invalid_response',
      'Token endpoint returned non-JSON response.',
      result.status,
      result.statusText,
      truncate(result.body, BODY_SNIPPET_LENGTH)
    );
  }

  const tokens = tokenResponseSchema.safeParse(parsed.value);
  if (!tokens.success) {
    const field = tokens.error.issues[0]?.path.join('.') ?? '';
    throw new TokenExchangeError(
      'invalid_response',
      `Token endpoint returned a malformed '${field}' field.`,
      result.status,
      result.statusText
    );
  }
  return tokens.data;
}
