/**
 * Token Exchange Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { buildTokenRequestBody, exchangeCodeForTokens } from '../../../src/core/oauth/token.js';
import { TokenExchangeError } from '../../../src/core/utils/errors.js';
import { createFakeFetch, jsonResponse, textResponse } from '../../helpers/fake-fetch.js';

const TOKEN_ENDPOINT = 'https://auth.example.com/oauth/token';

const PARAMS = {
  tokenEndpoint: TOKEN_ENDPOINT,
  code: 'xyz',
  clientId: 'abc123',
  redirectUri: 'https://app.example.com/cb',
  codeVerifier: 'VERIFIER0123456789VERIFIER0123456789VERIFIER',
};

describe('Token Exchange', () => {
  it('should build the form body without state by default', () => {
    expect(buildTokenRequestBody(PARAMS).toString()).toBe(
      'grant_type=authorization_code&code=xyz&redirect_uri=https%3A%2F%2Fapp.example.com%2Fcb' +
        '&client_id=abc123&code_verifier=VERIFIER0123456789VERIFIER0123456789VERIFIER'
    );
  });

  it('should append state when given', () => {
    expect(buildTokenRequestBody({ ...PARAMS, state: 'test-state' }).get('state')).toBe('test-state');
  });

  it('should POST the form and return the tokens', async () => {
    const { fetch, requests } = createFakeFetch({
      [`POST ${TOKEN_ENDPOINT}`]: () =>
        jsonResponse({ access_token: 'tok_1', refresh_token: 'ref_1', token_type: 'Bearer', expires_in: 3600 }),
    });

    const tokens = await exchangeCodeForTokens(PARAMS, { fetch });

    expect(tokens).toEqual({ access_token: 'tok_1', refresh_token: 'ref_1', token_type: 'Bearer', expires_in: 3600 });
    expect(requests[0].headers.get('Content-Type')).toBe('application/x-www-form-urlencoded');
    expect(requests[0].headers.get('Cache-Control')).toBe('no-cache');
    expect(requests[0].body).toBe(buildTokenRequestBody(PARAMS).toString());
  });

  it('should carry status and body of a rejected exchange', async () => {
    const { fetch } = createFakeFetch({
      [`POST ${TOKEN_ENDPOINT}`]: () => textResponse('{"error":"invalid_grant"}', 400, 'Bad Request'),
    });

    const error = await exchangeCodeForTokens(PARAMS, { fetch }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TokenExchangeError);
    expect(error).toMatchObject({
      kind: 'http',
      status: 400,
      statusText: 'Bad Request',
      body: '{"error":"invalid_grant"}',
      message: 'Token exchange failed: 400 Bad Request: {"error":"invalid_grant"}',
    });
  });

  it('should reject a non-JSON success', async () => {
    const { fetch } = createFakeFetch({
      [`POST ${TOKEN_ENDPOINT}`]: () => textResponse('access_token=tok_1', 200, 'OK'),
    });

    await expect(exchangeCodeForTokens(PARAMS, { fetch })).rejects.toMatchObject({
      kind: 'invalid_response',
      message: 'Token endpoint returned non-JSON response.',
    });
  });

  it('should reject a malformed token field', async () => {
    const { fetch } = createFakeFetch({
      [`POST ${TOKEN_ENDPOINT}`]: () => jsonResponse({ access_token: 42 }),
    });

    await expect(exchangeCodeForTokens(PARAMS, { fetch })).rejects.toMatchObject({
      kind: 'invalid_response',
      message: "Token endpoint returned a malformed 'access_token' field.",
    });
  });

  it('should accept stray types in optional fields', async () => {
    const { fetch } = createFakeFetch({
      [`POST ${TOKEN_ENDPOINT}`]: () =>
        jsonResponse({ access_token: 'tok_1', expires_in: '3600', scope: ['read'], id_token: 'test-id-token' }),
    });

    await expect(exchangeCodeForTokens(PARAMS, { fetch })).resolves.toEqual({
      access_token: 'tok_1',
      expires_in: 3600,
      scope: undefined,
      id_token: 'test-id-token',
    });
  });

  it('should wrap transport failures', async () => {
    const fetch = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(exchangeCodeForTokens(PARAMS, { fetch })).rejects.toMatchObject({
      kind: 'network',
      message: `Token request to ${TOKEN_ENDPOINT} failed: POST ${TOKEN_ENDPOINT} failed: fetch failed`,
    });
  });
});
