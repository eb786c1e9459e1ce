/**
 * Authorization Code + PKCE flow
 *
 *   IDLE --start()--> PENDING --complete()--> COMPLETED
 *                        |
 *                        +----clear()-------> ABANDONED
 *
 * PENDING is whatever the flow store holds for the flow's name. Nothing
 * is kept in memory between start() and complete(), so the callback may
 * land in another process.
 */

import type { HttpOptions } from '../http.js';
import type { FlowStore } from '../storage/types.js';
import { FlowError, OAuthClientError } from '../utils/errors.js';
import { noopLogger, redact } from '../utils/logger.js';
import { generatePkcePair, generateState } from './pkce.js';
import { exchangeCodeForTokens } from './token.js';
import { FLOW_NAMES, type FlowName, type OAuthFlowState, type TokenResponse } from './types.js';

export interface FlowOptions extends HttpOptions {
  /** Send `state` along with the token request */
  forwardState?: boolean;
}

export interface StartFlowParams {
  clientId: string;
  scope: string;
  redirectUri: string;
  authorizationEndpoint: string;
  /** Keep verifier, challenge and state of a pending flow */
  reuseExisting?: boolean;
}

export interface CompleteFlowParams {
  code: string;
  returnedState?: string | null;
  tokenEndpoint: string;
  clientIdOverride?: string;
  signal?: AbortSignal;
}

export interface FlowContext {
  clientId: string;
  redirectUri: string;
  scope: string;
}

/**
 * Copy of `flow` bound to a new client, redirect URI and scope. The PKCE
 * material and state are carried over.
 */
export function withContext(flow: OAuthFlowState, context: FlowContext): OAuthFlowState {
  return {
    ...flow,
    clientId: context.clientId,
    redirectUri: context.redirectUri,
    scope: context.scope,
  };
}

export function createFlowState(context: FlowContext): OAuthFlowState {
  const pkce = generatePkcePair();
  return {
    clientId: context.clientId,
    redirectUri: context.redirectUri,
    scope: context.scope,
    codeVerifier: pkce.verifier,
    codeChallenge: pkce.challenge,
    codeChallengeMethod: pkce.method,
    state: generateState(),
  };
}

export function buildAuthorizeUrl(authorizationEndpoint: string, flow: OAuthFlowState): string {
  let url: URL;
  try {
    url = new URL(authorizationEndpoint);
  } catch (error) {
    throw new OAuthClientError(`Authorization endpoint '${authorizationEndpoint}' is not an absolute URL.`, {
      cause: error,
    });
  }
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', flow.clientId);
  url.searchParams.set('redirect_uri', flow.redirectUri);
  url.searchParams.set('scope', flow.scope);
  url.searchParams.set('state', flow.state);
  url.searchParams.set('code_challenge', flow.codeChallenge);
  url.searchParams.set('code_challenge_method', flow.codeChallengeMethod);
  return url.toString();
}

export class AuthorizationFlow {
  constructor(
    public readonly name: FlowName,
    private readonly store: FlowStore,
    private readonly options: FlowOptions = {}
  ) {}

  private get logger() {
    return this.options.logger ?? noopLogger;
  }

  /**
   * Persist a pending flow and return the URL to send the browser to.
   * The state is saved before the URL is returned.
   */
  async start(params: StartFlowParams): Promise<string> {
    const context: FlowContext = {
      clientId: params.clientId,
      redirectUri: params.redirectUri,
      scope: params.scope,
    };

    const existing = params.reuseExisting ? await this.store.load(this.name) : undefined;
    const flow = existing ? withContext(existing, context) : createFlowState(context);

    const authorizeUrl = buildAuthorizeUrl(params.authorizationEndpoint, flow);
    await this.store.save(this.name, flow);
    this.logger.debug(
      `Flow ${this.name} ${existing ? 'reused' : 'started'} (state ${redact(flow.state)})`
    );

    return authorizeUrl;
  }

  /**
   * Validate the callback against the pending flow and exchange the code.
   * The flow is cleared only once the token endpoint accepted the code;
   * on any failure it stays persisted.
   */
  async complete(params: CompleteFlowParams): Promise<TokenResponse> {
    const flow = await this.store.load(this.name);
    if (!flow) {
      throw new FlowError('state_missing', 'OAuth flow state missing; restart the authorization process.');
    }

    if (flow.state && params.returnedState && params.returnedState !== flow.state) {
      throw new FlowError('state_mismatch', 'State mismatch detected; restart the authorization process.');
    }

    const clientId = params.clientIdOverride || flow.clientId;
    if (!clientId) {
      throw new FlowError('client_id_missing', 'OAuth flow client_id missing; restart the authorization process.');
    }

    if (!params.code) {
      throw new FlowError('code_missing', 'Authorization code missing from the callback; restart the authorization process.');
    }

    const tokens = await exchangeCodeForTokens(
      {
        tokenEndpoint: params.tokenEndpoint,
        code: params.code,
        clientId,
        redirectUri: flow.redirectUri,
        codeVerifier: flow.codeVerifier,
        state: this.options.forwardState ? flow.state : undefined,
      },
      { ...this.options, signal: params.signal ?? this.options.signal }
    );

    await this.store.clear(this.name);
    this.logger.debug(`Flow ${this.name} completed`);
    return tokens;
  }

  async clear(): Promise<void> {
    await this.store.clear(this.name);
  }

  async pending(): Promise<OAuthFlowState | undefined> {
    return this.store.load(this.name);
  }

  async matchesState(state: string): Promise<boolean> {
    if (!state) return false;
    const flow = await this.store.load(this.name);
    return flow !== undefined && flow.state === state;
  }
}

/**
 * The named flows of one session, sharing a store.
 */
export class FlowManager {
  private readonly flows: Record<FlowName, AuthorizationFlow>;

  constructor(store: FlowStore, options: FlowOptions = {}) {
    this.flows = {
      user_login: new AuthorizationFlow('user_login', store, options),
      app_authorize: new AuthorizationFlow('app_authorize', store, options),
    };
  }

  get(name: FlowName): AuthorizationFlow {
    return this.flows[name];
  }

  /**
   * Which pending flow a callback belongs to.
   */
  async findFlowByState(state: string | null | undefined): Promise<FlowName | undefined> {
    if (!state) return undefined;
    for (const name of FLOW_NAMES) {
      if (await this.flows[name].matchesState(state)) {
        return name;
      }
    }
    return undefined;
  }

  async clearAll(): Promise<void> {
    for (const name of FLOW_NAMES) {
      await this.flows[name].clear();
    }
  }
}
