/**
 * OAuth Session
 *
 * Everything one user needs against one MCP server: configuration,
 * stores, the metadata cache and both named flows. Hosts create one per
 * user or profile; nothing here is process-global.
 */

import { MetadataDiscoverer, type DiscoverOptions } from './oauth/discovery.js';
import { FlowManager, type FlowOptions } from './oauth/flow.js';
import { registerClient } from './oauth/registration.js';
import type { FlowName, OAuthMetadata, TokenResponse } from './oauth/types.js';
import { FLOW_NAMES } from './oauth/types.js';
import { isAuthorized, isRegistered } from './storage/credentials.js';
import type { AppAuthState, CredentialStore, CredentialUpdate, FlowStore } from './storage/types.js';
import { FlowError, TokenExchangeError } from './utils/errors.js';
import { noopLogger, redact, type Logger } from './utils/logger.js';

export interface OAuthSessionConfig {
  /** MCP server (protected resource) URL */
  serverUrl: string;
  redirectUri: string;
  scope: string;
  clientName: string;
  contacts?: string[];
  /** Pre-provisioned client used by the `user_login` flow */
  userAuthClientId?: string;
  /** Registration must carry the user's bearer token */
  registrationRequiresAuth?: boolean;
}

export interface OAuthSessionDeps extends FlowOptions {
  flows: FlowStore;
  credentials: CredentialStore;
  discoverer?: MetadataDiscoverer;
}

export interface CallbackParams {
  code?: string | null;
  state?: string | null;
  error?: string | null;
  errorDescription?: string | null;
}

export interface CallbackResult {
  flow: FlowName;
  tokens: TokenResponse;
  credentials: AppAuthState;
}

export interface SessionStatus {
  serverUrl: string;
  registered: boolean;
  authorized: boolean;
  userSignedIn: boolean;
  clientId?: string;
  clientName?: string;
  /** Shortened for display */
  accessToken: string;
  refreshToken: string;
  pendingFlows: FlowName[];
  updatedAt?: string;
}

export interface RegisterOptions {
  /** Register even when a client id is stored */
  force?: boolean;
  signal?: AbortSignal;
}

export class OAuthSession {
  readonly flows: FlowManager;
  readonly discoverer: MetadataDiscoverer;
  private readonly credentials: CredentialStore;
  private readonly options: FlowOptions;
  private readonly logger: Logger;

  constructor(
    readonly config: OAuthSessionConfig,
    deps: OAuthSessionDeps
  ) {
    const { flows, credentials, discoverer, ...options } = deps;
    this.options = options;
    this.logger = options.logger ?? noopLogger;
    this.credentials = credentials;
    this.flows = new FlowManager(flows, options);
    this.discoverer = discoverer ?? new MetadataDiscoverer(options);
  }

  private httpOptions(signal?: AbortSignal): FlowOptions {
    return { ...this.options, signal: signal ?? this.options.signal };
  }

  /**
   * Discovery for the configured server. Pass the 401 challenge to force a
   * fresh lookup starting from its `resource_metadata` URL.
   */
  async getMetadata(options: DiscoverOptions = {}): Promise<OAuthMetadata> {
    return this.discoverer.discover(this.config.serverUrl, options);
  }

  async loadCredentials(): Promise<AppAuthState> {
    return this.credentials.load();
  }

  /**
   * Register this application through DCR unless a client id is already
   * stored. A new registration drops tokens issued to the previous client.
   */
  async register(options: RegisterOptions = {}): Promise<AppAuthState> {
    const current = await this.credentials.load();
    if (isRegistered(current) && !options.force) {
      return current;
    }

    let initialAccessToken: string | undefined;
    if (this.config.registrationRequiresAuth) {
      initialAccessToken = current.userAccessToken;
      if (!initialAccessToken) {
        throw new FlowError(
          'user_login_required',
          'Client registration requires a signed-in user; complete the user sign-in first.'
        );
      }
    }

    const metadata = await this.getMetadata({ signal: options.signal });
    const registration = await registerClient(
      {
        registrationEndpoint: metadata.authorizationServer.registrationEndpoint,
        clientName: this.config.clientName,
        redirectUri: this.config.redirectUri,
        scope: this.config.scope,
        contacts: this.config.contacts,
        initialAccessToken,
      },
      this.httpOptions(options.signal)
    );

    return this.credentials.update({
      clientId: registration.client_id,
      clientName: registration.client_name ?? this.config.clientName,
      clientRedirectUris: registration.redirect_uris ?? [this.config.redirectUri],
      registrationAccessToken: registration.registration_access_token ?? null,
      registrationClientUri: registration.registration_client_uri ?? null,
      registrationPayload: registration,
      accessToken: null,
      refreshToken: null,
    });
  }

  /**
   * Start the `user_login` flow with the pre-provisioned client.
   */
  async beginUserLogin(options: { signal?: AbortSignal } = {}): Promise<string> {
    const clientId = this.config.userAuthClientId;
    if (!clientId) {
      throw new FlowError('user_client_missing', 'No client id is configured for user sign-in.');
    }
    const metadata = await this.getMetadata({ signal: options.signal });
    return this.flows.get('user_login').start({
      clientId,
      scope: this.config.scope,
      redirectUri: this.config.redirectUri,
      authorizationEndpoint: metadata.authorizationServer.authorizationEndpoint,
    });
  }

  /**
   * Start (or resume) the `app_authorize` flow for the registered client.
   * A pending flow keeps its PKCE material and state.
   */
  async beginAuthorization(options: { signal?: AbortSignal } = {}): Promise<string> {
    const current = await this.credentials.load();
    if (!current.clientId) {
      throw new FlowError('not_registered', 'No registered client; register the application before authorizing.');
    }
    const metadata = await this.getMetadata({ signal: options.signal });
    return this.flows.get('app_authorize').start({
      clientId: current.clientId,
      scope: this.config.scope,
      redirectUri: this.config.redirectUri,
      authorizationEndpoint: metadata.authorizationServer.authorizationEndpoint,
      reuseExisting: true,
    });
  }

  /**
   * Route a redirect callback to its flow by `state`, exchange the code
   * and store the tokens.
   */
  async handleCallback(params: CallbackParams, options: { signal?: AbortSignal } = {}): Promise<CallbackResult> {
    if (params.error) {
      const pending = await this.flows.findFlowByState(params.state);
      if (pending) {
        await this.flows.get(pending).clear();
      }
      const detail = params.errorDescription ? `: ${params.errorDescription}` : '';
      throw new FlowError('authorization_denied', `Authorization server returned ${params.error}${detail}.`);
    }

    if (!params.state) {
      throw new FlowError('state_missing', 'OAuth callback missing state; restart the flow.');
    }

    const name = await this.flows.findFlowByState(params.state);
    if (!name) {
      throw new FlowError('unknown_flow', 'Received OAuth callback without an active flow. Start over.');
    }

    if (!params.code) {
      throw new FlowError('code_missing', 'OAuth callback missing authorization code; restart the flow.');
    }

    const metadata = await this.getMetadata({ signal: options.signal });
    const current = await this.credentials.load();
    const flow = this.flows.get(name);

    let tokens: TokenResponse;
    try {
      tokens = await flow.complete({
        code: params.code,
        returnedState: params.state,
        tokenEndpoint: metadata.authorizationServer.tokenEndpoint,
        clientIdOverride: name === 'user_login' ? this.config.userAuthClientId : current.clientId,
        signal: options.signal,
      });
    } catch (error) {
      // Once the server has answered, the code is spent.
      if (error instanceof TokenExchangeError && error.kind !== 'network') {
        await flow.clear();
      }
      throw error;
    }

    if (!tokens.access_token) {
      throw new FlowError('missing_access_token', 'Token response missing access token; restart the flow.');
    }

    const update: CredentialUpdate =
      name === 'user_login'
        ? { userAccessToken: tokens.access_token, userRefreshToken: tokens.refresh_token ?? null }
        : { accessToken: tokens.access_token, refreshToken: tokens.refresh_token ?? null };
    const credentials = await this.credentials.update(update);

    this.logger.info(`Stored ${name} tokens (access token ${redact(tokens.access_token)})`);
    return { flow: name, tokens, credentials };
  }

  /**
   * Drop the app tokens and the pending `app_authorize` flow. With
   * `clearRegistration` the client record goes too, and the metadata
   * cache for the server is invalidated.
   */
  async resetAuthorization(options: { clearRegistration?: boolean } = {}): Promise<AppAuthState> {
    await this.flows.get('app_authorize').clear();

    if (!options.clearRegistration) {
      return this.credentials.update({ accessToken: null, refreshToken: null });
    }

    this.discoverer.invalidate(this.config.serverUrl);
    return this.credentials.update({
      accessToken: null,
      refreshToken: null,
      clientId: null,
      clientName: null,
      clientRedirectUris: null,
      registrationAccessToken: null,
      registrationClientUri: null,
      registrationPayload: null,
    });
  }

  /**
   * Drop every token and pending flow. Unless `keepRegistration` is set
   * the stored credentials are deleted outright.
   */
  async signOut(options: { keepRegistration?: boolean } = {}): Promise<void> {
    await this.flows.clearAll();
    if (options.keepRegistration) {
      await this.credentials.update({
        accessToken: null,
        refreshToken: null,
        userAccessToken: null,
        userRefreshToken: null,
      });
      return;
    }
    await this.credentials.clear();
    this.discoverer.invalidate(this.config.serverUrl);
  }

  async status(): Promise<SessionStatus> {
    const current = await this.credentials.load();
    const pendingFlows: FlowName[] = [];
    for (const name of FLOW_NAMES) {
      if (await this.flows.get(name).pending()) {
        pendingFlows.push(name);
      }
    }
    return {
      serverUrl: this.config.serverUrl,
      registered: isRegistered(current),
      authorized: isAuthorized(current),
      userSignedIn: Boolean(current.userAccessToken),
      clientId: current.clientId,
      clientName: current.clientName,
      accessToken: redact(current.accessToken),
      refreshToken: redact(current.refreshToken),
      pendingFlows,
      updatedAt: current.updatedAt,
    };
  }
}
