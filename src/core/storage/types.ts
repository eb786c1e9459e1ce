/**
 * Persistence contracts
 *
 * The OAuth core never owns storage; it reads and writes through these.
 */

import type { FlowName, OAuthFlowState } from '../oauth/types.js';

/**
 * Transient flow state, keyed by flow name. Must be readable after a
 * browser round-trip, possibly from another process.
 */
export interface FlowStore {
  save(name: FlowName, flow: OAuthFlowState): Promise<void>;
  load(name: FlowName): Promise<OAuthFlowState | undefined>;
  clear(name: FlowName): Promise<void>;
}

/**
 * Long-lived credentials of one session.
 */
export interface AppAuthState {
  clientId?: string;
  clientName?: string;
  clientRedirectUris?: string[];
  accessToken?: string;
  refreshToken?: string;
  /** Bearer token from the `user_login` flow */
  userAccessToken?: string;
  userRefreshToken?: string;
  registrationAccessToken?: string;
  registrationClientUri?: string;
  /** Registration response as received */
  registrationPayload?: Record<string, unknown>;
  updatedAt?: string;
}

export type CredentialField = Exclude<keyof AppAuthState, 'updatedAt'>;

/**
 * Partial update: a missing or `undefined` field keeps the stored value,
 * `null` removes it.
 */
export type CredentialUpdate = {
  [K in CredentialField]?: AppAuthState[K] | null;
};

export interface CredentialStore {
  load(): Promise<AppAuthState>;
  update(update: CredentialUpdate): Promise<AppAuthState>;
  clear(): Promise<void>;
}
