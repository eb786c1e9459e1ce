/**
 * Credential helpers shared by every CredentialStore.
 */

import { z } from 'zod';
import type { AppAuthState, CredentialUpdate } from './types.js';

export const appAuthStateSchema: z.ZodType<AppAuthState> = z.object({
  clientId: z.string().optional(),
  clientName: z.string().optional(),
  clientRedirectUris: z.array(z.string()).optional(),
  accessToken: z.string().optional(),
  refreshToken: z.string().optional(),
  userAccessToken: z.string().optional(),
  userRefreshToken: z.string().optional(),
  registrationAccessToken: z.string().optional(),
  registrationClientUri: z.string().optional(),
  registrationPayload: z.record(z.unknown()).optional(),
  updatedAt: z.string().optional(),
});

export function applyCredentialUpdate(
  current: AppAuthState,
  update: CredentialUpdate,
  now: Date = new Date()
): AppAuthState {
  const merged: Record<string, unknown> = { ...current };
  for (const [key, value] of Object.entries(update)) {
    if (value === undefined) continue;
    if (value === null) {
      delete merged[key];
    } else {
      merged[key] = value;
    }
  }
  merged.updatedAt = now.toISOString();
  return appAuthStateSchema.parse(merged);
}

export function isRegistered(state: AppAuthState): boolean {
  return Boolean(state.clientId);
}

export function isAuthorized(state: AppAuthState): boolean {
  return Boolean(state.accessToken);
}
