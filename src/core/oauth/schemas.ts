/**
 * Zod schemas for documents received from, or persisted for, the
 * authorization server.
 */

import { z } from 'zod';
import type {
  OAuthFlowState,
  OAuthProtectedResourceMetadata,
  OAuthServerMetadata,
} from './types.js';

const requiredText = z.string().trim().min(1);

const optionalText = z
  .unknown()
  .transform((value) => (typeof value === 'string' && value.trim() ? value.trim() : undefined));

const endpointUrl = requiredText.refine(
  (value) => {
    try {
      const { protocol } = new URL(value);
      return protocol === 'https:' || protocol === 'http:';
    } catch {
      return false;
    }
  },
  { message: 'must be an absolute http(s) URL' }
);

const stringList = z
  .unknown()
  .transform((value) =>
    Array.isArray(value)
      ? value
          .filter((item): item is string => typeof item === 'string')
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
      : []
  );

export const serverMetadataSchema = z
  .object({
    issuer: requiredText,
    authorization_endpoint: endpointUrl,
    token_endpoint: endpointUrl,
    registration_endpoint: optionalText,
    revocation_endpoint: optionalText,
    introspection_endpoint: optionalText,
    scopes_supported: stringList,
    grant_types_supported: stringList,
    code_challenge_methods_supported: stringList,
  })
  .transform(
    (doc): OAuthServerMetadata => ({
      issuer: doc.issuer,
      authorizationEndpoint: doc.authorization_endpoint,
      tokenEndpoint: doc.token_endpoint,
      registrationEndpoint: doc.registration_endpoint,
      revocationEndpoint: doc.revocation_endpoint,
      introspectionEndpoint: doc.introspection_endpoint,
      scopesSupported: doc.scopes_supported,
      grantTypesSupported: doc.grant_types_supported,
      codeChallengeMethodsSupported: doc.code_challenge_methods_supported,
    })
  );

export const protectedResourceMetadataSchema = z
  .object({
    issuer: requiredText,
    authorization_servers: z.array(z.unknown()),
    resource: optionalText,
    resource_name: optionalText,
    resource_documentation: optionalText,
    bearer_methods_supported: stringList,
    scopes_supported: stringList,
  })
  .transform(
    (doc): OAuthProtectedResourceMetadata => ({
      issuer: doc.issuer,
      authorizationServers: stringList.parse(doc.authorization_servers),
      resource: doc.resource,
      resourceName: doc.resource_name,
      resourceDocumentation: doc.resource_documentation,
      bearerMethodsSupported:
        doc.bearer_methods_supported.length > 0 ? doc.bearer_methods_supported : undefined,
      scopesSupported: doc.scopes_supported.length > 0 ? doc.scopes_supported : undefined,
    })
  )
  .refine((doc) => doc.authorizationServers.length > 0, {
    message: 'did not include any authorization servers',
    path: ['authorization_servers'],
  });

/**
 * Only `access_token` must have the right type; a stray type in any
 * other known field reads as absent.
 */
export const tokenResponseSchema = z
  .object({
    access_token: z.string().optional(),
    refresh_token: z.string().optional().catch(undefined),
    token_type: z.string().optional().catch(undefined),
    expires_in: z
      .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
      .optional()
      .catch(undefined),
    scope: z.string().optional().catch(undefined),
  })
  .passthrough();

export const clientRegistrationSchema = z
  .object({
    client_id: requiredText,
    client_name: z.string().optional(),
    redirect_uris: z.array(z.string()).optional(),
    registration_access_token: z.string().optional(),
    registration_client_uri: z.string().optional(),
  })
  .passthrough();

export const flowStateSchema: z.ZodType<OAuthFlowState> = z.object({
  clientId: requiredText,
  redirectUri: requiredText,
  scope: requiredText,
  codeVerifier: requiredText,
  codeChallenge: requiredText,
  codeChallengeMethod: z.literal('S256'),
  state: requiredText,
});

/**
 * Turn the first schema issue into the message shown to the user.
 */
export function describeIssue(issue: z.ZodIssue, document: string): string {
  const field = issue.path.join('.') || '(root)';
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `${document} missing required field '${field}'.`;
  }
  if (issue.code === 'too_small') {
    return `${document} field '${field}' is empty.`;
  }
  if (issue.code === 'invalid_type' && issue.expected === 'array') {
    return `${document} field '${field}' must be an array.`;
  }
  return `${document} field '${field}' ${issue.message}.`;
}
