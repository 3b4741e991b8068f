import { z } from 'zod';

/**
 * OAuth 2.0 Token Introspection response body (RFC 7662 section 2.2).
 * Unknown members are allowed and ignored.
 */
export const TokenIntrospectionResponseSchema = z.object({
  /** Whether the token is currently active */
  active: z.boolean(),
  /** Space-separated list of scopes associated with the token */
  scope: z.string().optional(),
  /** Client identifier for the OAuth client that requested the token */
  client_id: z.string().optional(),
  /** Human-readable identifier for the resource owner */
  username: z.string().optional(),
  token_type: z.string().optional(),
  /** Expiration time as seconds since Unix epoch */
  exp: z.number().optional(),
  iat: z.number().optional(),
  nbf: z.number().optional(),
  /** Subject identifier for the resource owner */
  sub: z.string().optional(),
  /** Intended audience, a single value or a list */
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  iss: z.string().optional(),
  jti: z.string().optional(),
}).passthrough();

export type TokenIntrospectionResponse = z.infer<typeof TokenIntrospectionResponseSchema>;

/**
 * Introspection response normalized for claim checks: scope string split,
 * audience widened to a set.
 */
export interface IntrospectionResult {
  active: boolean;
  scopes: ReadonlySet<string>;
  audience: ReadonlySet<string>;
  subject?: string;
  clientId?: string;
  /** Seconds since Unix epoch */
  expiresAt?: number;
  notBefore?: number;
  issuedAt?: number;
  username?: string;
  issuer?: string;
}

/**
 * What a request carries once the gate has let it through.
 */
export interface VerifiedIdentity {
  subject: string;
  clientId: string;
  scopes: string[];
  expiresAt?: number;
}

export const INACTIVE_RESULT: IntrospectionResult = Object.freeze({
  active: false,
  scopes: new Set<string>(),
  audience: new Set<string>(),
});

export function normalizeIntrospection(body: TokenIntrospectionResponse): IntrospectionResult {
  if (!body.active) {
    return INACTIVE_RESULT;
  }
  const audience = body.aud === undefined ? [] : Array.isArray(body.aud) ? body.aud : [body.aud];
  return {
    active: true,
    scopes: new Set(body.scope ? body.scope.split(' ').filter(Boolean) : []),
    audience: new Set(audience),
    subject: body.sub,
    clientId: body.client_id,
    expiresAt: body.exp,
    notBefore: body.nbf,
    issuedAt: body.iat,
    username: body.username,
    issuer: body.iss,
  };
}
