import { AuthGateError } from './errors.js';
import { IntrospectionResult, VerifiedIdentity } from './types.js';

export interface ClaimRequirements {
  /** Canonical URL of this resource server; must appear in `aud` */
  resourceUrl: string;
  /** Every one of these must be granted */
  requiredScopes: readonly string[];
}

/**
 * Decide whether an introspection result authorizes a request.
 *
 * Checks run in a fixed order (active, audience, scope) and the first
 * failure wins. Audience is always checked; a token without `aud` fails it.
 */
export function validateClaims(
  result: IntrospectionResult,
  requirements: ClaimRequirements,
  nowSeconds: number = Date.now() / 1000,
): VerifiedIdentity {
  if (!result.active) {
    throw new AuthGateError('TokenInactive', 'introspection reported active=false');
  }
  if (result.expiresAt !== undefined && result.expiresAt <= nowSeconds) {
    throw new AuthGateError('TokenInactive', `token expired at ${result.expiresAt}`);
  }
  if (result.notBefore !== undefined && result.notBefore > nowSeconds) {
    throw new AuthGateError('TokenInactive', `token not valid before ${result.notBefore}`);
  }

  if (!result.audience.has(requirements.resourceUrl)) {
    throw new AuthGateError(
      'AudienceMismatch',
      `expected ${requirements.resourceUrl}, got [${[...result.audience].join(', ')}]`,
    );
  }

  const missing = requirements.requiredScopes.filter((scope) => !result.scopes.has(scope));
  if (missing.length > 0) {
    throw new AuthGateError('InsufficientScope', `missing scopes: ${missing.join(' ')}`);
  }

  return {
    subject: result.subject ?? 'unknown',
    clientId: result.clientId ?? 'unknown',
    scopes: [...result.scopes],
    expiresAt: result.expiresAt,
  };
}
