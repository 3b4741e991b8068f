import {
  InsufficientScopeError,
  InvalidTokenError,
  OAuthError,
  TemporarilyUnavailableError,
} from '@modelcontextprotocol/sdk/server/auth/errors.js';

/**
 * Every way the auth gate can turn a request away.
 */
export type AuthFailureReason =
  | 'MissingToken'
  | 'MalformedToken'
  | 'IntrospectionUnreachable'
  | 'IntrospectionRejected'
  | 'IntrospectionMalformed'
  | 'TokenInactive'
  | 'AudienceMismatch'
  | 'InsufficientScope';

// Client-facing descriptions. These are fixed strings so nothing about the
// authorization server (endpoint, status, body) reaches the caller.
const PUBLIC_DESCRIPTIONS: Record<AuthFailureReason, string> = {
  MissingToken: 'Missing Authorization header',
  MalformedToken: "Invalid Authorization header format, expected 'Bearer TOKEN'",
  IntrospectionUnreachable: 'Token could not be verified, try again later',
  IntrospectionRejected: 'Token validation failed',
  IntrospectionMalformed: 'Token validation failed',
  TokenInactive: 'Token is not active',
  AudienceMismatch: 'Token was not issued for this resource server',
  InsufficientScope: 'Insufficient scope',
};

export class AuthGateError extends Error {
  constructor(
    readonly reason: AuthFailureReason,
    /** Operator-facing detail for logs; never sent to the client */
    readonly detail?: string,
    options?: { cause?: unknown },
  ) {
    super(PUBLIC_DESCRIPTIONS[reason], options);
    this.name = 'AuthGateError';
  }
}

export interface RejectionPolicy {
  /** Status used when the authorization server cannot be reached */
  unreachableStatus: 401 | 502 | 503;
}

export interface Rejection {
  status: number;
  oauthError: OAuthError;
}

/**
 * Map a gate failure to its HTTP status and the OAuth error it is reported as.
 */
export function toRejection(error: AuthGateError, policy: RejectionPolicy): Rejection {
  switch (error.reason) {
    case 'MissingToken':
    case 'MalformedToken':
    case 'TokenInactive':
    case 'IntrospectionRejected':
    case 'IntrospectionMalformed':
      return { status: 401, oauthError: new InvalidTokenError(error.message) };
    case 'IntrospectionUnreachable':
      return policy.unreachableStatus === 401
        ? { status: 401, oauthError: new InvalidTokenError(error.message) }
        : { status: policy.unreachableStatus, oauthError: new TemporarilyUnavailableError(error.message) };
    case 'AudienceMismatch':
      return { status: 403, oauthError: new InvalidTokenError(error.message) };
    case 'InsufficientScope':
      return { status: 403, oauthError: new InsufficientScopeError(error.message) };
  }
}
