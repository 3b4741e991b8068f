import { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { ServerError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import { RequestHandler, Response } from 'express';
import { withIdentity } from '../context.js';
import { logger } from '../utils/logger.js';
import { AuthGateError, RejectionPolicy, toRejection } from './errors.js';
import { extractBearerToken } from './token-extractor.js';
import { VerifiedIdentity } from './types.js';

declare module 'express-serve-static-core' {
  interface Request {
    /**
     * Information about the validated access token, set by the auth gate.
     */
    auth?: AuthInfo;
  }
}

export interface TokenVerifier {
  verify(token: string): Promise<VerifiedIdentity>;
}

export interface AuthGateOptions extends RejectionPolicy {
  verifier: TokenVerifier;
  /** Advertised in WWW-Authenticate so clients can find the authorization server */
  resourceMetadataUrl: string;
  requiredScopes: readonly string[];
}

export function toAuthInfo(token: string, identity: VerifiedIdentity): AuthInfo {
  return {
    token,
    clientId: identity.clientId,
    scopes: identity.scopes,
    expiresAt: identity.expiresAt,
    extra: { subject: identity.subject },
  };
}

/**
 * Express middleware that lets a request through only with a bearer token the
 * authorization server vouches for.
 *
 * Each request is authenticated on its own: extract, verify (cache or
 * introspection), validate claims. On success the identity is put on
 * `req.auth` and into the async request context for the rest of the chain.
 * Any failure ends the request with a single OAuth error response.
 */
export function requireIntrospectedBearer(options: AuthGateOptions): RequestHandler {
  return async (req, res, next) => {
    // 'close' before anything is written means the client went away
    let clientGone = false;
    res.on('close', () => {
      clientGone = true;
    });

    let token: string;
    let identity: VerifiedIdentity;
    try {
      token = extractBearerToken(req.headers);
      identity = await options.verifier.verify(token);
    } catch (error) {
      if (clientGone) {
        logger.debug('Client disconnected before token verification finished');
        return;
      }
      if (error instanceof AuthGateError) {
        reject(res, error, options);
        return;
      }
      logger.error('Unexpected error in auth gate', error);
      const serverError = new ServerError('Internal Server Error');
      res.status(500).json(serverError.toResponseObject());
      return;
    }

    if (clientGone) {
      logger.debug('Client disconnected before token verification finished', {
        subject: identity.subject,
      });
      return;
    }

    req.auth = toAuthInfo(token, identity);
    logger.addContext({ subject: identity.subject });
    withIdentity(identity, () => next());
  };
}

function reject(res: Response, error: AuthGateError, options: AuthGateOptions): void {
  const { status, oauthError } = toRejection(error, options);

  const metadata = { reason: error.reason, status, detail: error.detail };
  if (error.reason === 'IntrospectionUnreachable') {
    logger.error('Authorization server unavailable, request rejected', undefined, metadata);
  } else {
    logger.warning('Request rejected by auth gate', metadata);
  }

  const challenge = buildChallenge(error, oauthError.errorCode, options);
  if (challenge) {
    res.set('WWW-Authenticate', challenge);
  }
  res.status(status).json(oauthError.toResponseObject());
}

function buildChallenge(error: AuthGateError, errorCode: string, options: AuthGateOptions): string | undefined {
  const resourceMetadata = `resource_metadata="${options.resourceMetadataUrl}"`;

  switch (error.reason) {
    case 'MissingToken':
      // RFC 6750 section 3: no error code when the request had no credentials
      return `Bearer ${resourceMetadata}`;
    case 'InsufficientScope':
      return `Bearer error="${errorCode}", error_description="${error.message}", scope="${options.requiredScopes.join(' ')}", ${resourceMetadata}`;
    case 'IntrospectionUnreachable':
      if (options.unreachableStatus !== 401) {
        return undefined;
      }
      return `Bearer error="${errorCode}", error_description="${error.message}", ${resourceMetadata}`;
    default:
      return `Bearer error="${errorCode}", error_description="${error.message}", ${resourceMetadata}`;
  }
}
