import { metadataHandler } from '@modelcontextprotocol/sdk/server/auth/handlers/metadata.js';
import { OAuthProtectedResourceMetadata } from '@modelcontextprotocol/sdk/shared/auth.js';
import express, { RequestHandler, Router } from 'express';
import { Config } from '../config.js';

export const PROTECTED_RESOURCE_METADATA_PATH = '/.well-known/oauth-protected-resource';

export const RESOURCE_NAME = 'MCP Resource Server';

/**
 * RFC 9728 document telling clients which authorization server issues
 * tokens for this resource server.
 */
export function buildResourceMetadata(config: Readonly<Config>): Readonly<OAuthProtectedResourceMetadata> {
  return Object.freeze({
    resource: config.serverUrl,
    authorization_servers: [config.auth.issuer],
    scopes_supported: [...config.auth.requiredScopes],
    bearer_methods_supported: ['header'],
    resource_name: RESOURCE_NAME,
  });
}

/**
 * RFC 9728 section 3.1: the well-known segment goes between the host and any
 * path component of the resource identifier.
 */
export function resourceMetadataUrl(config: Readonly<Config>): string {
  const resource = new URL(config.serverUrl);
  const path = resource.pathname !== '/' ? resource.pathname : '';
  return new URL(`${PROTECTED_RESOURCE_METADATA_PATH}${path}`, resource).href;
}

const cacheHeaders: RequestHandler = (req, res, next) => {
  res.setHeader('Cache-Control', 'public, max-age=3600');
  next();
};

/**
 * Serves the metadata document. Mounted ahead of the auth gate; discovery
 * has to work without a token.
 */
export function protectedResourceMetadataRouter(metadata: Readonly<OAuthProtectedResourceMetadata>): Router {
  const router = express.Router();
  router.use(PROTECTED_RESOURCE_METADATA_PATH, cacheHeaders, metadataHandler(metadata));
  return router;
}
