import { Config } from '../config.js';
import { logger, tokenPreview } from '../utils/logger.js';
import { ClaimRequirements, validateClaims } from './claim-validator.js';
import { FetchLike, IntrospectionClient } from './introspection-client.js';
import { VerifiedIdentity } from './types.js';
import { VerificationCache } from './verification-cache.js';

/**
 * Verifies bearer tokens against the authorization server, reusing recent
 * introspection results.
 *
 * No lock is held while introspecting; two requests racing on the same
 * uncached token both introspect and the later store wins. Introspection is
 * side-effect free so that is harmless.
 */
export class IntrospectionTokenVerifier {
  constructor(
    private readonly client: IntrospectionClient,
    private readonly cache: VerificationCache,
    private readonly requirements: ClaimRequirements,
  ) {}

  async verify(token: string): Promise<VerifiedIdentity> {
    let result = this.cache.lookup(token);

    if (result) {
      logger.debug('Token validation cache hit', { token: tokenPreview(token) });
    } else {
      result = await this.client.introspect(token);

      const ttl = this.cache.ttlFor(result);
      if (ttl > 0) {
        this.cache.store(token, result, ttl);
        logger.debug('Token validation cached', {
          token: tokenPreview(token),
          cacheDuration: Math.round(ttl / 1000) + 's',
        });
      }
    }

    return validateClaims(result, this.requirements);
  }

  dispose(): void {
    this.cache.dispose();
  }
}

export function createTokenVerifier(
  config: Readonly<Config>,
  options: { fetch?: FetchLike } = {},
): IntrospectionTokenVerifier {
  const client = new IntrospectionClient({
    endpoint: config.auth.introspectionEndpoint,
    clientId: config.auth.clientId,
    clientSecret: config.auth.clientSecret,
    authMethod: config.auth.introspectionAuthMethod,
    timeoutMs: config.auth.introspectionTimeoutMs,
    fetch: options.fetch,
  });
  const cache = new VerificationCache({ maxTtlMs: config.auth.cacheTtlMs });

  return new IntrospectionTokenVerifier(client, cache, {
    resourceUrl: config.serverUrl,
    requiredScopes: config.auth.requiredScopes,
  });
}
