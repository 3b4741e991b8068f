import { createHash } from 'crypto';
import { IntrospectionResult } from './types.js';

interface CacheEntry {
  result: IntrospectionResult;
  expiresAt: number;
}

export interface VerificationCacheOptions {
  /** Longest time a result is reused, in milliseconds. 0 disables the cache. */
  maxTtlMs: number;
  /** How often expired entries are swept; defaults to one minute */
  sweepIntervalMs?: number;
}

/**
 * Memoizes introspection results per token.
 *
 * Entries are keyed by the SHA-256 of the token so the map never holds raw
 * credentials. An entry is never returned after its expiry: lookups drop
 * stale entries and a background sweep removes the ones nobody asks for.
 */
export class VerificationCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly sweepTimer?: NodeJS.Timeout;

  constructor(private readonly options: VerificationCacheOptions) {
    if (options.maxTtlMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), options.sweepIntervalMs ?? 60 * 1000);
      this.sweepTimer.unref();
    }
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(token: string): IntrospectionResult | undefined {
    const key = cacheKey(token);
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.result;
  }

  store(token: string, result: IntrospectionResult, ttlMs: number): void {
    if (ttlMs <= 0) {
      return;
    }
    this.entries.set(cacheKey(token), { result, expiresAt: Date.now() + ttlMs });
  }

  /**
   * How long a result may be cached: the configured maximum, cut short by the
   * token's own expiry. Zero or less means "do not cache".
   */
  ttlFor(result: IntrospectionResult): number {
    if (!result.active) {
      return 0;
    }
    const { maxTtlMs } = this.options;
    if (result.expiresAt === undefined) {
      return maxTtlMs;
    }
    return Math.min(maxTtlMs, result.expiresAt * 1000 - Date.now());
  }

  sweep(): void {
    const now = Date.now();
    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
    }
    this.entries.clear();
  }
}

function cacheKey(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}
