import { isAllowedIntrospectionEndpoint, IntrospectionAuthMethod } from '../config.js';
import { logger } from '../utils/logger.js';
import { AuthGateError } from './errors.js';
import {
  IntrospectionResult,
  normalizeIntrospection,
  TokenIntrospectionResponseSchema,
} from './types.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface IntrospectionClientOptions {
  endpoint: string;
  clientId: string;
  clientSecret: string;
  authMethod: IntrospectionAuthMethod;
  timeoutMs: number;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
}

/**
 * Calls the authorization server's RFC 7662 introspection endpoint.
 *
 * Failures are reported as AuthGateError with one of three reasons so the
 * gate can tell an unreachable server from one that answered badly:
 * IntrospectionUnreachable (connect error, timeout), IntrospectionRejected
 * (non-2xx) and IntrospectionMalformed (body is not an introspection response).
 */
export class IntrospectionClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: IntrospectionClientOptions) {
    if (!isAllowedIntrospectionEndpoint(options.endpoint)) {
      throw new Error(`Refusing to send client credentials to non-TLS endpoint ${options.endpoint}`);
    }
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async introspect(token: string): Promise<IntrospectionResult> {
    const { endpoint, timeoutMs } = this.options;

    let status: number;
    let text: string;
    try {
      const response = await this.fetchImpl(endpoint, {
        method: 'POST',
        headers: this.buildHeaders(),
        body: this.buildBody(token).toString(),
        signal: AbortSignal.timeout(timeoutMs),
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      logger.error('Token introspection request did not complete', error, {
        endpoint,
        timeoutMs,
      });
      throw new AuthGateError('IntrospectionUnreachable', `introspection request to ${endpoint} failed`, { cause: error });
    }

    if (status < 200 || status >= 300) {
      logger.warning('Token introspection request rejected', { endpoint, status });
      throw new AuthGateError('IntrospectionRejected', `introspection endpoint answered ${status}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      logger.warning('Token introspection response is not JSON', { endpoint, status });
      throw new AuthGateError('IntrospectionMalformed', 'introspection response is not JSON', { cause: error });
    }

    const parsed = TokenIntrospectionResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.warning('Token introspection response failed validation', {
        endpoint,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      throw new AuthGateError('IntrospectionMalformed', 'introspection response failed validation');
    }

    return normalizeIntrospection(parsed.data);
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };
    if (this.options.authMethod === 'client_secret_basic') {
      // RFC 6749 section 2.3.1: id and secret are form-encoded before base64
      const credentials = `${encodeURIComponent(this.options.clientId)}:${encodeURIComponent(this.options.clientSecret)}`;
      headers.Authorization = `Basic ${Buffer.from(credentials).toString('base64')}`;
    }
    return headers;
  }

  private buildBody(token: string): URLSearchParams {
    const body = new URLSearchParams({ token, token_type_hint: 'access_token' });
    if (this.options.authMethod === 'client_secret_post') {
      body.set('client_id', this.options.clientId);
      body.set('client_secret', this.options.clientSecret);
    }
    return body;
  }
}
