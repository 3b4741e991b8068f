import type { IncomingHttpHeaders } from 'http';
import { AuthGateError } from './errors.js';

/**
 * Pull the bearer token out of the Authorization header.
 *
 * The scheme keyword is matched case-insensitively (RFC 7235). Anything other
 * than exactly `Bearer <token>` is a MalformedToken.
 */
export function extractBearerToken(headers: IncomingHttpHeaders): string {
  const header: unknown = headers.authorization;
  if (header === undefined) {
    throw new AuthGateError('MissingToken');
  }
  if (typeof header !== 'string') {
    throw new AuthGateError('MalformedToken', 'Authorization header is not a single string');
  }

  const match = /^([^\s]+) +([^\s]+)$/.exec(header.trim());
  if (!match || match[1].toLowerCase() !== 'bearer') {
    throw new AuthGateError('MalformedToken', 'Authorization header is not a Bearer credential');
  }

  return match[2];
}
