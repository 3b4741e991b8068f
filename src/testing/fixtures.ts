import { jest } from '@jest/globals';
import { Config, loadConfig } from '../config.js';
import { FetchLike } from '../auth/introspection-client.js';

export const RESOURCE_URL = 'http://localhost:3000';

export function testConfig(env: Record<string, string> = {}): Readonly<Config> {
  return loadConfig({ OAUTH_CLIENT_SECRET: 'test-secret', MCP_SCOPE: 'mcp', ...env });
}

/**
 * Stand-in for the authorization server: answers each token from a table,
 * `{ active: false }` for tokens it does not know.
 */
export function fakeIntrospection(tokens: Record<string, Record<string, unknown>>): jest.Mock<FetchLike> {
  return jest.fn<FetchLike>(async (_url, init) => {
    const token = new URLSearchParams(String(init.body)).get('token') ?? '';
    const body = tokens[token] ?? { active: false };
    return new Response(JSON.stringify(body), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });
}
