import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { Server } from 'http';
import { createApp, ResourceServerApp } from './app.js';
import { FetchLike } from './auth/introspection-client.js';
import { logger } from './utils/logger.js';
import { fakeIntrospection, RESOURCE_URL, testConfig } from './testing/fixtures.js';

const METADATA_URL = 'http://localhost:3000/.well-known/oauth-protected-resource';

const TOKENS = {
  'tok-valid': { active: true, scope: 'mcp', aud: RESOURCE_URL, sub: 'alice', client_id: 'desktop-client' },
  'tok-wrong-aud': { active: true, scope: 'mcp', aud: 'http://other-server' },
  'tok-no-scope': { active: true, scope: 'profile', aud: RESOURCE_URL, sub: 'bob' },
  'tok-bob': { active: true, scope: 'mcp', aud: RESOURCE_URL, sub: 'bob' },
};

const toolCall = {
  jsonrpc: '2.0',
  id: 1,
  method: 'tools/call',
  params: { name: 'add_numbers', arguments: { a: 2, b: 3 } },
};

describe('resource server', () => {
  let resourceServer: ResourceServerApp;
  let httpServer: Server;
  let baseUrl: string;
  let introspect: jest.Mock<FetchLike>;

  async function start(env: Record<string, string> = {}, fetchImpl: FetchLike = introspect) {
    resourceServer = createApp(testConfig(env), { fetch: fetchImpl });
    httpServer = await new Promise<Server>((resolve) => {
      const server = resourceServer.app.listen(0, '127.0.0.1', () => resolve(server));
    });
    const address = httpServer.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  function post(path: string, body: unknown, token?: string) {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json, text/event-stream',
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    return fetch(`${baseUrl}${path}`, { method: 'POST', headers, body: JSON.stringify(body) });
  }

  beforeEach(() => {
    logger.setSink(() => {});
    introspect = fakeIntrospection(TOKENS);
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    await resourceServer.dispose();
  });

  it('serves protected resource metadata without a token', async () => {
    await start();

    const response = await fetch(`${baseUrl}/.well-known/oauth-protected-resource`);

    expect(response.status).toBe(200);
    expect(response.headers.get('cache-control')).toBe('public, max-age=3600');
    expect(await response.json()).toEqual({
      resource: 'http://localhost:3000',
      authorization_servers: ['http://localhost:8080/realms/master/'],
      scopes_supported: ['mcp'],
      bearer_methods_supported: ['header'],
      resource_name: 'MCP Resource Server',
    });
    expect(introspect).not.toHaveBeenCalled();
  });

  it('reports health without a token', async () => {
    await start();

    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: 'healthy',
      transport: 'streamable-http',
      resource: 'http://localhost:3000',
      authorizationServer: 'http://localhost:8080/realms/master/',
    });
  });

  it('answers 401 with a discovery challenge when the token is missing', async () => {
    await start();

    const response = await post('/', toolCall);

    expect(response.status).toBe(401);
    expect(response.headers.get('www-authenticate')).toBe(`Bearer resource_metadata="${METADATA_URL}"`);
    expect(await response.json()).toEqual({
      error: 'invalid_token',
      error_description: 'Missing Authorization header',
    });
  });

  function postRaw(body: string, token?: string) {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    return fetch(`${baseUrl}/`, { method: 'POST', headers, body });
  }

  it('checks the token before reading the request body', async () => {
    await start();

    const response = await postRaw('{not json');

    expect(response.status).toBe(401);
    expect(response.headers.get('www-authenticate')).toBe(`Bearer resource_metadata="${METADATA_URL}"`);
    expect(await response.json()).toEqual({
      error: 'invalid_token',
      error_description: 'Missing Authorization header',
    });
  });

  it('answers a JSON-RPC parse error for an unreadable body from an authenticated caller', async () => {
    await start();

    const response = await postRaw('{not json', 'tok-valid');

    expect(response.status).toBe(400);
    expect(response.headers.get('content-type')).toMatch(/^application\/json/);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32700, message: 'Parse error' },
      id: null,
    });
  });

  it('runs the tool for a valid token', async () => {
    await start();

    const response = await post('/', toolCall, 'tok-valid');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: {
        structuredContent: {
          operation: 'addition',
          operand_a: 2,
          operand_b: 3,
          result: 5,
        },
      },
    });
  });

  it('answers 403 for a token issued to another server', async () => {
    await start();

    const response = await post('/', toolCall, 'tok-wrong-aud');

    expect(response.status).toBe(403);
    expect(await response.json()).toEqual({
      error: 'invalid_token',
      error_description: 'Token was not issued for this resource server',
    });
  });

  it('answers 403 for a token without the required scope', async () => {
    await start();

    const response = await post('/', toolCall, 'tok-no-scope');

    expect(response.status).toBe(403);
    expect(await response.json()).toEqual({
      error: 'insufficient_scope',
      error_description: 'Insufficient scope',
    });
  });

  it('answers 401 for an inactive token', async () => {
    await start();

    const response = await post('/', toolCall, 'tok-revoked');

    expect(response.status).toBe(401);
    expect(response.headers.get('www-authenticate')).toBe(
      `Bearer error="invalid_token", error_description="Token is not active", resource_metadata="${METADATA_URL}"`,
    );
  });

  it('answers 503 when introspection times out, then recovers', async () => {
    const hanging = jest.fn<FetchLike>((_url, init) => new Promise<Response>((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => reject(init.signal?.reason));
    }));
    await start({ INTROSPECTION_TIMEOUT_MS: '50' }, (url, init) =>
      hanging.mock.calls.length === 0 ? hanging(url, init) : introspect(url, init));

    const first = await post('/', toolCall, 'tok-valid');
    expect(first.status).toBe(503);
    expect(await first.json()).toEqual({
      error: 'temporarily_unavailable',
      error_description: 'Token could not be verified, try again later',
    });

    const second = await post('/', toolCall, 'tok-valid');
    expect(second.status).toBe(200);
    expect(introspect).toHaveBeenCalledTimes(1);
  });

  it('introspects a token once while its result is cached', async () => {
    await start();

    await post('/', toolCall, 'tok-valid');
    await post('/', toolCall, 'tok-valid');

    expect(introspect).toHaveBeenCalledTimes(1);
  });

  it('refuses GET on the stateless MCP endpoint', async () => {
    await start();

    const response = await fetch(`${baseUrl}/`, { headers: { Authorization: 'Bearer tok-valid' } });

    expect(response.status).toBe(405);
    expect(response.headers.get('allow')).toBe('POST');
  });

  describe('sse transport', () => {
    it('protects the SSE endpoint', async () => {
      await start({ TRANSPORT: 'sse' });

      const response = await fetch(`${baseUrl}/sse`);

      expect(response.status).toBe(401);
    });

    it('answers 404 for a message to an unknown session', async () => {
      await start({ TRANSPORT: 'sse' });

      const response = await post('/messages?sessionId=unknown', toolCall, 'tok-valid');

      expect(response.status).toBe(404);
      expect(await response.json()).toMatchObject({ error: { code: -32001, message: 'Session not found' } });
    });

    it('only lets the subject that opened a session post to it', async () => {
      await start({ TRANSPORT: 'sse' });
      const controller = new AbortController();

      const stream = await fetch(`${baseUrl}/sse`, {
        headers: { Authorization: 'Bearer tok-valid', Accept: 'text/event-stream' },
        signal: controller.signal,
      });
      expect(stream.status).toBe(200);
      if (!stream.body) {
        throw new Error('SSE response has no body');
      }
      const reader = stream.body.getReader();
      const { value } = await reader.read();
      const endpointEvent = new TextDecoder().decode(value);
      const match = /data: (\/messages\?sessionId=[^\s]+)/.exec(endpointEvent);
      if (!match) {
        throw new Error(`no endpoint event in ${endpointEvent}`);
      }
      const messagePath = match[1];

      try {
        const intruder = await post(messagePath, toolCall, 'tok-bob');
        expect(intruder.status).toBe(404);

        const owner = await post(messagePath, toolCall, 'tok-valid');
        expect(owner.status).toBe(202);
      } finally {
        controller.abort();
      }
    });

    it('does not mount the streamable endpoint', async () => {
      await start({ TRANSPORT: 'sse' });

      const response = await post('/', toolCall, 'tok-valid');

      expect(response.status).toBe(404);
    });
  });
});
