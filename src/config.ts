/**
 * Configuration for the resource server.
 *
 * Values come from environment variables (a local .env file is loaded by
 * src/index.ts through dotenv). The result is frozen and handed to every
 * component that needs it; nothing reads process.env after startup.
 */

import { LogSeverity, parseLogSeverity } from './utils/logger.js';

export type TransportMode = 'sse' | 'streamable-http';
export type IntrospectionAuthMethod = 'client_secret_post' | 'client_secret_basic';
export type UnreachableStatus = 401 | 502 | 503;

export interface Config {
  host: string;
  port: number;
  /** Canonical URL of this resource server, compared exactly against `aud` */
  serverUrl: string;
  transport: TransportMode;
  mcpPath: string;
  logLevel: LogSeverity;

  auth: {
    host: string;
    port: number;
    realm: string;
    baseUrl: string;
    issuer: string;
    introspectionEndpoint: string;
    authorizationEndpoint: string;
    tokenEndpoint: string;
    clientId: string;
    clientSecret: string;
    introspectionAuthMethod: IntrospectionAuthMethod;
    requiredScopes: string[];
    introspectionTimeoutMs: number;
    /** Upper bound on how long an introspection result is reused; 0 disables caching */
    cacheTtlMs: number;
    unreachableStatus: UnreachableStatus;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new ConfigError(`Invalid ${name}: ${raw}. Must be one of ${choices.map((c) => `'${c}'`).join(', ')}`);
  }
  return match;
}

function readUnreachableStatus(env: Env): UnreachableStatus {
  const status = readInt(env, 'INTROSPECTION_UNREACHABLE_STATUS', 503, 100);
  if (status !== 401 && status !== 502 && status !== 503) {
    throw new ConfigError(`INTROSPECTION_UNREACHABLE_STATUS must be 401, 502 or 503, got ${status}`);
  }
  return status;
}

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

/**
 * Introspection sends client credentials, so the endpoint has to be TLS
 * unless it lives on the loopback interface.
 */
export function isAllowedIntrospectionEndpoint(endpoint: string): boolean {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    return false;
  }
  if (url.protocol === 'https:') {
    return true;
  }
  return url.protocol === 'http:' && LOOPBACK_HOSTS.has(url.hostname);
}

/**
 * Build and validate the configuration from an environment map.
 */
export function loadConfig(env: Env = process.env): Readonly<Config> {
  const host = env.HOST || 'localhost';
  const port = readInt(env, 'PORT', 3000, 1);

  const authScheme = readChoice(env, 'AUTH_SCHEME', ['http', 'https'] as const, 'http');
  const authHost = env.AUTH_HOST || 'localhost';
  const authPort = readInt(env, 'AUTH_PORT', 8080, 1);
  const realm = env.AUTH_REALM || 'master';

  const clientSecret = env.OAUTH_CLIENT_SECRET;
  if (!clientSecret) {
    throw new ConfigError('OAUTH_CLIENT_SECRET must be set');
  }

  const requiredScopes = (env.MCP_SCOPE || 'mcp:tools').split(/\s+/).filter(Boolean);
  if (requiredScopes.length === 0) {
    throw new ConfigError('MCP_SCOPE must name at least one scope');
  }

  const mcpPath = env.MCP_PATH || '/';
  if (!mcpPath.startsWith('/')) {
    throw new ConfigError(`MCP_PATH must start with '/', got '${mcpPath}'`);
  }

  const logLevelRaw = env.LOG_LEVEL || 'info';
  const logLevel = parseLogSeverity(logLevelRaw);
  if (!logLevel) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${logLevelRaw}`);
  }

  // Keycloak-style realm layout
  const baseUrl = `${authScheme}://${authHost}:${authPort}/realms/${realm}/`;
  const introspectionEndpoint = new URL('protocol/openid-connect/token/introspect', baseUrl).href;
  if (!isAllowedIntrospectionEndpoint(introspectionEndpoint)) {
    throw new ConfigError(
      `Introspection endpoint ${introspectionEndpoint} must use https unless it is on localhost`
    );
  }

  const config: Config = {
    host,
    port,
    serverUrl: `http://${host}:${port}`,
    transport: readChoice(env, 'TRANSPORT', ['sse', 'streamable-http'] as const, 'streamable-http'),
    mcpPath,
    logLevel,
    auth: {
      host: authHost,
      port: authPort,
      realm,
      baseUrl,
      issuer: baseUrl,
      introspectionEndpoint,
      authorizationEndpoint: new URL('protocol/openid-connect/auth', baseUrl).href,
      tokenEndpoint: new URL('protocol/openid-connect/token', baseUrl).href,
      clientId: env.OAUTH_CLIENT_ID || 'mcp-server',
      clientSecret,
      introspectionAuthMethod: readChoice(
        env,
        'INTROSPECTION_AUTH_METHOD',
        ['client_secret_post', 'client_secret_basic'] as const,
        'client_secret_post'
      ),
      requiredScopes,
      introspectionTimeoutMs: readInt(env, 'INTROSPECTION_TIMEOUT_MS', 5000, 1),
      cacheTtlMs: readInt(env, 'TOKEN_CACHE_TTL_MS', 60 * 1000, 0),
      unreachableStatus: readUnreachableStatus(env)
    }
  };

  Object.freeze(config.auth.requiredScopes);
  Object.freeze(config.auth);
  return Object.freeze(config);
}
