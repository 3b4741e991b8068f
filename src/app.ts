import cors from "cors";
import express, { ErrorRequestHandler } from "express";
import rateLimit from "express-rate-limit";
import { requireIntrospectedBearer } from "./auth/gate.js";
import { FetchLike } from "./auth/introspection-client.js";
import { buildResourceMetadata, protectedResourceMetadataRouter, resourceMetadataUrl } from "./auth/metadata.js";
import { createTokenVerifier } from "./auth/token-verifier.js";
import { Config } from "./config.js";
import { handleStreamableHTTP, handleStreamableHTTPMethodNotAllowed } from "./handlers/shttp.js";
import { SSE_MESSAGE_PATH, SseSessions } from "./handlers/sse.js";
import { logger } from "./utils/logger.js";

export interface AppDependencies {
  /** Used for introspection calls; defaults to the global fetch */
  fetch?: FetchLike;
}

export interface ResourceServerApp {
  app: express.Express;
  /** Stops background work (cache sweep) and closes open SSE sessions */
  dispose(): Promise<void>;
}

// Base security middleware - applied to all routes
const baseSecurityHeaders = (req: express.Request, res: express.Response, next: express.NextFunction) => {
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.setHeader('X-Frame-Options', 'SAMEORIGIN');
  res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
  next();
};

const loggingMiddleware = (req: express.Request, res: express.Response, next: express.NextFunction) => {
  const startTime = Date.now();

  // Only log specific safe headers; never authorization or cookies
  logger.info('Request received', {
    method: req.method,
    url: req.url,
    headers: {
      'content-type': req.headers['content-type'],
      'user-agent': req.headers['user-agent'],
      'mcp-protocol-version': req.headers['mcp-protocol-version'],
      'accept': req.headers['accept'],
    },
    bodySize: req.headers['content-length']
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    logger.info('Request completed', {
      method: req.method,
      url: req.url,
      statusCode: res.statusCode,
      duration: `${duration}ms`
    });
  });

  next();
};

// Browser-based MCP clients need to read the auth challenge and the session header
const corsOptions = {
  origin: true,
  methods: ['GET', 'POST', 'DELETE'],
  allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Protocol-Version', 'Mcp-Session-Id'],
  exposedHeaders: ['Mcp-Protocol-Version', 'Mcp-Session-Id', 'WWW-Authenticate'],
};

export function createApp(config: Readonly<Config>, deps: AppDependencies = {}): ResourceServerApp {
  const app = express();
  const verifier = createTokenVerifier(config, { fetch: deps.fetch });
  const sseSessions = new SseSessions();

  app.use(logger.middleware());
  app.use(loggingMiddleware);
  app.use(baseSecurityHeaders);

  // Unauthenticated: discovery and health
  app.use(protectedResourceMetadataRouter(buildResourceMetadata(config)));

  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      transport: config.transport,
      resource: config.serverUrl,
      authorizationServer: config.auth.issuer,
    });
  });

  const mcpRateLimit = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: 100, // 100 requests per 15 minutes per IP
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: { error: 'too_many_requests', error_description: 'MCP rate limit exceeded' }
  });

  const bearerAuth = requireIntrospectedBearer({
    verifier,
    resourceMetadataUrl: resourceMetadataUrl(config),
    requiredScopes: config.auth.requiredScopes,
    unreachableStatus: config.auth.unreachableStatus,
  });

  // Bodies are only read once the caller is authenticated
  const jsonBody = express.json({ limit: '4mb' });

  const mcp = express.Router();
  mcp.use(cors(corsOptions));

  if (config.transport === 'streamable-http') {
    mcp.post(config.mcpPath, mcpRateLimit, bearerAuth, jsonBody, handleStreamableHTTP);
    mcp.get(config.mcpPath, mcpRateLimit, bearerAuth, handleStreamableHTTPMethodNotAllowed);
    mcp.delete(config.mcpPath, mcpRateLimit, bearerAuth, handleStreamableHTTPMethodNotAllowed);
  } else {
    mcp.get('/sse', mcpRateLimit, bearerAuth, sseSessions.handleSSEConnection);
    mcp.post(SSE_MESSAGE_PATH, mcpRateLimit, bearerAuth, jsonBody, sseSessions.handleMessage);
  }
  mcp.use(jsonBodyErrors);
  app.use(mcp);

  return {
    app,
    async dispose() {
      verifier.dispose();
      await sseSessions.closeAll();
    },
  };
}

interface BodyParserError {
  type: string;
  status: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return typeof err === 'object' && err !== null
    && 'type' in err && typeof err.type === 'string'
    && 'status' in err && typeof err.status === 'number';
}

/**
 * Turns body-parser failures into JSON-RPC errors instead of the default
 * HTML error page, which carries the stack trace.
 */
const jsonBodyErrors: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent || !isBodyParserError(err)) {
    next(err);
    return;
  }

  const parseFailed = err.type === 'entity.parse.failed';
  logger.warning('Rejected MCP request body', { type: err.type, status: err.status });
  res.status(err.status).json({
    jsonrpc: '2.0',
    error: {
      code: parseFailed ? -32700 : -32600,
      message: parseFailed ? 'Parse error' : 'Invalid Request',
    },
    id: null,
  });
};
