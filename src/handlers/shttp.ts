import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { Request, Response } from "express";
import { getVerifiedIdentity } from "../context.js";
import { createMcpServer } from "../services/mcp.js";
import { logger } from "../utils/logger.js";

/**
 * Streamable HTTP in stateless mode: every POST gets its own server and
 * transport, torn down when the response closes. There are no sessions, so
 * each request stands on the identity the auth gate attached to it.
 * Replies are plain JSON rather than an SSE stream.
 */
export async function handleStreamableHTTP(req: Request, res: Response) {
  const { subject } = getVerifiedIdentity();
  const server = createMcpServer();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
    enableJsonResponse: true,
  });

  res.on('close', () => {
    transport.close()
      .then(() => server.close())
      .catch((error) => logger.error('Error closing MCP transport', error, { subject }));
  });

  try {
    logger.debug('SHTTP request received', {
      method: req.method,
      subject,
      rpcMethod: rpcMethodOf(req.body),
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  } catch (error) {
    logger.error('Error handling MCP request', error, {
      method: req.method,
      subject,
    });

    if (!res.headersSent) {
      res.status(500).json({
        "jsonrpc": "2.0",
        "error": {
          "code": -32603,
          "message": "Internal error during request processing"
        },
        "id": null
      });
    }
  }
}

/**
 * GET and DELETE only make sense for session-based servers.
 */
export function handleStreamableHTTPMethodNotAllowed(req: Request, res: Response) {
  res.status(405).set('Allow', 'POST').json({
    "jsonrpc": "2.0",
    "error": {
      "code": -32000,
      "message": "Method not allowed."
    },
    "id": null
  });
}

function rpcMethodOf(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'method' in body && typeof body.method === 'string') {
    return body.method;
  }
  return undefined;
}
