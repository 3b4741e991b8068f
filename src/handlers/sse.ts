import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { Request, Response } from "express";
import { getVerifiedIdentity } from "../context.js";
import { createMcpServer } from "../services/mcp.js";
import { logger } from "../utils/logger.js";

export const SSE_MESSAGE_PATH = "/messages";

interface SseSession {
  transport: SSEServerTransport;
  server: McpServer;
  subject: string;
}

/**
 * Legacy HTTP+SSE transport. The stream opened by GET /sse stays bound to the
 * subject that opened it; messages posted for that session by anyone else are
 * treated as if the session did not exist.
 */
export class SseSessions {
  private sessions = new Map<string, SseSession>();

  get size(): number {
    return this.sessions.size;
  }

  handleSSEConnection = async (req: Request, res: Response) => {
    const { subject } = getVerifiedIdentity();
    const server = createMcpServer();
    const transport = new SSEServerTransport(SSE_MESSAGE_PATH, res);
    const sessionId = transport.sessionId;

    this.sessions.set(sessionId, { transport, server, subject });
    logger.info('Received MCP SSE connection', { sessionId, subject });

    res.on('close', () => {
      this.sessions.delete(sessionId);
      logger.info('MCP SSE connection closed', { sessionId, subject });
      server.close().catch((error) =>
        logger.error('Error closing MCP server', error, { sessionId }),
      );
    });

    await server.connect(transport);
  };

  handleMessage = async (req: Request, res: Response) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : undefined;
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    const { subject } = getVerifiedIdentity();

    if (!session || session.subject !== subject) {
      if (session) {
        logger.warning('Session ownership mismatch', { sessionId, subject });
      }
      res.status(404).json({
        "jsonrpc": "2.0",
        "error": {
          "code": -32001,
          "message": "Session not found"
        },
        "id": null
      });
      return;
    }

    await session.transport.handlePostMessage(req, res, req.body);
  };

  async closeAll(): Promise<void> {
    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(sessions.map((session) => session.server.close()));
  }
}
