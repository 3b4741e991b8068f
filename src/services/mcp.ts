import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTools } from './tools.js';

export const SERVER_NAME = 'MCP Resource Server';
export const SERVER_VERSION = '0.1.0';

/**
 * Build a fresh MCP server with every tool registered. Transports create one
 * per request (streamable HTTP) or per connection (SSE).
 */
export function createMcpServer(): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      instructions: 'Resource Server that validates tokens via Authorization Server introspection',
    },
  );
  registerTools(server);
  return server;
}
