import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerPackTool } from './tools/pack.js';
import { registerIntersectionsTool } from './tools/intersections.js';
import { registerAtlasTool } from './tools/atlas.js';

export const SERVER_NAME = 'boxpack-mcp';
export const SERVER_VERSION = '1.0.0';

/**
 * Builds the MCP server with every tool registered. Not yet connected to a transport.
 */
export function createServer(): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerPackTool(server);
  registerIntersectionsTool(server);
  registerAtlasTool(server);

  return server;
}
