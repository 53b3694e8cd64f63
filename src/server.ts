import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerAllTools } from './tools';

export function createServer(): McpServer {
  const server = new McpServer({
    name: 'BDF-Font-Converter',
    version: '1.0.0',
    description: 'MCP server for parsing BDF bitmap fonts and converting them into packed glyph data',
  });

  registerAllTools(server);

  return server;
}
