import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerConvertFontTool } from './convert-font';
import { registerInspectBdfFontTool } from './inspect-bdf';
import { registerListBdfFontsTool } from './list-bdf';
import { registerListMappingsTool } from './list-mappings';

export function registerAllTools(server: McpServer): void {
  registerListBdfFontsTool(server);
  registerInspectBdfFontTool(server);
  registerConvertFontTool(server);
  registerListMappingsTool(server);
}
