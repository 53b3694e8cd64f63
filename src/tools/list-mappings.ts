import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { MAPPINGS } from '../utils/mapping-utils';

export function registerListMappingsTool(server: McpServer): void {
  server.tool('list-mappings', 'List the preset character mappings supported by convert-bdf-font', async () => {
    const mappingList = MAPPINGS.map((mapping) => `• ${mapping.id}: ${mapping.description} (${mapping.length} glyphs)`).join('\n');

    return {
      content: [
        {
          type: 'text',
          text: `🗺️ Supported mappings:\n\n${mappingList}`,
        },
      ],
    };
  });
}
