import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server';

async function main() {
  const server = createServer();

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('BDF font converter MCP server running on stdio');
}

process.on('SIGINT', () => process.exit(0));
process.on('SIGTERM', () => process.exit(0));

main().catch((error) => {
  console.error(`❌ Fatal: ${error}`);
  process.exit(1);
});
