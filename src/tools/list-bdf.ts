import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { parseFontFiles } from '../services/file-handler';
import fs from 'fs-extra';

const listBdfFontsSchema = z.object({
  directory: z.string().describe('Directory to search for BDF files'),
  strict: z.boolean().optional().describe('Enforce declared counts and reject data after ENDFONT (default: false)'),
});

export function registerListBdfFontsTool(server: McpServer): void {
  server.tool('list-bdf-fonts', 'Parse all BDF fonts in a directory and report which ones are valid', listBdfFontsSchema.shape, async ({ directory, strict = false }) => {
    try {
      if (!(await fs.pathExists(directory))) {
        return {
          content: [
            {
              type: 'text',
              text: `❌ Directory ${directory} does not exist`,
            },
          ],
        };
      }

      const files = await parseFontFiles(directory, strict ? { strictCounts: true, endOfInput: 'strict' } : {});

      if (files.length === 0) {
        return {
          content: [
            {
              type: 'text',
              text: `No BDF files found in ${directory}`,
            },
          ],
        };
      }

      const fileList = files
        .map((file) => {
          if (file.parsed.ok) {
            return `✅ ${file.relativePath} (${file.parsed.font.glyphs.length} glyphs)`;
          }
          return `❌ ${file.relativePath}: ${file.parsed.error}`;
        })
        .join('\n');
      const failed = files.filter((file) => !file.parsed.ok).length;

      return {
        content: [
          {
            type: 'text',
            text: `📁 BDF files found in ${directory}:\n\n${fileList}\n\n${files.length - failed} out of ${files.length} fonts parsed (${failed} failed)`,
          },
        ],
      };
    } catch (error) {
      return {
        content: [
          {
            type: 'text',
            text: `❌ Error: ${error}`,
          },
        ],
      };
    }
  });
}
