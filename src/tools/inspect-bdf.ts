import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { parseFont } from '../parser/font';
import { readBdfFile } from '../services/file-handler';
import { formatBoundingBox, formatEncoding, glyphToRows } from '../utils/glyph-utils';
import { formatCodePoint } from '../utils/unicode-utils';
import fs from 'fs-extra';

const inspectBdfFontSchema = z.object({
  file: z.string().describe('Path to the BDF file'),
  characters: z.string().optional().describe('Characters whose glyphs should be drawn as text'),
  strict: z.boolean().optional().describe('Enforce declared counts and reject data after ENDFONT (default: false)'),
});

export function registerInspectBdfFontTool(server: McpServer): void {
  server.tool('inspect-bdf-font', 'Show the metadata, properties and glyphs of a BDF font', inspectBdfFontSchema.shape, async ({ file, characters = '', strict = false }) => {
    try {
      if (!(await fs.pathExists(file))) {
        return {
          content: [
            {
              type: 'text',
              text: `❌ File ${file} does not exist`,
            },
          ],
        };
      }

      const font = parseFont(await readBdfFile(file), strict ? { strictCounts: true, endOfInput: 'strict' } : {});
      const { metadata } = font;

      const properties = Array.from(metadata.properties.entries())
        .map(([name, value]) => `   • ${name} = ${value.kind === 'int' ? value.value : JSON.stringify(value.value)}`)
        .join('\n');

      const glyphs = Array.from(characters)
        .map((c) => {
          const glyph = font.glyphs.get(c);
          if (!glyph) {
            return `❓ '${c}' (${formatCodePoint(c.codePointAt(0) ?? 0)}) is not contained in the font`;
          }
          return `🔤 '${c}' ${glyph.name} [${formatEncoding(glyph.encoding)}] ${formatBoundingBox(glyph.boundingBox)}\n${glyphToRows(glyph).join('\n')}`;
        })
        .join('\n\n');

      const report = `✅ Font parsed successfully!

📊 Metadata:
• Name: ${metadata.name}
• Point size: ${metadata.pointSize}
• Resolution: ${metadata.resolution.x}x${metadata.resolution.y} DPI
• Bounding box: ${formatBoundingBox(metadata.boundingBox)}
• Metrics set: ${metadata.metricsSet}
• Glyphs: ${font.glyphs.length}

🏷️ Properties (${metadata.properties.size}):
${properties}${glyphs ? `\n\n${glyphs}` : ''}`;

      return {
        content: [
          {
            type: 'text',
            text: report,
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
