import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { AtlasFontOutput } from '../services/atlas-font';
import { readBdfFile } from '../services/file-handler';
import { FontConverter } from '../services/font-converter';
import { findMapping } from '../utils/mapping-utils';
import fs from 'fs-extra';

const convertFontSchema = z.object({
  file: z.string().describe('Path to the BDF file'),
  name: z.string().describe('Name of the generated constant, e.g. "FONT_6X10"'),
  format: z.enum(['bit-packed', 'atlas']).optional().describe('Output format (default: "atlas")'),
  outputDir: z.string().optional().describe('Output directory (default: "./fonts")'),
  glyphs: z.string().optional().describe('Characters to include'),
  glyphRanges: z
    .array(z.object({ from: z.string(), to: z.string() }))
    .optional()
    .describe('Inclusive character ranges to include'),
  mapping: z.string().optional().describe('Include all characters of a preset mapping (see list-mappings)'),
  missingGlyphSubstitute: z.string().optional().describe('Character drawn for requested glyphs missing in the font'),
  replacementCharacter: z.string().optional().describe('Character drawn for characters not in the converted font'),
  comments: z.array(z.string()).optional().describe('Doc comment lines for the generated source'),
  glyphsPerRow: z.number().int().positive().optional().describe('Atlas columns (default: 16)'),
  strict: z.boolean().optional().describe('Enforce declared counts and reject data after ENDFONT (default: false)'),
});

export function registerConvertFontTool(server: McpServer): void {
  server.tool(
    'convert-bdf-font',
    'Convert a BDF font into a TypeScript module and a bit-packed or atlas data file',
    convertFontSchema.shape,
    async ({
      file,
      name,
      format = 'atlas',
      outputDir = './fonts',
      glyphs,
      glyphRanges = [],
      mapping,
      missingGlyphSubstitute,
      replacementCharacter,
      comments = [],
      glyphsPerRow,
      strict = false,
    }) => {
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

        const converter = new FontConverter(await readBdfFile(file), name);

        if (strict) {
          converter.parseOptions({ strictCounts: true, endOfInput: 'strict' });
        }

        if (mapping) {
          const preset = findMapping(mapping);
          if (!preset) {
            return {
              content: [
                {
                  type: 'text',
                  text: `❌ Unknown mapping "${mapping}". Use list-mappings to show all available mappings.`,
                },
              ],
            };
          }
          converter.glyphs(preset);
        }
        if (glyphs) {
          converter.glyphs(glyphs);
        }
        glyphRanges.forEach((range) => converter.glyphs(range));

        if (missingGlyphSubstitute) {
          converter.missingGlyphSubstitute(missingGlyphSubstitute);
        }
        if (replacementCharacter) {
          converter.replacementCharacter(replacementCharacter);
        }
        comments.forEach((comment) => converter.comment(comment));

        const output = format === 'bit-packed' ? converter.convertBitPacked() : converter.convertAtlas({ glyphsPerRow });
        const savedFiles = await output.save(outputDir);

        const layout =
          output instanceof AtlasFontOutput
            ? `• Cell size: ${output.characterSize.width}x${output.characterSize.height}
• Image: ${output.image.width}x${output.image.height}
• Mapping: ${output.mapping ? output.mapping.id : 'custom'}`
            : `• Data: ${output.bitLength} bits`;

        const report = `✅ Font converted successfully!

📊 Statistics:
• Format: ${format}
• Glyphs: ${output.font.glyphs.length}
• Ascent: ${output.font.ascent}
• Descent: ${output.font.descent}
${layout}

📁 Generated files:
${savedFiles.map((savedFile) => `   • ${savedFile}`).join('\n')}

💡 Usage:
import { ${name} } from './${output.font.fileStem}';`;

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
    },
  );
}
