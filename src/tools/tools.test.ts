import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createServer } from '../server';
import { readFixture } from '../test-utils';

let dir: string;
let client: Client;

async function callTool(name: string, args: Record<string, unknown> = {}): Promise<string> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  return result.content.map((item) => (item.type === 'text' ? item.text : '')).join('\n');
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bdf-tools-'));
  await fs.writeFile(path.join(dir, 'tiny.bdf'), readFixture('tiny.bdf'));
  await fs.outputFile(path.join(dir, 'sub', 'broken.bdf'), 'FONT x\n');
  await fs.writeFile(path.join(dir, 'notes.txt'), 'not a font');

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: 'test-client', version: '1.0.0' });
  await Promise.all([client.connect(clientTransport), createServer().connect(serverTransport)]);
});

afterEach(async () => {
  await client.close();
  await fs.remove(dir);
});

describe('list-bdf-fonts', () => {
  it('reports every BDF file', async () => {
    const lines = (await callTool('list-bdf-fonts', { directory: dir })).split('\n');

    expect(lines[0]).toBe(`📁 BDF files found in ${dir}:`);
    expect(lines).toContain('❌ sub/broken.bdf: line 1: expected "STARTFONT"');
    expect(lines).toContain('✅ tiny.bdf (7 glyphs)');
    expect(lines[lines.length - 1]).toBe('1 out of 2 fonts parsed (1 failed)');
  });

  it('applies strict parsing', async () => {
    await fs.writeFile(path.join(dir, 'tiny.bdf'), `${readFixture('tiny.bdf')}trailing\n`);
    const lines = (await callTool('list-bdf-fonts', { directory: dir, strict: true })).split('\n');

    expect(lines).toContain('❌ tiny.bdf: line 92: unexpected data after "ENDFONT"');
  });

  it('handles empty and missing directories', async () => {
    const empty = path.join(dir, 'empty');
    await fs.ensureDir(empty);

    expect(await callTool('list-bdf-fonts', { directory: empty })).toBe(`No BDF files found in ${empty}`);
    expect(await callTool('list-bdf-fonts', { directory: path.join(dir, 'missing') })).toBe(
      `❌ Directory ${path.join(dir, 'missing')} does not exist`,
    );
  });
});

describe('inspect-bdf-font', () => {
  it('reports metadata, properties and glyphs', async () => {
    const lines = (await callTool('inspect-bdf-font', { file: path.join(dir, 'tiny.bdf'), characters: 'Aé' })).split('\n');

    expect(lines[0]).toBe('✅ Font parsed successfully!');
    expect(lines).toContain('• Point size: 7');
    expect(lines).toContain('• Resolution: 75x75 DPI');
    expect(lines).toContain('• Bounding box: 6x8 at (0, -2)');
    expect(lines).toContain('• Metrics set: horizontal');
    expect(lines).toContain('• Glyphs: 7');
    expect(lines).toContain('🏷️ Properties (4):');
    expect(lines).toContain('   • FONT_ASCENT = 6');
    expect(lines).toContain('   • COPYRIGHT = "Public domain test font"');

    const glyph = lines.indexOf("🔤 'A' A [U+0041] 5x6 at (0, 0)");
    expect(glyph).toBeGreaterThan(0);
    expect(lines.slice(glyph + 1, glyph + 7)).toEqual(['.###.', '#...#', '#...#', '#####', '#...#', '#...#']);
    expect(lines[lines.length - 1]).toBe("❓ 'é' (U+00E9) is not contained in the font");
  });

  it('reports parser errors', async () => {
    expect(await callTool('inspect-bdf-font', { file: path.join(dir, 'sub', 'broken.bdf') })).toBe(
      '❌ Error: line 1: expected "STARTFONT"',
    );
  });
});

describe('convert-bdf-font', () => {
  it('writes a bit-packed font', async () => {
    const outputDir = path.join(dir, 'out');
    const text = await callTool('convert-bdf-font', {
      file: path.join(dir, 'tiny.bdf'),
      name: 'TINY',
      format: 'bit-packed',
      outputDir,
      glyphs: 'AB',
    });
    const lines = text.split('\n');

    expect(lines[0]).toBe('✅ Font converted successfully!');
    expect(lines).toContain('• Format: bit-packed');
    expect(lines).toContain('• Glyphs: 2');
    expect(lines).toContain('• Data: 60 bits');
    expect(lines).toContain(`   • ${path.join(outputDir, 'tiny.ts')}`);
    expect(lines[lines.length - 1]).toBe("import { TINY } from './tiny';");
    expect(Array.from(await fs.readFile(path.join(outputDir, 'tiny.data')))).toEqual([
      0x74, 0x63, 0xf8, 0xc7, 0xd1, 0xf4, 0x63, 0xe0,
    ]);
  });

  it('writes an atlas font', async () => {
    const outputDir = path.join(dir, 'atlas');
    const lines = (
      await callTool('convert-bdf-font', {
        file: path.join(dir, 'tiny.bdf'),
        name: 'TINY_ATLAS',
        outputDir,
        glyphRanges: [{ from: 'A', to: 'C' }],
        glyphsPerRow: 2,
        comments: ['Atlas test font'],
      })
    ).split('\n');

    expect(lines).toContain('• Format: atlas');
    expect(lines).toContain('• Glyphs: 3');
    expect(lines).toContain('• Cell size: 5x8');
    expect(lines).toContain('• Image: 10x16');
    expect(lines).toContain('• Mapping: custom');

    const source = await fs.readFile(path.join(outputDir, 'tiny_atlas.ts'), 'utf8');
    expect(source.split('\n')).toContain('/** Atlas test font */');
    expect(source.split('\n')).toContain("  glyphMapping: { data: '\\u0000AC', replacementIndex: 0 },");
  });

  it('rejects unknown mappings', async () => {
    expect(
      await callTool('convert-bdf-font', { file: path.join(dir, 'tiny.bdf'), name: 'TINY', mapping: 'klingon' }),
    ).toBe('❌ Unknown mapping "klingon". Use list-mappings to show all available mappings.');
  });

  it('reports conversion errors', async () => {
    expect(
      await callTool('convert-bdf-font', {
        file: path.join(dir, 'tiny.bdf'),
        name: 'TINY',
        outputDir: path.join(dir, 'out'),
        glyphs: 'AZ',
      }),
    ).toBe("❌ Error: ConversionError: glyph 'Z' (U+005A) is not contained in the BDF font");
    expect(await callTool('convert-bdf-font', { file: path.join(dir, 'none.bdf'), name: 'TINY' })).toBe(
      `❌ File ${path.join(dir, 'none.bdf')} does not exist`,
    );
  });

  it('substitutes missing glyphs', async () => {
    const lines = (
      await callTool('convert-bdf-font', {
        file: path.join(dir, 'tiny.bdf'),
        name: 'TINY',
        format: 'bit-packed',
        outputDir: path.join(dir, 'out'),
        glyphs: 'AZ',
        missingGlyphSubstitute: '?',
      })
    ).split('\n');

    expect(lines).toContain('• Glyphs: 2');
  });
});

describe('list-mappings', () => {
  it('lists the presets', async () => {
    const lines = (await callTool('list-mappings')).split('\n');

    expect(lines[0]).toBe('🗺️ Supported mappings:');
    expect(lines).toContain('• ascii: ASCII (96 glyphs)');
    expect(lines).toContain('• jis-x0201: JIS X 0201 (Roman and half-width katakana) (158 glyphs)');
  });
});
