import { glob } from 'glob';
import fs from 'fs-extra';
import * as path from 'path';
import type { Font } from '../parser/font';
import { parseFont } from '../parser/font';
import type { ParseOptions } from '../types/font';
import { dataFileName } from './template-generator';

export interface FontFile {
  path: string;
  relativePath: string;
  parsed: { ok: true; font: Font } | { ok: false; error: string };
}

export async function findBdfFiles(directory: string): Promise<string[]> {
  try {
    const bdfPattern = path.join(directory, '**/*.bdf');
    const files = await glob(bdfPattern, { posix: true });
    return files.sort();
  } catch (error) {
    throw new Error(`Error finding BDF files: ${error}`);
  }
}

export async function readBdfFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new Error(`Error reading BDF file: ${error}`);
  }
}

/**
 * Parses every BDF file below `directory`, recording the parser error of
 * files that fail.
 */
export async function parseFontFiles(directory: string, options: ParseOptions = {}): Promise<FontFile[]> {
  const files = await findBdfFiles(directory);
  const parsed: FontFile[] = [];

  for (const file of files) {
    const text = await readBdfFile(file);
    let result: FontFile['parsed'];
    try {
      result = { ok: true, font: parseFont(text, options) };
    } catch (error) {
      result = { ok: false, error: `${error}` };
    }
    parsed.push({ path: file, relativePath: path.relative(directory, file), parsed: result });
  }

  return parsed;
}

export async function writeFontFiles(outputDir: string, fileStem: string, source: string, data: Uint8Array): Promise<string[]> {
  try {
    await fs.ensureDir(outputDir);

    const sourcePath = path.join(outputDir, `${fileStem}.ts`);
    const dataPath = path.join(outputDir, dataFileName(fileStem));
    await fs.writeFile(sourcePath, source);
    await fs.writeFile(dataPath, data);

    return [sourcePath, dataPath];
  } catch (error) {
    throw new Error(`Error writing font files: ${error}`);
  }
}
