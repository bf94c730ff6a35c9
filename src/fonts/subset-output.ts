import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { glob } from 'glob';
import type { SubsetFileResult, SubsetOutputFormat } from '../types/fonts.js';
import { FontSubsetError, describeError } from '../errors.js';
import { subsetFont } from './font-subsetter.js';

/** `<stem>-subset.woff2` (or `.ttf`) in `outputDir`, or beside the source. */
export function subsetOutputPath(fontPath: string, outputDir?: string, format: SubsetOutputFormat = 'woff2'): string {
  const stem = basename(fontPath, extname(fontPath));
  return join(outputDir ?? dirname(fontPath), `${stem}-subset.${format}`);
}

/** Files matched by any of the patterns, each once, sorted. */
export async function expandFontPatterns(patterns: string[]): Promise<string[]> {
  const files = new Set<string>();
  for (const pattern of patterns) {
    for (const file of await glob(pattern, { nodir: true })) files.add(file);
  }
  return Array.from(files).sort();
}

export interface SubsetFilesOptions {
  outputDir?: string;
  format?: SubsetOutputFormat;
}

/**
 * Subsets every font matched by `patterns` and writes the results. A font
 * that fails is reported in its own result and does not stop the others.
 */
export async function subsetFontFiles(
  patterns: string[],
  codepoints: Iterable<number>,
  options: SubsetFilesOptions = {}
): Promise<SubsetFileResult[]> {
  const format = options.format ?? 'woff2';
  const wanted = Array.from(codepoints);
  const files = await expandFontPatterns(patterns);

  if (options.outputDir && files.length > 0) {
    await mkdir(options.outputDir, { recursive: true });
  }

  const results: SubsetFileResult[] = [];
  for (const fontPath of files) {
    try {
      const bytes = await readFile(fontPath);
      const { data, glyphCount } = await subsetFont(bytes, wanted, { format });
      const outputPath = subsetOutputPath(fontPath, options.outputDir, format);
      await writeFile(outputPath, data);
      results.push({ fontPath, ok: true, outputPath, glyphCount, bytes: data.byteLength });
    } catch (error) {
      const failure =
        error instanceof FontSubsetError
          ? error.withPath(fontPath)
          : new Error(`${fontPath}: ${describeError(error)}`, { cause: error });
      results.push({ fontPath, ok: false, error: failure });
    }
  }
  return results;
}
