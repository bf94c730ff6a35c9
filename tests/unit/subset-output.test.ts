// @vitest-environment node
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { expandFontPatterns, subsetFontFiles, subsetOutputPath } from '../../src/fonts/subset-output.js';
import { FontSubsetError } from '../../src/errors.js';

describe('subsetOutputPath', () => {
  it('should write beside the source by default', () => {
    expect(subsetOutputPath('/fonts/Brand.ttf')).toBe('/fonts/Brand-subset.woff2');
  });

  it('should use the output directory and format when given', () => {
    expect(subsetOutputPath('/fonts/Brand.woff2', '/out', 'ttf')).toBe('/out/Brand-subset.ttf');
  });

  it('should keep dots inside the stem', () => {
    expect(subsetOutputPath('fonts/Brand.Bold.otf', undefined, 'woff2')).toBe('fonts/Brand.Bold-subset.woff2');
  });
});

describe('subsetFontFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fontsift-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should report a file that is not a font against its path', async () => {
    const fontPath = join(dir, 'broken.ttf');
    await writeFile(fontPath, 'not a font');

    const results = await subsetFontFiles([join(dir, '*.ttf')], [65]);

    expect(results).toHaveLength(1);
    const [result] = results;
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.fontPath).toBe(fontPath);
    expect(result.error).toBeInstanceOf(FontSubsetError);
    expect(result.error.message).toBe(`failed to parse font (${fontPath}): unrecognised font format`);
    expect(await readdir(dir)).toEqual(['broken.ttf']);
  });

  it('should return no results when nothing matches', async () => {
    await expect(subsetFontFiles([join(dir, '*.woff2')], [65])).resolves.toEqual([]);
  });

  it('should list each matched file once', async () => {
    await writeFile(join(dir, 'a.ttf'), '');
    await writeFile(join(dir, 'b.otf'), '');

    const files = await expandFontPatterns([join(dir, '*.ttf'), join(dir, '*.{ttf,otf}')]);

    expect(files).toEqual([join(dir, 'a.ttf'), join(dir, 'b.otf')]);
  });
});
