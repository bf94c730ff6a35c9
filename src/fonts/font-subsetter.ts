import * as fontkit from 'fontkit';
import fonteditor from 'fonteditor-core';
import { inflateSync } from 'node:zlib';
import type { FontFormat, SubsetOptions } from '../types/fonts.js';
import { FontSubsetError, describeError } from '../errors.js';
import { detectFontFormat, withTrueTypeVersion } from './font-format.js';

type GlyphLike = { id: number };

type FontLike = {
  glyphForCodePoint: (codePoint: number) => GlyphLike | null | undefined;
};

type EditableFont = ReturnType<typeof fonteditor.Font.create>;

export interface SubsetFontResult {
  data: Uint8Array;
  /** Glyphs in the output, `.notdef` included. */
  glyphCount: number;
}

let woff2Ready: Promise<unknown> | undefined;

/** Loads the Brotli codec of fonteditor-core once per process. */
async function ensureWoff2(): Promise<void> {
  if (!woff2Ready) {
    woff2Ready = fonteditor.woff2.init().catch((error: unknown) => {
      woff2Ready = undefined;
      throw error;
    });
  }
  await woff2Ready;
}

function isFontLike(value: unknown): value is FontLike {
  return (
    typeof value === 'object' &&
    value !== null &&
    'glyphForCodePoint' in value &&
    typeof value.glyphForCodePoint === 'function'
  );
}

function isCollection(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'fonts' in value;
}

function openFont(bytes: Uint8Array): FontLike {
  let opened: unknown;
  try {
    opened = fontkit.create(Buffer.from(bytes));
  } catch (error) {
    throw new FontSubsetError('parse', describeError(error), { cause: error });
  }

  if (isCollection(opened)) throw new FontSubsetError('parse', 'font collections are not supported');
  if (isFontLike(opened)) return opened;
  throw new FontSubsetError('parse', 'font cannot be subset');
}

/** Requested codepoints the font maps to a real glyph, first occurrence order. */
function coveredCodepoints(font: FontLike, codepoints: Iterable<number>): number[] {
  const covered = new Set<number>();
  for (const cp of codepoints) {
    const glyph = font.glyphForCodePoint(cp);
    if (glyph && glyph.id !== 0) covered.add(cp);
  }
  return [...covered];
}

function inflate(deflated: number[]): number[] {
  return Array.from(inflateSync(Uint8Array.from(deflated)));
}

async function readReduced(bytes: Uint8Array, format: Exclude<FontFormat, 'unknown'>, keep: number[]): Promise<EditableFont> {
  if (format === 'woff2') await ensureWoff2();
  const source = Buffer.from(withTrueTypeVersion(bytes));

  if (keep.length > 0) {
    return fonteditor.Font.create(source, { type: format, subset: keep, hinting: true, inflate });
  }

  // Nothing to keep: .notdef alone.
  const font = fonteditor.Font.create(source, { type: format, hinting: true, inflate });
  const ttf = font.get();
  ttf.glyf = ttf.glyf.slice(0, 1);
  return font;
}

function toBytes(written: unknown): Uint8Array {
  if (written instanceof Uint8Array) return written;
  if (written instanceof ArrayBuffer) return new Uint8Array(written);
  throw new Error('encoder returned no binary output');
}

/**
 * Reduces a font to the glyphs that draw `codepoints`. Codepoints the font
 * has no glyph for are ignored. The result is WOFF2 unless `format` is `ttf`.
 */
export async function subsetFont(
  bytes: Uint8Array,
  codepoints: Iterable<number>,
  options: SubsetOptions = { format: 'woff2' }
): Promise<SubsetFontResult> {
  const format = detectFontFormat(bytes);
  if (format === 'unknown') {
    throw new FontSubsetError('parse', 'unrecognised font format');
  }

  const keep = coveredCodepoints(openFont(bytes), codepoints);

  let reduced: EditableFont;
  try {
    reduced = await readReduced(bytes, format, keep);
  } catch (error) {
    throw new FontSubsetError('subset', describeError(error), { cause: error });
  }
  const glyphCount = reduced.get().glyf.length;

  if (options.format === 'ttf') {
    try {
      return { data: toBytes(reduced.write({ type: 'ttf', toBuffer: true, hinting: true })), glyphCount };
    } catch (error) {
      throw new FontSubsetError('subset', describeError(error), { cause: error });
    }
  }

  try {
    await ensureWoff2();
    return { data: toBytes(reduced.write({ type: 'woff2', toBuffer: true, hinting: true })), glyphCount };
  } catch (error) {
    throw new FontSubsetError('compress', describeError(error), { cause: error });
  }
}
