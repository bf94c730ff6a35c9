// @vitest-environment node
import { describe, it, expect, beforeAll } from 'vitest';
import * as fontkit from 'fontkit';
import fonteditor from 'fonteditor-core';
import type { TTF } from 'fonteditor-core';
import { subsetFont } from '../../src/fonts/font-subsetter.js';
import { detectFontFormat } from '../../src/fonts/font-format.js';

function box(name: string, unicode: number, size: number): TTF.Glyph {
  return {
    name,
    unicode: [unicode],
    contours: [
      [
        { x: 50, y: 0, onCurve: true },
        { x: 50, y: size, onCurve: true },
        { x: 50 + size, y: size, onCurve: true },
        { x: 50 + size, y: 0, onCurve: true }
      ]
    ],
    xMin: 50,
    yMin: 0,
    xMax: 50 + size,
    yMax: size,
    advanceWidth: size + 100,
    leftSideBearing: 50
  };
}

/** TrueType font drawing `A`, `B` and `C` as squares. */
function buildFont(): Uint8Array {
  const font = fonteditor.Font.create();
  const ttf = font.get();
  ttf.glyf.push(box('A', 0x41, 400), box('B', 0x42, 500), box('C', 0x43, 600));
  const written: unknown = font.write({ type: 'ttf', toBuffer: true });
  if (!(written instanceof Uint8Array)) throw new Error('expected binary font output');
  return written;
}

function readBack(data: Uint8Array): fontkit.Font {
  const font = fontkit.create(Buffer.from(data));
  if ('fonts' in font) throw new Error('expected a single font');
  return font;
}

describe('subsetFont with real font engines', () => {
  let source: Uint8Array;

  beforeAll(() => {
    source = buildFont();
  });

  it('should start from a font that maps every letter', () => {
    const font = readBack(source);
    expect([0x41, 0x42, 0x43].map(cp => font.hasGlyphForCodePoint(cp))).toEqual([true, true, true]);
  });

  it('should write a WOFF2 font that keeps only the requested codepoints', async () => {
    const result = await subsetFont(source, [0x41, 0x43, 0x5a]);

    expect(Array.from(result.data.subarray(0, 4))).toEqual([0x77, 0x4f, 0x46, 0x32]);
    const font = readBack(result.data);
    expect(font.hasGlyphForCodePoint(0x41)).toBe(true);
    expect(font.hasGlyphForCodePoint(0x43)).toBe(true);
    expect(font.hasGlyphForCodePoint(0x42)).toBe(false);
    expect(result.glyphCount).toBeLessThan(4);
  });

  it('should write a TrueType font with the standard sfnt version', async () => {
    const result = await subsetFont(source, [0x42], { format: 'ttf' });

    expect(Array.from(result.data.subarray(0, 4))).toEqual([0x00, 0x01, 0x00, 0x00]);
    expect(detectFontFormat(result.data)).toBe('ttf');
    const font = readBack(result.data);
    expect(font.hasGlyphForCodePoint(0x42)).toBe(true);
    expect(font.hasGlyphForCodePoint(0x41)).toBe(false);
  });
});
