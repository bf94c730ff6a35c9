import type { FontFormat } from '../types/fonts.js';

const MAGIC: Array<[number[], FontFormat]> = [
  [[0x77, 0x4f, 0x46, 0x32], 'woff2'], // wOF2
  [[0x77, 0x4f, 0x46, 0x46], 'woff'], // wOFF
  [[0x00, 0x01, 0x00, 0x00], 'ttf'],
  [[0x4f, 0x54, 0x54, 0x4f], 'otf'], // OTTO
  [[0x74, 0x74, 0x63, 0x66], 'ttf'], // ttcf
  [[0x74, 0x72, 0x75, 0x65], 'ttf'] // true (Apple TrueType)
];

/** Format of a font file, from its first four bytes. */
export function detectFontFormat(data: Uint8Array): FontFormat {
  if (data.length < 4) return 'unknown';
  for (const [magic, format] of MAGIC) {
    if (magic.every((byte, i) => data[i] === byte)) return format;
  }
  return 'unknown';
}

const APPLE_TRUETYPE = [0x74, 0x72, 0x75, 0x65]; // true
const TRUETYPE_VERSION = [0x00, 0x01, 0x00, 0x00];

/**
 * Rewrites the Apple `true` sfnt tag as 0x00010000, the only TrueType tag
 * fonteditor-core reads. Anything else is returned unchanged.
 */
export function withTrueTypeVersion(data: Uint8Array): Uint8Array {
  if (data.length < 4 || !APPLE_TRUETYPE.every((byte, i) => data[i] === byte)) return data;
  const copy = Uint8Array.from(data);
  copy.set(TRUETYPE_VERSION, 0);
  return copy;
}
