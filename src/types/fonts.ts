export type FontFormat = 'ttf' | 'otf' | 'woff' | 'woff2' | 'unknown';

export type SubsetOutputFormat = 'woff2' | 'ttf';

export type FontSubsetFailure = 'parse' | 'subset' | 'compress';

export interface SubsetOptions {
  format: SubsetOutputFormat;
}

export type SubsetFileResult =
  | { fontPath: string; ok: true; outputPath: string; glyphCount: number; bytes: number }
  | { fontPath: string; ok: false; error: Error };
