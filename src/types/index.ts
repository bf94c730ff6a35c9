export * from './glyphs.js';
export type * from './css.js';
export type * from './browser.js';
export type * from './fonts.js';
export type * from './config.js';
