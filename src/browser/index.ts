export { PlaywrightDriver, type PlaywrightDriverOptions } from './playwright-driver.js';
export { extractGlyphs, extractLinks } from './glyph-scanner.js';
export { collectPageGlyphs, collectPageLinks, type PageLinks } from './page-scripts.js';
