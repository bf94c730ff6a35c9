export * from './types/index.js';
export * from './css/index.js';
export * from './crawl/index.js';
export * from './browser/index.js';
export * from './fonts/index.js';
export { GlyphSetAggregator, addWhitelist, select, type GlyphSetsInput } from './glyphs/glyph-set-aggregator.js';
export { encodeUnicodeRange, parseUnicodeRange } from './unicode/unicode-range.js';
export { ConfigPresets, DEFAULT_CONFIG, resolveConfig, type ConfigPreset } from './config.js';
export {
  FontsiftError,
  NavigationError,
  ScriptEvaluationError,
  FontSubsetError,
  describeError
} from './errors.js';
