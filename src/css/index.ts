export { analyzeStatic, extractCssFromHtml, parseFontFamilyRules } from './static-analyzer.js';
export { collectCharsPerFamily, findFontFamily, DEFAULT_FAMILY } from './cascade-resolver.js';
export { parseCssBlocks, parseDeclarations, type CssDeclaration } from './css-blocks.js';
export { collectCustomProperties, resolveVariables } from './css-variables.js';
export { extractFontFamilyRules, parseFontFaces, parseFontSrc, primaryFamily } from './font-rules.js';
