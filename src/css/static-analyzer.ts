import { JSDOM } from 'jsdom';
import type { FontFamilyRule, StaticAnalysis } from '../types/css.js';
import { parseCssBlocks } from './css-blocks.js';
import { collectCustomProperties } from './css-variables.js';
import { extractFontFamilyRules, parseFontFaces } from './font-rules.js';
import { collectCharsPerFamily } from './cascade-resolver.js';

function parseHtml(html: string): Document {
  return new JSDOM(html).window.document;
}

/** Text of every `<style>` element, each followed by a newline. */
export function extractCssFromHtml(html: string): string {
  return cssFromDocument(parseHtml(html));
}

function cssFromDocument(document: Document): string {
  let css = '';
  for (const style of Array.from(document.querySelectorAll('style'))) {
    css += `${style.textContent ?? ''}\n`;
  }
  return css;
}

/** `font-family` rules of a stylesheet, variables resolved, in source order. */
export function parseFontFamilyRules(css: string): FontFamilyRule[] {
  const blocks = parseCssBlocks(css);
  return extractFontFamilyRules(blocks, collectCustomProperties(blocks));
}

/**
 * Works out, without a browser, which characters each font-family renders.
 * When `css` is omitted the document's own `<style>` blocks are used.
 */
export function analyzeStatic(html: string, css?: string): StaticAnalysis {
  const document = parseHtml(html);
  const stylesheet = css ?? cssFromDocument(document);

  const blocks = parseCssBlocks(stylesheet);
  const variables = collectCustomProperties(blocks);
  const rules = extractFontFamilyRules(blocks, variables);

  return {
    charsPerFamily: collectCharsPerFamily(document, rules),
    fontFaces: parseFontFaces(blocks, variables)
  };
}
