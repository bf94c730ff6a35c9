import type { CssBlock } from '../types/css.js';

export interface CssDeclaration {
  property: string;
  value: string;
}

/**
 * Splits a stylesheet into flat blocks. Nested blocks (rules inside `@media`,
 * `@supports`, CSS nesting) come out as blocks of their own, with no trace of
 * the at-rule around them. Comments are dropped, quoted strings are kept
 * verbatim, and blocks left unclosed at the end of input are discarded.
 */
export function parseCssBlocks(css: string): CssBlock[] {
  const blocks: CssBlock[] = [];
  const open: CssBlock[] = [];
  let buf = '';
  let quote: string | null = null;

  for (let i = 0; i < css.length; i++) {
    const c = css[i];

    if (quote) {
      buf += c;
      if (c === '\\' && i + 1 < css.length) {
        buf += css[++i];
      } else if (c === quote) {
        quote = null;
      }
      continue;
    }

    if (c === '/' && css[i + 1] === '*') {
      const end = css.indexOf('*/', i + 2);
      i = end < 0 ? css.length : end + 1;
      continue;
    }

    if (c === '"' || c === "'") {
      quote = c;
      buf += c;
      continue;
    }

    if (c === '{') {
      open.push({ selector: buf.trim(), body: '' });
      buf = '';
      continue;
    }

    if (c === '}') {
      const block = open.pop();
      if (block) {
        block.body += buf;
        blocks.push(block);
      }
      buf = '';
      continue;
    }

    buf += c;
    if (c === ';') {
      const top = open[open.length - 1];
      // Top-level statements (`@import ...;`, `@charset ...;`) carry nothing we read.
      if (top) top.body += buf;
      buf = '';
    }
  }

  return blocks;
}

/**
 * Splits a declaration block on `;`, ignoring semicolons inside strings and
 * parentheses (`url(data:...;base64,...)`). Property names are lower-cased
 * except custom properties, whose names are case-sensitive. A trailing
 * `!important` is dropped from the value.
 */
export function parseDeclarations(body: string): CssDeclaration[] {
  const out: CssDeclaration[] = [];

  for (const chunk of splitTopLevel(body, ';')) {
    const colon = chunk.indexOf(':');
    if (colon <= 0) continue;

    const rawName = chunk.slice(0, colon).trim();
    if (!rawName) continue;
    const property = rawName.startsWith('--') ? rawName : rawName.toLowerCase();
    const value = chunk
      .slice(colon + 1)
      .replace(/!\s*important\s*$/i, '')
      .trim();

    out.push({ property, value });
  }

  return out;
}

/** Splits `text` on `separator` where it is outside quotes and parentheses. */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (quote) {
      if (c === '\\') i++;
      else if (c === quote) quote = null;
      continue;
    }
    if (c === '"' || c === "'") quote = c;
    else if (c === '(') depth++;
    else if (c === ')') depth = Math.max(0, depth - 1);
    else if (c === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));

  return parts;
}

export function stripQuotes(value: string): string {
  return value.trim().replace(/^["']+|["']+$/g, '').trim();
}
