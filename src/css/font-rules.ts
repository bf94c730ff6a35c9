import type { CssBlock, CssVariableTable, FontFaceDeclaration, FontFamilyRule } from '../types/css.js';
import { parseDeclarations, splitTopLevel, stripQuotes } from './css-blocks.js';
import { resolveVariables } from './css-variables.js';

/** Primary family of a `font-family` value: first stack entry, unquoted. */
export function primaryFamily(value: string): string {
  const [first] = splitTopLevel(value, ',');
  return stripQuotes(first);
}

/**
 * Rules that set `font-family`, in source order. The `font` shorthand is not
 * read. Within one block the last `font-family` declaration counts.
 */
export function extractFontFamilyRules(blocks: CssBlock[], variables: CssVariableTable): FontFamilyRule[] {
  const rules: FontFamilyRule[] = [];

  for (const block of blocks) {
    const selector = block.selector;
    if (!selector || selector.startsWith('@')) continue;

    let family: string | undefined;
    for (const { property, value } of parseDeclarations(block.body)) {
      if (property === 'font-family') {
        family = primaryFamily(resolveVariables(value, variables));
      }
    }

    if (family) rules.push({ selector, family });
  }

  return rules;
}

/** First `url(...)` of a `src` descriptor, unquoted. */
export function parseFontSrc(value: string): string | undefined {
  const start = value.indexOf('url(');
  if (start < 0) return undefined;

  const end = value.indexOf(')', start + 4);
  if (end < 0) return undefined;

  const url = stripQuotes(value.slice(start + 4, end));
  return url || undefined;
}

function parseFontFaceBlock(body: string, variables: CssVariableTable): FontFaceDeclaration | null {
  let family: string | undefined;
  let src: string | undefined;
  let weight: string | undefined;
  let style: string | undefined;

  for (const { property, value } of parseDeclarations(body)) {
    switch (property) {
      case 'font-family':
        family = primaryFamily(resolveVariables(value, variables)) || undefined;
        break;
      case 'src':
        src = parseFontSrc(value);
        break;
      case 'font-weight':
        weight = value || undefined;
        break;
      case 'font-style':
        style = value || undefined;
        break;
    }
  }

  if (!family || !src) return null;

  const face: FontFaceDeclaration = { family, src };
  if (weight !== undefined) face.weight = weight;
  if (style !== undefined) face.style = style;
  return face;
}

/** `@font-face` blocks that name both a family and a `url()` source. */
export function parseFontFaces(blocks: CssBlock[], variables: CssVariableTable): FontFaceDeclaration[] {
  const faces: FontFaceDeclaration[] = [];
  for (const block of blocks) {
    if (block.selector.toLowerCase() !== '@font-face') continue;
    const face = parseFontFaceBlock(block.body, variables);
    if (face) faces.push(face);
  }
  return faces;
}
