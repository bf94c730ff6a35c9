import type { FontFamilyRule } from '../types/css.js';
import type { FamilyCodepoints } from '../types/glyphs.js';

export const DEFAULT_FAMILY = 'sans-serif';

/** Elements whose text never reaches the screen as glyphs. */
const UNRENDERED_SELECTOR = 'script, style, noscript, template';

const TEXT_NODE = 3;

/** Selectors the selector engine rejects simply never match. */
function safeMatches(element: Element, selector: string): boolean {
  try {
    return element.matches(selector);
  } catch {
    return false;
  }
}

/** Family of the last rule matching `element`, in source order. */
function lastMatchingFamily(element: Element, rules: FontFamilyRule[]): string | undefined {
  let family: string | undefined;
  for (const rule of rules) {
    if (safeMatches(element, rule.selector)) family = rule.family;
  }
  return family;
}

/**
 * Simplified cascade: the last matching rule wins (source order stands in
 * for specificity). Without a direct match, ancestors are tried outward and
 * the first one with any match decides.
 */
export function findFontFamily(element: Element, rules: FontFamilyRule[]): string | undefined {
  for (let current: Element | null = element; current; current = current.parentElement) {
    const family = lastMatchingFamily(current, rules);
    if (family !== undefined) return family;
  }
  return undefined;
}

/** Text of the element's own text-node children, descendants excluded. */
export function directText(element: Element): string {
  let text = '';
  for (const node of Array.from(element.childNodes)) {
    if (node.nodeType === TEXT_NODE) text += node.textContent ?? '';
  }
  return text;
}

/**
 * Walks every element in document order and files the characters of its
 * own text under the family the simplified cascade assigns to it.
 */
export function collectCharsPerFamily(document: Document, rules: FontFamilyRule[]): FamilyCodepoints {
  const result: FamilyCodepoints = new Map();

  for (const element of Array.from(document.querySelectorAll('*'))) {
    if (element.closest(UNRENDERED_SELECTOR)) continue;

    const text = directText(element);
    if (!text.trim()) continue;

    const family = findFontFamily(element, rules) ?? DEFAULT_FAMILY;
    let chars = result.get(family);
    if (!chars) {
      chars = new Set<number>();
      result.set(family, chars);
    }
    for (const ch of text) {
      const cp = ch.codePointAt(0);
      if (cp !== undefined) chars.add(cp);
    }
  }

  return result;
}
