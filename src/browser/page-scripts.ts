import type { GlyphSetsPayload } from '../types/glyphs.js';

/*
 * Functions in this file are serialised and run inside the page. They must
 * stay self-contained: no imports, no references to module scope.
 */

export interface PageLinks {
  pageUrl: string;
  hrefs: string[];
}

/**
 * Collects the codepoints rendered on the current page, per primary
 * font-family, from text nodes and `::before` / `::after` content.
 * Every codepoint is also filed under `"*"`.
 *
 * `capitalize` and `small-caps` contribute both the lower- and upper-case
 * forms of the text, since which case ends up on screen depends on
 * position and font support.
 */
export function collectPageGlyphs(): GlyphSetsPayload {
  const sets = new Map<string, Set<number>>();
  const skipped = 'script, style, noscript';

  const add = (family: string, cp: number) => {
    let set = sets.get(family);
    if (!set) {
      set = new Set<number>();
      sets.set(family, set);
    }
    set.add(cp);
  };

  const saveGlyphs = (text: string, family: string) => {
    for (const ch of text) {
      const cp = ch.codePointAt(0);
      if (cp === undefined || cp === 0) continue;
      add(family || '*', cp);
      add('*', cp);
    }
  };

  const computed = (element: Element, pseudo?: string): CSSStyleDeclaration | null => {
    try {
      return window.getComputedStyle(element, pseudo ?? null);
    } catch {
      return null;
    }
  };

  const getFontFamily = (element: Element, pseudo?: string): string => {
    const family = computed(element, pseudo)?.getPropertyValue('font-family') ?? '';
    const first = family.split(',')[0].trim().replace(/['"]/g, '');
    return first || '*';
  };

  const processText = (input: string, element: Element, family: string) => {
    const style = computed(element);
    const transform = style?.getPropertyValue('text-transform') ?? 'none';
    const variant = style?.getPropertyValue('font-variant') ?? 'normal';
    const caps = style?.getPropertyValue('font-variant-caps') ?? 'normal';
    let text = input;

    if (transform === 'uppercase') {
      text = text.toUpperCase();
    } else if (transform === 'lowercase') {
      text = text.toLowerCase();
    } else if (transform === 'capitalize') {
      saveGlyphs(text.toLowerCase(), family);
      saveGlyphs(text.toUpperCase(), family);
      return;
    }

    if (variant.includes('small-caps') || caps.includes('small-caps')) {
      saveGlyphs(text.toLowerCase(), family);
      saveGlyphs(text.toUpperCase(), family);
      return;
    }

    saveGlyphs(text, family);
  };

  const getPseudoContent = (element: Element, pseudo: string): string => {
    const content = computed(element, pseudo)?.getPropertyValue('content') ?? '';
    if (!content || content === 'none' || content === 'normal') return '';
    if (/^(attr|counter|counters|url)\(/.test(content)) return '';
    return content.replace(/^["']|["']$/g, '');
  };

  const root = document.documentElement;
  if (!root) return {};

  const walker = document.createTreeWalker(root, NodeFilter.SHOW_TEXT);
  for (let node = walker.nextNode(); node; node = walker.nextNode()) {
    const parent = node.parentElement;
    const text = node.nodeValue ?? '';
    if (!parent || !text.trim()) continue;
    if (parent.closest(skipped)) continue;
    processText(text, parent, getFontFamily(parent));
  }

  for (const element of Array.from(document.querySelectorAll('*'))) {
    if (element.closest(skipped)) continue;
    for (const pseudo of ['::before', '::after']) {
      const content = getPseudoContent(element, pseudo);
      if (content) processText(content, element, getFontFamily(element, pseudo));
    }
  }

  const out: GlyphSetsPayload = {};
  for (const [family, set] of sets) out[family] = Array.from(set);
  return out;
}

/** Resolved `href` of every anchor on the page, plus the page's own URL. */
export function collectPageLinks(): PageLinks {
  const hrefs: string[] = [];
  for (const anchor of Array.from(document.querySelectorAll<HTMLAnchorElement>('a[href]'))) {
    if (anchor.href) hrefs.push(anchor.href);
  }
  return { pageUrl: window.location.href, hrefs };
}
