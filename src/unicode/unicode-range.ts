function formatToken(start: number, end: number): string {
  const head = `U+${start.toString(16).toUpperCase()}`;
  return start === end ? head : `${head}-${end.toString(16).toUpperCase()}`;
}

/**
 * Encodes codepoints as a CSS `unicode-range` value, e.g. `U+20,U+41-43`.
 * Input order and duplicates do not matter.
 */
export function encodeUnicodeRange(codepoints: Iterable<number>): string {
  const sorted = Array.from(new Set(codepoints)).sort((a, b) => a - b);
  if (sorted.length === 0) return '';

  const tokens: string[] = [];
  let start = sorted[0];
  let end = sorted[0];

  for (let i = 1; i < sorted.length; i++) {
    const cp = sorted[i];
    if (cp === end + 1) {
      end = cp;
      continue;
    }
    tokens.push(formatToken(start, end));
    start = cp;
    end = cp;
  }
  tokens.push(formatToken(start, end));

  return tokens.join(',');
}

const TOKEN_RE = /^U\+([0-9A-F?]{1,6})(?:-([0-9A-F]{1,6}))?$/i;

/**
 * Expands a `unicode-range` value back into sorted, unique codepoints.
 * Wildcard tokens (`U+4??`) cover their whole span; tokens that do not
 * parse are skipped.
 */
export function parseUnicodeRange(value: string): number[] {
  const out = new Set<number>();

  for (const raw of value.split(',')) {
    const m = raw.trim().match(TOKEN_RE);
    if (!m) continue;

    const [, first, last] = m;
    let start: number;
    let end: number;

    if (first.includes('?')) {
      if (last !== undefined || !/^[0-9A-F]*\?+$/i.test(first)) continue;
      start = parseInt(first.replace(/\?/g, '0'), 16);
      end = parseInt(first.replace(/\?/g, 'F'), 16);
    } else {
      start = parseInt(first, 16);
      end = last !== undefined ? parseInt(last, 16) : start;
    }

    if (end < start) continue;
    for (let cp = start; cp <= end; cp++) out.add(cp);
  }

  return Array.from(out).sort((a, b) => a - b);
}
