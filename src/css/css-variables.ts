import type { CssBlock, CssVariableTable } from '../types/css.js';
import { parseDeclarations, splitTopLevel } from './css-blocks.js';

/** Substitution passes before giving up on self-referencing variables. */
export const MAX_VAR_PASSES = 10;

/**
 * Collects `--name: value` declarations from every block, at-rules
 * included. The table is global: the last declaration of a name wins,
 * regardless of selector.
 */
export function collectCustomProperties(blocks: CssBlock[]): CssVariableTable {
  const table: CssVariableTable = new Map();
  for (const block of blocks) {
    for (const { property, value } of parseDeclarations(block.body)) {
      if (property.startsWith('--')) table.set(property, value);
    }
  }
  return table;
}

/** Index of the `)` closing the `(` at `open`, or -1. */
function findClosingParen(text: string, open: number): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = open; i < text.length; i++) {
    const c = text[i];
    if (quote) {
      if (c === '\\') i++;
      else if (c === quote) quote = null;
      continue;
    }
    if (c === '"' || c === "'") quote = c;
    else if (c === '(') depth++;
    else if (c === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Replaces each outermost `var()` in `value` once. Nested references in
 * fallbacks or in substituted values are left for the next pass.
 */
function substituteOnce(value: string, table: CssVariableTable): string {
  let out = '';
  let cursor = 0;

  for (;;) {
    const start = value.indexOf('var(', cursor);
    if (start < 0) break;

    const open = start + 3;
    const close = findClosingParen(value, open);
    if (close < 0) break;

    const [rawName, ...rest] = splitTopLevel(value.slice(open + 1, close), ',');
    const name = rawName.trim();
    const fallback = rest.length > 0 ? rest.join(',').trim() : undefined;

    out += value.slice(cursor, start) + (table.get(name) ?? fallback ?? '');
    cursor = close + 1;
  }

  return out + value.slice(cursor);
}

/**
 * Resolves `var(name[, fallback])` references against `table`, falling back
 * to the fallback text and then to the empty string. Stops after
 * `MAX_VAR_PASSES` passes and returns whatever text remains, so circular
 * definitions terminate.
 */
export function resolveVariables(value: string, table: CssVariableTable, maxPasses: number = MAX_VAR_PASSES): string {
  let current = value;
  for (let pass = 0; pass < maxPasses; pass++) {
    if (!current.includes('var(')) break;
    const next = substituteOnce(current, table);
    if (next === current) break;
    current = next;
  }
  return current;
}
