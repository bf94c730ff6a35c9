import type { CodepointSet, FamilyCodepoints, GlyphSetsPayload } from '../types/glyphs.js';
import { UNIVERSAL_FAMILY } from '../types/glyphs.js';

export type GlyphSetsInput = FamilyCodepoints | GlyphSetsPayload;

function entriesOf(input: GlyphSetsInput): Iterable<[string, Iterable<number>]> {
  return input instanceof Map ? input.entries() : Object.entries(input);
}

function sortedSet(values: Iterable<number>): CodepointSet {
  return new Set(Array.from(values).sort((a, b) => a - b));
}

function parseFamilyFilter(filter: string | undefined): string[] {
  if (!filter) return [];
  return filter
    .split(',')
    .map((f) => f.trim().toLowerCase())
    .filter((f) => f.length > 0);
}

/**
 * Session-wide union of per-family codepoint sets. Keys keep the case they
 * were first seen with; filtering is case-insensitive.
 */
export class GlyphSetAggregator {
  private sets: FamilyCodepoints = new Map();

  constructor(initial?: GlyphSetsInput) {
    if (initial) this.merge(initial);
  }

  get size(): number {
    return this.sets.size;
  }

  families(): string[] {
    return Array.from(this.sets.keys());
  }

  get(family: string): CodepointSet | undefined {
    return this.sets.get(family);
  }

  merge(newSets: GlyphSetsInput): this {
    for (const [family, codepoints] of entriesOf(newSets)) {
      let target = this.sets.get(family);
      for (const cp of codepoints) {
        if (!target) {
          target = new Set<number>();
          this.sets.set(family, target);
        }
        target.add(cp);
      }
    }
    return this;
  }

  /** Adds every character of `text` to the universal set only. */
  addWhitelist(text: string): this {
    if (!text) return this;

    let universal = this.sets.get(UNIVERSAL_FAMILY);
    if (!universal) {
      universal = new Set<number>();
      this.sets.set(UNIVERSAL_FAMILY, universal);
    }
    for (const ch of text) {
      const cp = ch.codePointAt(0);
      if (cp !== undefined) universal.add(cp);
    }
    return this;
  }

  /**
   * With a comma-separated list of family-name fragments, unions every
   * family whose name contains one of them. Without a filter, returns the
   * universal set if there is one, else the union of every family.
   */
  select(filter?: string): CodepointSet {
    const fragments = parseFamilyFilter(filter);
    const out: number[] = [];

    if (fragments.length > 0) {
      for (const [family, codepoints] of this.sets) {
        const lower = family.toLowerCase();
        if (fragments.some((f) => lower.includes(f))) out.push(...codepoints);
      }
      return sortedSet(out);
    }

    const universal = this.sets.get(UNIVERSAL_FAMILY);
    if (universal) return sortedSet(universal);

    for (const codepoints of this.sets.values()) out.push(...codepoints);
    return sortedSet(out);
  }

  toMap(): FamilyCodepoints {
    const copy: FamilyCodepoints = new Map();
    for (const [family, codepoints] of this.sets) copy.set(family, new Set(codepoints));
    return copy;
  }

  toJSON(): GlyphSetsPayload {
    const out: GlyphSetsPayload = {};
    for (const [family, codepoints] of this.sets) {
      out[family] = Array.from(codepoints).sort((a, b) => a - b);
    }
    return out;
  }
}

function asAggregator(aggregate: GlyphSetAggregator | FamilyCodepoints): GlyphSetAggregator {
  return aggregate instanceof GlyphSetAggregator ? aggregate : new GlyphSetAggregator(aggregate);
}

/**
 * Adds whitelist characters to `aggregate`'s universal set. A plain map is
 * updated in place.
 */
export function addWhitelist(aggregate: GlyphSetAggregator | FamilyCodepoints, text: string): void {
  if (aggregate instanceof GlyphSetAggregator) {
    aggregate.addWhitelist(text);
    return;
  }
  const universal = new GlyphSetAggregator().addWhitelist(text).get(UNIVERSAL_FAMILY);
  if (!universal) return;

  const existing = aggregate.get(UNIVERSAL_FAMILY);
  if (existing) {
    for (const cp of universal) existing.add(cp);
  } else {
    aggregate.set(UNIVERSAL_FAMILY, universal);
  }
}

export function select(aggregate: GlyphSetAggregator | FamilyCodepoints, familyFilter?: string): CodepointSet {
  return asAggregator(aggregate).select(familyFilter);
}
