/** Key of the set that collects every codepoint seen, whatever its family. */
export const UNIVERSAL_FAMILY = '*';

export type CodepointSet = Set<number>;

export type FamilyCodepoints = Map<string, CodepointSet>;

/**
 * Plain-object form of a family map, as it crosses the browser boundary:
 * family name -> deduplicated codepoints.
 */
export type GlyphSetsPayload = Record<string, number[]>;
