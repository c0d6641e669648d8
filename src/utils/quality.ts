/**
 * Quality values and preference ordering for the Accept family of headers
 *
 * @see https://www.rfc-editor.org/rfc/rfc9110.html#section-12.4.2
 */

// qvalue = ( "0" [ "." 0*3DIGIT ] ) / ( "1" [ "." 0*3("0") ] )
const QUALITY_PATTERN = /^(?:0(?:\.\d{0,3})?|1(?:\.0{0,3})?)$/;

/**
 * Parse a qvalue; `null` when it is outside [0, 1] or has more than three
 * decimals
 */
export function parseQuality(raw: string): number | null {
  const trimmed = raw.trim();
  return QUALITY_PATTERN.test(trimmed) ? Number(trimmed) : null;
}

export interface QualityRanked<T> {
  value: T;
  quality: number;
  /** the q parameter was written out rather than defaulted */
  explicit: boolean;
  specificity: number;
  position: number;
}

function isExplicitMaximum(entry: QualityRanked<unknown>): boolean {
  return entry.explicit && entry.quality === 1;
}

/**
 * Preference order: quality, then an explicit `q=1` ahead of an inferred
 * one, then specificity, then input order
 */
export function compareRanked(a: QualityRanked<unknown>, b: QualityRanked<unknown>): number {
  if (a.quality !== b.quality) return b.quality - a.quality;

  const aExplicit = isExplicitMaximum(a);
  if (aExplicit !== isExplicitMaximum(b)) return aExplicit ? -1 : 1;

  if (a.specificity !== b.specificity) return b.specificity - a.specificity;
  return a.position - b.position;
}

export function sortByPreference<T>(entries: readonly QualityRanked<T>[]): T[] {
  return [...entries].sort(compareRanked).map((entry) => entry.value);
}
