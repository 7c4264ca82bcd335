/**
 * Keep the last two parts of a dotted name ("catalog.db.t" → "db.t").
 */
export const lastTwoParts = (parts: readonly string[]): string =>
  parts.slice(-2).join(".");

/**
 * Deduplicate names, keeping the first occurrence.
 * Comparison is case-insensitive since identifiers are folded later anyway.
 */
export const uniqueNames = (names: Iterable<string>): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const name of names) {
    const key = name.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(name);
    }
  }
  return result;
};
