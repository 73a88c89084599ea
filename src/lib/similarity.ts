/**
 * Folds a title or artist into a comparable key: diacritics stripped,
 * lowercase, "&" read as "and", apostrophes dropped, every other run of
 * punctuation or whitespace collapsed to a single space.
 *
 * "Friday I'm in Love"  → "friday im in love"
 * "Sigur Rós"           → "sigur ros"
 * "Simon & Garfunkel"   → "simon and garfunkel"
 */
export function normalizeKey(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/['\u2019`]/g, "")
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

// Row buffers shared across calls; every call rewrites the cells it reads.
const rowA: number[] = [];
const rowB: number[] = [];

/**
 * Edit distance (insertions, deletions, substitutions), two-row
 * Wagner-Fischer. With `maxDistance`, stops as soon as the distance is
 * known to exceed it and returns `maxDistance + 1`.
 */
export function levenshteinDistance(a: string, b: string, maxDistance = Infinity): number {
  if (a === b) return 0;
  if (Math.abs(a.length - b.length) > maxDistance) return maxDistance + 1;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = rowA;
  let current = rowB;
  for (let j = 0; j <= b.length; j++) previous[j] = j;

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    let rowMin = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      const value = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
      current[j] = value;
      if (value < rowMin) rowMin = value;
    }
    if (rowMin > maxDistance) return maxDistance + 1;
    [previous, current] = [current, previous];
  }

  const distance = previous[b.length] ?? 0;
  return distance > maxDistance ? maxDistance + 1 : distance;
}

/**
 * Similarity from 0 (nothing shared) to 100 (identical), scaled by the
 * longer string: 100 * (1 - distance / maxLength). Inputs are compared as
 * given; normalize them first.
 */
export function similarity(a: string, b: string): number {
  if (a.length === 0 && b.length === 0) return 100;
  const maxLength = Math.max(a.length, b.length);
  return 100 * (1 - levenshteinDistance(a, b) / maxLength);
}

/**
 * `similarity` when it reaches `floor`, otherwise null. Only the edit
 * distance the floor allows is explored, so clear misses return early.
 */
export function similarityAtLeast(a: string, b: string, floor: number): number | null {
  if (a.length === 0 && b.length === 0) return floor <= 100 ? 100 : null;
  const maxLength = Math.max(a.length, b.length);
  const allowed = Math.floor((maxLength * (100 - floor)) / 100);
  if (allowed < 0) return null;
  const distance = levenshteinDistance(a, b, allowed);
  if (distance > allowed) return null;
  return 100 * (1 - distance / maxLength);
}
