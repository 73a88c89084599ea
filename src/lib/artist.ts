/**
 * Normalize artist names for library matching.
 * Strips featured/collaborative artist suffixes so we match the primary artist.
 *
 * "Daft Punk feat. Pharrell Williams"           → "Daft Punk"
 * "KAYTRANADA, H.E.R."                          → "KAYTRANADA"
 * "Tyler, The Creator"                           → "Tyler, The Creator"
 * "Silk Sonic (Bruno Mars & Anderson .Paak)"     → "Silk Sonic"
 * "Iron & Wine"                                  → "Iron & Wine" (kept — & is ambiguous)
 */
export function normalizeArtistName(raw: string): string {
  let name = raw;

  // 1. Strip parenthetical suffixes: "Silk Sonic (Bruno Mars & Anderson .Paak)" → "Silk Sonic"
  name = name.replace(/\s*\(.*\)\s*$/, "");

  // 2. Strip feat./ft./featuring/with — unambiguous collab markers
  name = name.replace(/\s+(?:feat\.?|ft\.?|featuring|with)\s+.*/i, "");

  // 3. Split on comma, but preserve band name continuations like "Tyler, The Creator"
  const commaIdx = name.indexOf(",");
  if (commaIdx > 0) {
    const after = name.slice(commaIdx + 1).trim();
    const bandContinuations =
      /^(?:the|a|an|los|la|le|les|das|die|der|his|her|jr|sr)\b/i;
    if (!bandContinuations.test(after)) {
      name = name.slice(0, commaIdx);
    }
  }

  // NOTE: We intentionally do NOT split on "&" or "x".
  // "&" is too ambiguous — "Iron & Wine", "Simon & Garfunkel", "Above & Beyond"
  // are all single acts, not collabs. The feat./ft. pattern catches real collabs.

  return name.trim();
}

/**
 * Spellings an LLM (or a tagger) might use for the same act:
 * the name as given, the primary artist only, and both without a leading "The".
 *
 * "The Cure"                        → ["The Cure", "Cure"]
 * "Daft Punk feat. Pharrell"        → ["Daft Punk feat. Pharrell", "Daft Punk"]
 */
export function artistVariants(raw: string): string[] {
  const trimmed = raw.trim();
  const variants = [trimmed, normalizeArtistName(trimmed)];
  for (const name of [...variants]) {
    const withoutArticle = name.replace(/^the\s+/i, "");
    if (withoutArticle.length > 0) variants.push(withoutArticle);
  }
  return [...new Set(variants.filter((name) => name.length > 0))];
}
