import type { TrackRecord } from "../services/types";
import type { CandidateSet, DecadeRange, FilterSpec } from "./types";

export function dedupeTracks(tracks: TrackRecord[]): CandidateSet {
  const seen = new Set<string>();
  const unique: TrackRecord[] = [];
  for (const track of tracks) {
    if (seen.has(track.id)) continue;
    seen.add(track.id);
    unique.push(track);
  }
  return unique;
}

export function decadeOf(year: number): number {
  return Math.floor(year / 10) * 10;
}

/**
 * "1990s", "90s", "1990" and "'90s" all become 1990. Two-digit decades
 * below 30 are read as 2000s ("10s" → 2010).
 */
export function parseDecade(value: string): number | null {
  const match = value.trim().match(/^'?(\d{2}|\d{4})'?s?$/i);
  if (!match?.[1]) return null;
  const digits = Number.parseInt(match[1], 10);
  if (match[1].length === 4) return decadeOf(digits);
  return decadeOf(digits < 30 ? 2000 + digits : 1900 + digits);
}

export function decadeRangeFrom(values: string[]): DecadeRange | undefined {
  const decades = values
    .map(parseDecade)
    .filter((decade): decade is number => decade !== null);
  if (decades.length === 0) return undefined;
  return { from: Math.min(...decades), to: Math.max(...decades) };
}

export function hasActiveFilters(spec: FilterSpec): boolean {
  return (
    (spec.genres?.length ?? 0) > 0 ||
    spec.decades != null ||
    (spec.minRating ?? 0) > 0 ||
    (spec.exclude?.ids?.length ?? 0) > 0 ||
    (spec.exclude?.substrings?.length ?? 0) > 0
  );
}

/**
 * AND across constraint types, OR within the genre list.
 * Input order is preserved; nothing is resorted.
 */
export function applyFilters(tracks: TrackRecord[], spec: FilterSpec): CandidateSet {
  const genres = new Set((spec.genres ?? []).map((genre) => genre.trim().toLowerCase()));
  const excludedIds = new Set(spec.exclude?.ids ?? []);
  const excludedSubstrings = (spec.exclude?.substrings ?? [])
    .map((value) => value.trim().toLowerCase())
    .filter((value) => value.length > 0);
  const minRating = spec.minRating ?? 0;
  const decades = spec.decades;

  return tracks.filter((track) => {
    if (genres.size > 0) {
      if (!track.genres.some((genre) => genres.has(genre.trim().toLowerCase()))) return false;
    }
    if (decades) {
      // Unknown year never satisfies a decade constraint
      if (track.year == null) return false;
      const decade = decadeOf(track.year);
      if (decade < decades.from || decade > decades.to) return false;
    }
    if (minRating > 0) {
      if (track.rating == null || track.rating < minRating) return false;
    }
    if (excludedIds.has(track.id)) return false;
    if (excludedSubstrings.length > 0) {
      const title = track.title.toLowerCase();
      const album = track.album.toLowerCase();
      if (excludedSubstrings.some((value) => title.includes(value) || album.includes(value))) {
        return false;
      }
    }
    return true;
  });
}
