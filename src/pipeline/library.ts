import { normalizeKey } from "../lib/similarity";
import type { TrackRecord } from "../services/types";
import { decadeOf } from "./filters";

export interface NamedCount {
  name: string;
  count: number;
}

/**
 * Compact aggregate of a library. This, never the raw track list, is what
 * the analysis call sees.
 */
export interface LibrarySummary {
  trackCount: number;
  genres: NamedCount[];
  decades: NamedCount[];
  yearRange: { min: number; max: number } | null;
}

export const SUMMARY_GENRE_LIMIT = 150;

function countsToList(counts: Map<string, number>): NamedCount[] {
  return [...counts.entries()].map(([name, count]) => ({ name, count }));
}

export function summarizeLibrary(
  tracks: TrackRecord[],
  genreLimit: number = SUMMARY_GENRE_LIMIT
): LibrarySummary {
  const genreCounts = new Map<string, number>();
  const decadeCounts = new Map<number, number>();
  let min: number | null = null;
  let max: number | null = null;

  for (const track of tracks) {
    for (const genre of new Set(track.genres)) {
      genreCounts.set(genre, (genreCounts.get(genre) ?? 0) + 1);
    }
    if (track.year != null) {
      const decade = decadeOf(track.year);
      decadeCounts.set(decade, (decadeCounts.get(decade) ?? 0) + 1);
      min = min === null ? track.year : Math.min(min, track.year);
      max = max === null ? track.year : Math.max(max, track.year);
    }
  }

  const genres = countsToList(genreCounts)
    .sort((a, b) => b.count - a.count || a.name.localeCompare(b.name))
    .slice(0, genreLimit);

  const decades = [...decadeCounts.entries()]
    .sort(([a], [b]) => a - b)
    .map(([decade, count]) => ({ name: `${decade}s`, count }));

  return {
    trackCount: tracks.length,
    genres,
    decades,
    yearRange: min !== null && max !== null ? { min, max } : null,
  };
}

export function formatLibrarySummary(summary: LibrarySummary): string {
  const years = summary.yearRange
    ? `, released ${summary.yearRange.min}-${summary.yearRange.max}`
    : "";
  const genres = summary.genres.map((genre) => `${genre.name} (${genre.count})`).join(", ");
  const decades = summary.decades.map((decade) => `${decade.name} (${decade.count})`).join(", ");
  return [
    `Library: ${summary.trackCount} tracks${years}`,
    `Genres: ${genres || "none tagged"}`,
    `Decades: ${decades || "unknown"}`,
  ].join("\n");
}

/**
 * Every query word must appear in the track's artist, title or album.
 */
export function searchTracks(
  tracks: TrackRecord[],
  query: string,
  limit?: number
): TrackRecord[] {
  const words = normalizeKey(query).split(" ").filter((word) => word.length > 0);
  if (words.length === 0) return [];

  const matches = tracks.filter((track) => {
    const haystack = normalizeKey(`${track.artist} ${track.title} ${track.album}`);
    return words.every((word) => haystack.includes(word));
  });
  return limit != null && limit > 0 ? matches.slice(0, limit) : matches;
}
