import { artistVariants } from "../lib/artist";
import { normalizeKey, similarityAtLeast } from "../lib/similarity";
import type { TrackRecord } from "../services/types";
import type { MatchResult } from "./types";

/** Minimum similarity (0-100) for a fuzzy match to count. */
export const MATCH_THRESHOLD = 60;

type KeyedCandidate = {
  track: TrackRecord;
  order: number;
  keys: string[];
  title: string;
  artists: string[];
};

/** One way of reading an identification: who it names and which song. */
type Reading = {
  artists: string[];
  title: string;
};

const SEPARATOR = /\s+[-\u2013\u2014]\s+/;

export type MatchOptions = {
  threshold?: number | undefined;
  /** Ids that must never be returned, e.g. the seed track. */
  excludeIds?: Iterable<string> | undefined;
};

/**
 * Every way an identification could name this track: "artist title" and
 * "title artist", for each spelling of the artist.
 */
export function candidateKeys(track: TrackRecord): string[] {
  const title = normalizeKey(track.title);
  const keys = new Set<string>();
  for (const variant of artistVariants(track.artist)) {
    const artist = normalizeKey(variant);
    if (artist.length === 0) continue;
    keys.add(`${artist} ${title}`);
    keys.add(`${title} ${artist}`);
  }
  if (keys.size === 0) keys.add(title);
  return [...keys];
}

function normalizedArtists(raw: string): string[] {
  const names = artistVariants(raw)
    .map(normalizeKey)
    .filter((name) => name.length > 0);
  return [...new Set(names)];
}

/**
 * Splits "Artist - Title" at every separator and reads each split both
 * ways round, so "Title - Artist" and titles containing " - " still line
 * up. Empty when the identification has no separator.
 */
export function readingsOf(identification: string): Reading[] {
  const parts = identification.split(SEPARATOR);
  const readings: Reading[] = [];
  for (let i = 1; i < parts.length; i++) {
    const left = parts.slice(0, i).join(" - ");
    const right = parts.slice(i).join(" - ");
    const orders: Array<[string, string]> = [
      [left, right],
      [right, left],
    ];
    for (const [artist, title] of orders) {
      const reading = { artists: normalizedArtists(artist), title: normalizeKey(title) };
      if (reading.artists.length > 0 && reading.title.length > 0) readings.push(reading);
    }
  }
  return readings;
}

/**
 * Title and artist must each clear the threshold; the weaker of the two is
 * the score. Null when no reading clears both.
 */
function fieldScore(
  readings: Reading[],
  candidate: KeyedCandidate,
  threshold: number
): number | null {
  let best: number | null = null;
  for (const reading of readings) {
    const titleScore = similarityAtLeast(reading.title, candidate.title, threshold);
    if (titleScore === null) continue;

    let artistScore: number | null = null;
    for (const queried of reading.artists) {
      for (const known of candidate.artists) {
        const score = similarityAtLeast(queried, known, threshold);
        if (score !== null && (artistScore === null || score > artistScore)) artistScore = score;
      }
    }
    if (artistScore === null) continue;

    const score = Math.min(titleScore, artistScore);
    if (best === null || score > best) best = score;
  }
  return best;
}

/** Identifications without a separator: best whole-key score. */
function keyScore(query: string, candidate: KeyedCandidate, threshold: number): number | null {
  let best: number | null = null;
  for (const key of candidate.keys) {
    const score = similarityAtLeast(query, key, threshold);
    if (score !== null && (best === null || score > best)) best = score;
  }
  return best;
}

function ratingOf(track: TrackRecord): number {
  return track.rating ?? -1;
}

/** Higher rating wins, then earlier position in the candidate list. */
function preferred(a: KeyedCandidate, b: KeyedCandidate): KeyedCandidate {
  const ratingA = ratingOf(a.track);
  const ratingB = ratingOf(b.track);
  if (ratingA !== ratingB) return ratingA > ratingB ? a : b;
  return a.order <= b.order ? a : b;
}

/**
 * Resolves each free-text identification to at most one library track.
 * One result per input, in input order. A track used once leaves the pool,
 * so no track is returned twice. Unmatched results score 0.
 */
export function matchTracks(
  identifications: string[],
  candidates: TrackRecord[],
  options: MatchOptions = {}
): MatchResult[] {
  const threshold = options.threshold ?? MATCH_THRESHOLD;
  const used = new Set<string>(options.excludeIds ?? []);

  const keyed: KeyedCandidate[] = candidates.map((track, order) => ({
    track,
    order,
    keys: candidateKeys(track),
    title: normalizeKey(track.title),
    artists: normalizedArtists(track.artist),
  }));

  const exactIndex = new Map<string, KeyedCandidate[]>();
  for (const candidate of keyed) {
    for (const key of candidate.keys) {
      const bucket = exactIndex.get(key);
      if (bucket) bucket.push(candidate);
      else exactIndex.set(key, [candidate]);
    }
  }

  return identifications.map((identification): MatchResult => {
    const query = normalizeKey(identification);
    if (query.length === 0) {
      return { identification, track: null, score: 0, method: "unmatched" };
    }

    let exact: KeyedCandidate | null = null;
    for (const candidate of exactIndex.get(query) ?? []) {
      if (used.has(candidate.track.id)) continue;
      exact = exact ? preferred(exact, candidate) : candidate;
    }
    if (exact) {
      used.add(exact.track.id);
      return { identification, track: exact.track, score: 100, method: "exact" };
    }

    const readings = readingsOf(identification);
    let best: KeyedCandidate | null = null;
    let bestScore = -1;
    for (const candidate of keyed) {
      if (used.has(candidate.track.id)) continue;
      const score =
        readings.length > 0
          ? fieldScore(readings, candidate, threshold)
          : keyScore(query, candidate, threshold);
      if (score === null) continue;
      if (score > bestScore) {
        best = candidate;
        bestScore = score;
      } else if (score === bestScore && best) {
        best = preferred(best, candidate);
      }
    }

    if (!best) {
      return { identification, track: null, score: 0, method: "unmatched" };
    }

    used.add(best.track.id);
    return { identification, track: best.track, score: bestScore, method: "fuzzy" };
  });
}

export function matchedTracks(results: MatchResult[]): TrackRecord[] {
  return results.flatMap((result) => (result.track ? [result.track] : []));
}

export function unmatchedIdentifications(results: MatchResult[]): string[] {
  return results.filter((result) => result.track === null).map((result) => result.identification);
}
