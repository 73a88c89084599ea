import type { TrackRecord } from "../services/types";
import type { CandidateSet } from "./types";

/**
 * Words that mark a live or concert recording. Matched as whole words so
 * "Alive" or "Olive" do not trip the filter.
 */
export const LIVE_MARKERS = ["live", "concert", "unplugged", "bootleg", "soundboard"];

const MARKER_PATTERN = new RegExp(`\\b(?:${LIVE_MARKERS.join("|")})\\b`, "i");
const BRACKETED_GROUP = /[([]([^)\]]*)[)\]]/g;
const YEAR_TOKEN = /\b(19\d{2}|20\d{2})\b/g;

function hasForeignYear(text: string, ownYear: number | null): boolean {
  for (const group of text.matchAll(BRACKETED_GROUP)) {
    const inner = group[1] ?? "";
    if (/remaster/i.test(inner)) continue;
    for (const token of inner.matchAll(YEAR_TOKEN)) {
      if (Number.parseInt(token[0], 10) !== ownYear) return true;
    }
  }
  return false;
}

export function isLiveRecording(track: TrackRecord): boolean {
  for (const text of [track.title, track.album]) {
    if (MARKER_PATTERN.test(text)) return true;
    if (hasForeignYear(text, track.year)) return true;
  }
  return false;
}

/**
 * Drops live recordings. A plain predicate filter, so running it twice
 * yields the same set as running it once. Misses are a known limitation.
 */
export function excludeLive(tracks: TrackRecord[]): CandidateSet {
  return tracks.filter((track) => !isLiveRecording(track));
}
