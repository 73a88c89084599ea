import type { TrackRecord } from "../services/types";
import type { Analysis } from "./analyzer";
import type { LibrarySummary } from "./library";
import type { FilterSpec, Playlist } from "./types";

export type OutputFormat = "json" | "text" | "ids";

export function normalizeFormat(value: string | undefined, fallback: OutputFormat = "text"): OutputFormat {
  const normalized = (value ?? fallback).toLowerCase();
  if (normalized === "json" || normalized === "text" || normalized === "ids") {
    return normalized;
  }
  throw new Error("Unsupported format. Use json, text, or ids.");
}

function formatLabel(value: string | null | undefined): string {
  if (!value) return "Unknown";
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : "Unknown";
}

export function formatDuration(seconds: number): string {
  if (!seconds || seconds <= 0) return "?:??";
  return `${Math.floor(seconds / 60)}:${String(seconds % 60).padStart(2, "0")}`;
}

export function formatTrackList(tracks: TrackRecord[]): string[] {
  return tracks.map((track, index) => {
    const artist = formatLabel(track.artist);
    const album = formatLabel(track.album);
    const year = track.year != null ? String(track.year) : "Unknown";
    const rating = track.rating != null ? ` ★${track.rating}` : "";
    const genres = track.genres.length > 0 ? ` {${track.genres.slice(0, 3).join(", ")}}` : "";
    return `  ${index + 1}. ${track.title} - ${artist} (${album}, ${year}) [${formatDuration(track.duration)}]${rating}${genres}`;
  });
}

export function describeFilters(spec: FilterSpec): string {
  const parts: string[] = [];
  if (spec.genres && spec.genres.length > 0) parts.push(`genres: ${spec.genres.join(", ")}`);
  if (spec.decades) {
    parts.push(
      spec.decades.from === spec.decades.to
        ? `decade: ${spec.decades.from}s`
        : `decades: ${spec.decades.from}s-${spec.decades.to}s`
    );
  }
  if (spec.minRating != null && spec.minRating > 0) parts.push(`min rating: ${spec.minRating}`);
  const excluded = [...(spec.exclude?.ids ?? []), ...(spec.exclude?.substrings ?? [])];
  if (excluded.length > 0) parts.push(`excluding: ${excluded.join(", ")}`);
  return parts.length > 0 ? parts.join("; ") : "none";
}

function formatCost(cost: number | null): string {
  return cost === null ? "unknown" : `$${cost.toFixed(4)}`;
}

export function formatPlaylistAsText(playlist: Playlist): string {
  const { metadata } = playlist;
  const lines = [
    `Generated ${playlist.tracks.length} tracks from ${metadata.sentToModel} candidates` +
      (metadata.sampled ? ` (sampled from ${metadata.candidateCount})` : "") +
      ".",
    ...formatTrackList(playlist.tracks),
    `Filters: ${describeFilters(metadata.filters)}`,
    `Tokens: ${metadata.tokenUsage.totalTokens} (${metadata.tokenUsage.inputTokens} in, ${metadata.tokenUsage.outputTokens} out), est. cost ${formatCost(metadata.estimatedCost)}`,
  ];
  if (metadata.analysis === "degraded") {
    lines.push("Note: prompt analysis was not fully readable; filters may be incomplete.");
  }
  if (metadata.selections === "degraded") {
    lines.push("Note: track selections were not a JSON list; read one per line.");
  }
  if (metadata.droppedLive > 0) {
    lines.push(`Dropped ${metadata.droppedLive} live recordings after matching.`);
  }
  if (metadata.unmatchedCount > 0) {
    lines.push(`Unmatched (${metadata.unmatchedCount}):`);
    for (const identification of metadata.unmatched) {
      lines.push(`  - ${identification}`);
    }
  }
  return lines.join("\n");
}

export function formatPlaylistAsJson(playlist: Playlist): string {
  const output = {
    count: playlist.tracks.length,
    tracks: playlist.tracks.map((track) => ({
      id: track.id,
      title: track.title,
      artist: formatLabel(track.artist),
      album: track.album,
      year: track.year,
      rating: track.rating,
      duration: track.duration,
      genres: track.genres.length > 0 ? track.genres : undefined,
    })),
    metadata: playlist.metadata,
  };
  return JSON.stringify(output, null, 2);
}

export function formatAsIds(tracks: TrackRecord[]): string {
  return tracks.map((track) => track.id).join("\n");
}

export function formatSearchResults(query: string, tracks: TrackRecord[]): string {
  if (tracks.length === 0) {
    return `Found 0 tracks for "${query}".`;
  }
  return [`Found ${tracks.length} tracks for "${query}".`, ...tracks.map((track, index) =>
    `  ${index + 1}. [${track.id}] ${formatLabel(track.artist)} - ${track.title} (${formatLabel(track.album)}, ${track.year ?? "Unknown"})`
  )].join("\n");
}

export function formatSummaryAsText(summary: LibrarySummary): string {
  const lines = [`${summary.trackCount} tracks`];
  if (summary.yearRange) {
    lines.push(`Years: ${summary.yearRange.min}-${summary.yearRange.max}`);
  }
  lines.push("Decades:");
  for (const decade of summary.decades) lines.push(`  ${decade.name}: ${decade.count}`);
  lines.push("Genres:");
  for (const genre of summary.genres) lines.push(`  ${genre.name}: ${genre.count}`);
  return lines.join("\n");
}

export function formatAnalysisAsText(analysis: Analysis): string {
  const lines = [`Suggested filters: ${describeFilters(analysis.filters)}`];
  if (analysis.hints.reasoning) lines.push(`Reasoning: ${analysis.hints.reasoning}`);
  if (analysis.hints.dimensions.length > 0) {
    lines.push("Dimensions:");
    for (const dimension of analysis.hints.dimensions) {
      const description = dimension.description ? ` (${dimension.description})` : "";
      lines.push(`  ${dimension.id}: ${dimension.label}${description}`);
    }
  }
  if (analysis.status === "degraded") {
    lines.push("Note: the analysis reply was not fully readable; filters may be incomplete.");
  }
  lines.push(`Tokens: ${analysis.usage.totalTokens}`);
  return lines.join("\n");
}
