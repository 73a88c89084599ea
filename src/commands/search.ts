import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { formatAsIds, formatSearchResults, normalizeFormat, searchTracks } from "../pipeline";
import { createPlexClient, type TrackRecord } from "../services";

type SearchOptions = {
  limit?: number;
  format?: string;
};

function normalizeLimit(value: number | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return 50;
  }
  return Math.floor(value);
}

export function formatSearchAsJson(query: string, tracks: TrackRecord[]): string {
  return JSON.stringify({ query, count: tracks.length, tracks }, null, 2);
}

export async function runSearch(query: string, options: SearchOptions): Promise<void> {
  const format = normalizeFormat(options.format, "text");
  const config = loadConfig();
  const plex = createPlexClient(config);
  const tracks = searchTracks(
    await plex.listTracks(config.plex.music_library),
    query,
    normalizeLimit(options.limit)
  );

  if (format === "json") {
    console.log(formatSearchAsJson(query, tracks));
    return;
  }

  if (format === "ids") {
    const output = formatAsIds(tracks);
    if (output.length > 0) {
      console.log(output);
    }
    return;
  }

  console.log(formatSearchResults(query, tracks));
}

export function registerSearchCommand(program: Command): void {
  program
    .command("search")
    .description("Find library tracks by artist, title or album (e.g. to pick a seed)")
    .argument("<query>", "Words to look for")
    .option(
      "--limit <count>",
      "Limit results (default: 50)",
      (value) => Number.parseInt(value, 10),
      50
    )
    .option("--format <format>", "Output format (text|json|ids)", "text")
    .action(async (query: string, options: SearchOptions) => {
      await runSearch(query, options);
    });
}
