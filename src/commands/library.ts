import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { formatSummaryAsText, normalizeFormat, summarizeLibrary } from "../pipeline";
import { createPlexClient } from "../services";

type StatsOptions = {
  format?: string;
};

export async function runLibraries(): Promise<void> {
  const config = loadConfig();
  const libraries = await createPlexClient(config).listMusicLibraries();
  if (libraries.length === 0) {
    console.log("No music libraries found.");
    return;
  }
  for (const library of libraries) {
    const marker = library.name === config.plex.music_library ? " (configured)" : "";
    console.log(`${library.name}${marker}`);
  }
}

export async function runStats(options: StatsOptions): Promise<void> {
  const format = normalizeFormat(options.format, "text");
  if (format === "ids") {
    throw new Error("Unsupported format. Use text or json.");
  }
  const config = loadConfig();
  const tracks = await createPlexClient(config).listTracks(config.plex.music_library);
  const summary = summarizeLibrary(tracks, Number.POSITIVE_INFINITY);

  if (format === "json") {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }
  console.log(formatSummaryAsText(summary));
}

export function registerLibraryCommands(program: Command): void {
  program
    .command("libraries")
    .description("List music libraries on the Plex server")
    .action(async () => {
      await runLibraries();
    });

  program
    .command("stats")
    .description("Summarize the configured library: genres, decades, years")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (options: StatsOptions) => {
      await runStats(options);
    });
}
