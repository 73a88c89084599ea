import { Command } from "commander";
import { loadConfig, modelSettings, type AppConfig } from "../lib/config";
import { log } from "../lib/logger";
import {
  decadeRangeFrom,
  formatAsIds,
  formatPlaylistAsJson,
  formatPlaylistAsText,
  normalizeFormat,
  runGeneration,
  type FilterSpec,
  type GenerationRequest,
} from "../pipeline";
import { createLlmClient } from "../providers";
import { createPlexClient } from "../services";

export type GenerateOptions = {
  seed?: string;
  dimensions?: string;
  notes?: string;
  genres?: string;
  decades?: string;
  minRating?: number;
  count?: number;
  smart?: boolean;
  includeLive?: boolean;
  maxTracks?: number;
  sampleSeed?: number;
  format?: string;
  save?: string;
};

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function positiveInt(value: number | undefined, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.floor(value);
}

/**
 * Filters given on the command line. Undefined when none were given, in
 * which case the analysis model suggests them.
 */
export function filtersFromOptions(options: GenerateOptions): FilterSpec | undefined {
  const genres = parseList(options.genres);
  const decadeValues = parseList(options.decades);
  const decades = decadeRangeFrom(decadeValues);
  if (decadeValues.length > 0 && !decades) {
    throw new Error("Could not read --decades. Use values like 1980s,1990s.");
  }

  const spec: FilterSpec = {};
  if (genres.length > 0) spec.genres = genres;
  if (decades) spec.decades = decades;
  if (options.minRating != null && Number.isFinite(options.minRating) && options.minRating > 0) {
    spec.minRating = options.minRating;
  }
  return Object.keys(spec).length > 0 ? spec : undefined;
}

export function buildGenerationRequest(
  prompt: string | undefined,
  options: GenerateOptions,
  config: AppConfig
): GenerationRequest {
  const trimmedPrompt = prompt?.trim() || undefined;
  const seedTrackId = options.seed?.trim() || undefined;
  if (!trimmedPrompt && !seedTrackId) {
    throw new Error("Provide a prompt or --seed <track id>.");
  }

  const dimensions = parseList(options.dimensions);
  return {
    prompt: trimmedPrompt,
    seedTrackId,
    trackCount: positiveInt(options.count, config.defaults.track_count),
    smartGeneration: options.smart ?? config.llm.smart_generation,
    filters: filtersFromOptions(options),
    excludeLive: options.includeLive ? false : config.defaults.exclude_live,
    minRating: config.defaults.min_rating,
    maxTracksToAi:
      options.maxTracks != null && Number.isFinite(options.maxTracks) && options.maxTracks >= 0
        ? Math.floor(options.maxTracks)
        : config.defaults.max_tracks_to_ai,
    additionalNotes: options.notes?.trim() || undefined,
    dimensions: dimensions.length > 0 ? dimensions : undefined,
    sampleSeed:
      options.sampleSeed != null && Number.isFinite(options.sampleSeed)
        ? options.sampleSeed
        : undefined,
  };
}

export async function runGenerate(
  prompt: string | undefined,
  options: GenerateOptions
): Promise<void> {
  const format = normalizeFormat(options.format, "text");
  const config = loadConfig();
  const request = buildGenerationRequest(prompt, options, config);
  const plex = createPlexClient(config);
  const llm = createLlmClient(config);

  const playlist = await runGeneration(request, {
    repository: plex,
    llm,
    models: modelSettings(config),
    libraryName: config.plex.music_library,
    contextLimit: config.llm.context_limit,
  });

  if (format === "json") {
    console.log(formatPlaylistAsJson(playlist));
  } else if (format === "ids") {
    const output = formatAsIds(playlist.tracks);
    if (output.length > 0) console.log(output);
  } else {
    console.log(formatPlaylistAsText(playlist));
  }

  if (options.save) {
    const handle = await plex.savePlaylist(
      options.save,
      playlist.tracks.map((track) => track.id)
    );
    log(`[save] Created playlist "${handle.title}" (${handle.trackCount} tracks, id ${handle.id})`);
  }
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate")
    .description("Generate a playlist from a prompt or a seed track")
    .argument("[prompt]", "What the playlist should feel like")
    .option("--seed <id>", "Seed track id (see `search`)")
    .option("--dimensions <labels>", "Comma-separated seed dimensions to explore")
    .option("--notes <text>", "Additional preferences")
    .option("--genres <genres>", "Comma-separated genres (skips prompt analysis)")
    .option("--decades <decades>", "Comma-separated decades, e.g. 1980s,1990s")
    .option("--min-rating <value>", "Minimum track rating (0-10)", parseFloat)
    .option("--count <count>", "Number of tracks", (value) => Number.parseInt(value, 10))
    .option("--smart", "Use the analysis model for generation too")
    .option("--include-live", "Keep live recordings")
    .option(
      "--max-tracks <count>",
      "Max tracks sent to the model (0 = context window only)",
      (value) => Number.parseInt(value, 10)
    )
    .option("--sample-seed <seed>", "Seed for candidate sampling", (value) =>
      Number.parseInt(value, 10)
    )
    .option("--format <format>", "Output format (text|json|ids)", "text")
    .option("--save <name>", "Save the result to Plex under this name")
    .action(async (prompt: string | undefined, options: GenerateOptions) => {
      await runGenerate(prompt, options);
    });
}
