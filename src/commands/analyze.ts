import { Command } from "commander";
import { loadConfig, modelSettings } from "../lib/config";
import { SeedNotFoundError } from "../lib/errors";
import {
  analyzeRequest,
  formatAnalysisAsText,
  normalizeFormat,
  summarizeLibrary,
  type Analysis,
  type LibrarySummary,
} from "../pipeline";
import { createLlmClient } from "../providers";
import { createPlexClient } from "../services";

type AnalyzeOptions = {
  seed?: string;
  format?: string;
};

export function formatAnalysisAsJson(analysis: Analysis, summary: LibrarySummary): string {
  return JSON.stringify(
    {
      status: analysis.status,
      suggested: analysis.filters,
      reasoning: analysis.hints.reasoning,
      dimensions: analysis.hints.dimensions,
      available: {
        genres: summary.genres,
        decades: summary.decades,
      },
      tokens: analysis.usage,
      model: analysis.model,
    },
    null,
    2
  );
}

export async function runAnalyze(
  prompt: string | undefined,
  options: AnalyzeOptions
): Promise<void> {
  const format = normalizeFormat(options.format, "text");
  const trimmedPrompt = prompt?.trim() || undefined;
  const seedId = options.seed?.trim() || undefined;
  if (!trimmedPrompt && !seedId) {
    throw new Error("Provide a prompt or --seed <track id>.");
  }

  const config = loadConfig();
  const plex = createPlexClient(config);
  const llm = createLlmClient(config);

  const tracks = await plex.listTracks(config.plex.music_library);
  const seed = seedId ? tracks.find((track) => track.id === seedId) : undefined;
  if (seedId && !seed) {
    throw new SeedNotFoundError(seedId);
  }

  const summary = summarizeLibrary(tracks);
  const analysis = await analyzeRequest({ prompt: trimmedPrompt, seed }, summary, {
    llm,
    models: modelSettings(config),
  });

  if (format === "text") {
    console.log(formatAnalysisAsText(analysis));
    return;
  }
  if (format === "ids") {
    throw new Error("--format ids is not available for analyze. Use text or json.");
  }
  console.log(formatAnalysisAsJson(analysis, summary));
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command("analyze")
    .description("Suggest filters for a prompt, or dimensions for a seed track")
    .argument("[prompt]", "What the playlist should feel like")
    .option("--seed <id>", "Seed track id")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (prompt: string | undefined, options: AnalyzeOptions) => {
      await runAnalyze(prompt, options);
    });
}
