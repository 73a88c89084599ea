import type { ModelSettings } from "../lib/config";
import { log } from "../lib/logger";
import { withProviderRetry } from "../lib/retry";
import type { LlmClient } from "../services/provider";
import type { TrackRecord } from "../services/types";
import { describeSeed } from "./analyzer";
import { OUTPUT_TOKENS_PER_TRACK } from "./budget";
import { degraded, extractJson, parsed, type ParseResult } from "./parse";
import type { GenerationHints, GenerationRequest, ParseStatus, TokenUsage } from "./types";

export const GENERATION_SYSTEM = `You are a music expert creating a playlist from a user's music library.

You will be given:
1. A description of what the user wants (prompt, seed track dimensions, or both)
2. A numbered list of tracks that are available in their library

Your task is to select tracks that best match the user's request, using only tracks from the list. Return your selections as a JSON array of objects with artist, album, and title.

Guidelines:
- Select tracks that fit the mood, era, style, and other aspects of the request
- Vary the selection - don't pick too many tracks from the same artist or album
- Consider the flow of the playlist - how tracks will sound in sequence
- If using a seed track, don't include the seed track itself in the results

Return ONLY a JSON array like:
[
  {"artist": "Artist Name", "album": "Album Name", "title": "Track Title"},
  ...
]

No markdown formatting, no explanations - just the JSON array.`;

const PROMPT_OVERHEAD_TOKENS = 512;

export type GenerationContext = {
  request: GenerationRequest;
  seedTrack?: TrackRecord | null | undefined;
  hints?: GenerationHints | undefined;
};

export type GeneratorDeps = {
  llm: LlmClient;
  models: ModelSettings;
  retryDelayMs?: number | undefined;
};

export interface GenerationOutput {
  identifications: string[];
  usage: TokenUsage;
  model: string;
  parse: ParseStatus;
}

/** Smart generation spends the analysis model on the generation step too. */
export function generationModel(models: ModelSettings, smartGeneration: boolean): string {
  return smartGeneration || models.smartGeneration ? models.analysisModel : models.generationModel;
}

export function generationMaxTokens(trackCount: number): number {
  return trackCount * OUTPUT_TOKENS_PER_TRACK + PROMPT_OVERHEAD_TOKENS;
}

export function formatCandidateLine(track: TrackRecord, index: number): string {
  const album = track.album || "Unknown album";
  const year = track.year ?? "Unknown year";
  const genres = track.genres.length > 0 ? ` [${track.genres.slice(0, 2).join(", ")}]` : "";
  return `${index + 1}. ${track.artist} - ${track.title} (${album}, ${year})${genres}`;
}

export function buildGenerationPrompt(
  candidates: TrackRecord[],
  context: GenerationContext
): string {
  const { request, seedTrack, hints } = context;
  const parts: string[] = [];

  if (request.prompt) parts.push(`User's request: ${request.prompt}`);

  if (seedTrack) {
    parts.push(`Seed track: ${describeSeed(seedTrack)}`);
    const dimensions =
      request.dimensions && request.dimensions.length > 0
        ? request.dimensions
        : (hints?.dimensions ?? []).map((dimension) => dimension.label);
    if (dimensions.length > 0) {
      parts.push(`Explore these dimensions: ${dimensions.join(", ")}`);
    }
  }

  if (hints?.reasoning) parts.push(`Analysis notes: ${hints.reasoning}`);
  if (request.additionalNotes) parts.push(`Additional notes: ${request.additionalNotes}`);

  const trackList = candidates.map(formatCandidateLine).join("\n");
  parts.push(`Select ${request.trackCount} tracks from this library:\n${trackList}`);

  return parts.join("\n\n");
}

function identificationFrom(item: unknown): string | null {
  if (typeof item === "string") {
    const trimmed = item.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof item !== "object" || item === null) return null;

  const title = "title" in item && typeof item.title === "string" ? item.title.trim() : "";
  if (title.length === 0) return null;
  const artist = "artist" in item && typeof item.artist === "string" ? item.artist.trim() : "";
  return artist.length > 0 ? `${artist} - ${title}` : title;
}

const LIST_PREFIX = /^(?:\d+[.)]|[-*•])\s*/;

/**
 * Reads the model's selections as "Artist - Title" strings. A JSON array is
 * expected; anything else falls back to one selection per line.
 */
export function parseSelections(text: string): ParseResult<string[]> {
  const json = extractJson(text);
  const list = Array.isArray(json)
    ? json
    : typeof json === "object" && json !== null && "tracks" in json
      ? json.tracks
      : undefined;

  if (Array.isArray(list)) {
    return parsed(list.flatMap((item) => identificationFrom(item) ?? []));
  }

  const lines = text
    .split("\n")
    .map((line) => line.trim().replace(LIST_PREFIX, "").trim())
    .filter((line) => line.length > 0 && !line.startsWith("```") && !/^[[\]{}]/.test(line));
  return degraded(lines, "reply was not a JSON array; read one selection per line");
}

/**
 * One generation call over the (possibly sampled) candidates, serialized in
 * the order given. The requested count is asked for, not enforced.
 */
export async function generateSelections(
  candidates: TrackRecord[],
  context: GenerationContext,
  deps: GeneratorDeps
): Promise<GenerationOutput> {
  const model = generationModel(deps.models, context.request.smartGeneration);
  const prompt = buildGenerationPrompt(candidates, context);
  log(`[generate] Calling ${model} with ${candidates.length} candidates (${prompt.length} chars)`);

  const completion = await withProviderRetry(
    () =>
      deps.llm.complete({
        system: GENERATION_SYSTEM,
        prompt,
        model,
        maxTokens: generationMaxTokens(context.request.trackCount),
      }),
    { label: "generation", delayMs: deps.retryDelayMs }
  );
  log(
    `[generate] Response: ${completion.inputTokens} input, ${completion.outputTokens} output tokens`
  );

  const selections = parseSelections(completion.text);
  if (selections.kind === "degraded") {
    log(`[generate] ${selections.reason}`);
  }

  return {
    identifications: selections.value,
    usage: {
      inputTokens: completion.inputTokens,
      outputTokens: completion.outputTokens,
      totalTokens: completion.inputTokens + completion.outputTokens,
    },
    model: completion.model,
    parse: selections.kind,
  };
}
