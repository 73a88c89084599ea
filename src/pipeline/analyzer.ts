import { z } from "zod";
import type { ModelSettings } from "../lib/config";
import { log } from "../lib/logger";
import { withProviderRetry } from "../lib/retry";
import { normalizeKey, similarity } from "../lib/similarity";
import type { LlmClient } from "../services/provider";
import type { TrackRecord } from "../services/types";
import { decadeRangeFrom } from "./filters";
import { formatLibrarySummary, type LibrarySummary } from "./library";
import { MATCH_THRESHOLD } from "./matcher";
import { degraded, extractJson, parsed, type ParseResult } from "./parse";
import type { Dimension, FilterSpec, GenerationHints, TokenUsage } from "./types";

const ANALYSIS_MAX_TOKENS = 1024;

const ANALYSIS_SYSTEM = `You are a music librarian helping narrow a personal music library before a playlist is built.

You will be given a summary of the library (genres and decades with track counts) and either a playlist request, a seed track, or both.

Reply with a single JSON object:
{
  "genres": ["Genre", ...],        // only genres from the library summary
  "decades": ["1990s", ...],       // only decades from the library summary, or [] for any era
  "min_rating": 0,                 // 0-10, 0 when rating does not matter
  "exclude": ["word", ...],        // title or album words to avoid, usually []
  "reasoning": "one sentence",
  "dimensions": [                  // seed track only, otherwise []
    {"id": "mood", "label": "Specific, descriptive label", "description": "Why it matters"}
  ]
}

Prefer broad filters: a filter that is too narrow leaves nothing to choose from.
No markdown formatting, no explanations - just the JSON object.`;

const looseStrings = z
  .array(z.unknown())
  .transform((items) =>
    items.flatMap((item) =>
      typeof item === "string" ? [item] : typeof item === "number" ? [String(item)] : []
    )
  );

const dimensionSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  description: z.string().catch(""),
});

const dimensionList = z
  .array(z.unknown())
  .transform((items) =>
    items.flatMap((item) => {
      const result = dimensionSchema.safeParse(item);
      return result.success ? [result.data] : [];
    })
  );

const analysisFields = {
  genres: looseStrings,
  decades: looseStrings,
  min_rating: z.number().min(0).max(10),
  exclude: looseStrings,
  reasoning: z.string(),
  dimensions: dimensionList,
};

/**
 * Every field is optional and falls back independently, so a partly
 * malformed reply still yields whatever it got right.
 */
export const analysisResponseSchema = z.object({
  genres: analysisFields.genres.optional().catch(undefined),
  decades: analysisFields.decades.optional().catch(undefined),
  min_rating: analysisFields.min_rating.optional().catch(undefined),
  exclude: analysisFields.exclude.optional().catch(undefined),
  reasoning: analysisFields.reasoning.optional().catch(undefined),
  dimensions: analysisFields.dimensions.optional().catch(undefined),
});

export type AnalysisResponse = z.infer<typeof analysisResponseSchema>;

export type AnalyzerInput = {
  prompt?: string | undefined;
  seed?: TrackRecord | undefined;
};

export interface Analysis {
  filters: FilterSpec;
  hints: GenerationHints;
  status: "parsed" | "degraded";
  usage: TokenUsage;
  model: string;
}

export type AnalyzerDeps = {
  llm: LlmClient;
  models: ModelSettings;
  retryDelayMs?: number | undefined;
};

const NO_ANALYSIS: AnalysisResponse = {};

export function parseAnalysisResponse(text: string): ParseResult<AnalysisResponse> {
  const json = extractJson(text);
  if (json === undefined) {
    return degraded(NO_ANALYSIS, "reply contained no JSON");
  }
  const result = analysisResponseSchema.safeParse(json);
  if (!result.success || typeof json !== "object" || json === null) {
    return degraded(NO_ANALYSIS, "reply was not a JSON object");
  }

  // null reads as "no suggestion", the same as a missing field
  const fields = new Map<string, unknown>(Object.entries(json));
  const checks: Array<[string, z.ZodTypeAny]> = Object.entries(analysisFields);
  const present = checks.filter(([name]) => fields.get(name) != null);
  if (present.length === 0) {
    return degraded(result.data, "reply had none of the expected fields");
  }
  const invalid = present
    .filter(([name, schema]) => !schema.safeParse(fields.get(name)).success)
    .map(([name]) => name);
  if (invalid.length > 0) {
    return degraded(result.data, `invalid fields: ${invalid.join(", ")}`);
  }
  return parsed(result.data);
}

/**
 * Maps model-suggested genres onto the library's own genre names. Exact
 * (case-insensitive) first, then the closest name at the match threshold.
 * Suggestions with no counterpart are dropped.
 */
export function mapGenresToLibrary(suggested: string[], libraryGenres: string[]): string[] {
  const byKey = new Map(libraryGenres.map((genre) => [normalizeKey(genre), genre]));
  const mapped: string[] = [];

  for (const suggestion of suggested) {
    const key = normalizeKey(suggestion);
    if (key.length === 0) continue;

    let match = byKey.get(key) ?? null;
    if (!match) {
      let closest: string | null = null;
      let closestScore = -1;
      for (const [libraryKey, genre] of byKey) {
        const score = similarity(key, libraryKey);
        if (score > closestScore) {
          closest = genre;
          closestScore = score;
        }
      }
      if (closestScore >= MATCH_THRESHOLD) match = closest;
    }
    if (match && !mapped.includes(match)) mapped.push(match);
  }

  return mapped;
}

export function toFilterSpec(response: AnalysisResponse, summary: LibrarySummary): FilterSpec {
  const spec: FilterSpec = {};

  const genres = mapGenresToLibrary(
    response.genres ?? [],
    summary.genres.map((genre) => genre.name)
  );
  if (genres.length > 0) spec.genres = genres;

  const decades = decadeRangeFrom(response.decades ?? []);
  if (decades) spec.decades = decades;

  if (response.min_rating != null && response.min_rating > 0) {
    spec.minRating = response.min_rating;
  }

  const substrings = (response.exclude ?? [])
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  if (substrings.length > 0) spec.exclude = { substrings };

  return spec;
}

export function describeSeed(seed: TrackRecord): string {
  const genres = seed.genres.length > 0 ? `; genres: ${seed.genres.join(", ")}` : "";
  return `${seed.title} by ${seed.artist} (from ${seed.album || "Unknown album"}, ${
    seed.year ?? "Unknown year"
  }${genres})`;
}

export function buildAnalysisPrompt(input: AnalyzerInput, summary: LibrarySummary): string {
  const parts = [formatLibrarySummary(summary)];
  if (input.prompt) parts.push(`Playlist request: ${input.prompt}`);
  if (input.seed) {
    parts.push(`Seed track: ${describeSeed(input.seed)}`);
    parts.push(
      "Describe 4-6 specific dimensions of the seed track (mood, era, instrumentation, vocals, production) a listener might want more of."
    );
  }
  return parts.join("\n\n");
}

/**
 * One analysis-model call turning a prompt or seed track into filter
 * suggestions. Unparseable replies degrade to "no constraint"; provider
 * failures propagate.
 */
export async function analyzeRequest(
  input: AnalyzerInput,
  summary: LibrarySummary,
  deps: AnalyzerDeps
): Promise<Analysis> {
  if (!input.prompt && !input.seed) {
    throw new Error("Analysis needs a prompt or a seed track.");
  }

  const model = deps.models.analysisModel;
  const completion = await withProviderRetry(
    () =>
      deps.llm.complete({
        system: ANALYSIS_SYSTEM,
        prompt: buildAnalysisPrompt(input, summary),
        model,
        maxTokens: ANALYSIS_MAX_TOKENS,
      }),
    { label: "analysis", delayMs: deps.retryDelayMs }
  );

  const result = parseAnalysisResponse(completion.text);
  if (result.kind === "degraded") {
    log(`[analyze] Analysis reply degraded (${result.reason}); keeping what could be read`);
  }

  const dimensions: Dimension[] = result.value.dimensions ?? [];
  return {
    filters: toFilterSpec(result.value, summary),
    hints: {
      reasoning: result.value.reasoning ?? null,
      dimensions,
    },
    status: result.kind,
    usage: {
      inputTokens: completion.inputTokens,
      outputTokens: completion.outputTokens,
      totalTokens: completion.inputTokens + completion.outputTokens,
    },
    model: completion.model,
  };
}
