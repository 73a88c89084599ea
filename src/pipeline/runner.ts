import type { ModelSettings } from "../lib/config";
import { NoCandidatesError, SeedNotFoundError } from "../lib/errors";
import { log } from "../lib/logger";
import { contextLimitFor, estimateCost } from "../providers/models";
import type { LlmClient, TrackRepository } from "../services/provider";
import type { TrackRecord } from "../services/types";
import { analyzeRequest, type Analysis } from "./analyzer";
import { decideBudget, TOKENS_PER_TRACK } from "./budget";
import { applyFilters, dedupeTracks, hasActiveFilters } from "./filters";
import {
  GENERATION_SYSTEM,
  generateSelections,
  generationMaxTokens,
  generationModel,
} from "./generator";
import { summarizeLibrary } from "./library";
import { excludeLive } from "./live";
import { matchedTracks, matchTracks, unmatchedIdentifications } from "./matcher";
import { randomSeed, sampleTracks } from "./sampler";
import type { FilterSpec, GenerationRequest, MatchResult, Playlist, TokenUsage } from "./types";

export type GenerationDeps = {
  repository: TrackRepository;
  llm: LlmClient;
  models: ModelSettings;
  libraryName: string;
  /** Overrides the model catalog's context window when positive. */
  contextLimit?: number | undefined;
  retryDelayMs?: number | undefined;
};

function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

function withRatingFloor(spec: FilterSpec, minRating: number | undefined): FilterSpec {
  if (minRating == null || minRating <= 0) return spec;
  return { ...spec, minRating: Math.max(spec.minRating ?? 0, minRating) };
}

function sumCosts(...costs: Array<number | null>): number | null {
  let total = 0;
  for (const cost of costs) {
    if (cost === null) return null;
    total += cost;
  }
  return total;
}

function findSeed(tracks: TrackRecord[], seedTrackId: string | undefined): TrackRecord | null {
  if (!seedTrackId) return null;
  const seed = tracks.find((track) => track.id === seedTrackId);
  if (!seed) throw new SeedNotFoundError(seedTrackId);
  return seed;
}

/**
 * Matched tracks in reply order, with live recordings dropped again when
 * asked, trimmed to the requested count.
 */
export function finalTracks(
  results: MatchResult[],
  request: Pick<GenerationRequest, "excludeLive" | "trackCount">
): { tracks: TrackRecord[]; droppedLive: number } {
  const matched = matchedTracks(results);
  const kept = request.excludeLive ? excludeLive(matched) : matched;
  return {
    tracks: kept.slice(0, request.trackCount),
    droppedLive: matched.length - kept.length,
  };
}

/**
 * Filter-first generation: fetch, analyze, filter, budget, sample, generate,
 * match. Everything here is scoped to one call.
 */
export async function runGeneration(
  request: GenerationRequest,
  deps: GenerationDeps
): Promise<Playlist> {
  if (!request.prompt && !request.seedTrackId) {
    throw new Error("Provide a prompt or a seed track.");
  }

  // 1. Fresh library snapshot
  const library = dedupeTracks(await deps.repository.listTracks(deps.libraryName));
  const seedTrack = findSeed(library, request.seedTrackId);

  // 2. Filters: user-supplied, or suggested by the analysis model
  let analysis: Analysis | null = null;
  let filters: FilterSpec;
  if (request.filters && hasActiveFilters(request.filters)) {
    filters = request.filters;
  } else {
    analysis = await analyzeRequest(
      { prompt: request.prompt, seed: seedTrack ?? undefined },
      summarizeLibrary(library),
      { llm: deps.llm, models: deps.models, retryDelayMs: deps.retryDelayMs }
    );
    filters = analysis.filters;
  }
  filters = withRatingFloor(filters, request.minRating);

  // 3. Narrow the library
  let candidates = applyFilters(library, filters);
  if (request.excludeLive) candidates = excludeLive(candidates);
  if (seedTrack) candidates = candidates.filter((track) => track.id !== seedTrack.id);
  log(`[generate] ${candidates.length} of ${library.length} tracks match filters`);

  if (candidates.length === 0) {
    throw new NoCandidatesError();
  }

  // 4. Fit the context window
  const model = generationModel(deps.models, request.smartGeneration);
  const decision = decideBudget(
    candidates.length,
    contextLimitFor(model, deps.contextLimit),
    TOKENS_PER_TRACK,
    {
      reservedTokens:
        generationMaxTokens(request.trackCount) + estimateTokens(GENERATION_SYSTEM),
      maxTracks: request.maxTracksToAi,
    }
  );

  const sampleSeed = request.sampleSeed ?? randomSeed();
  const sent = decision.needsSampling
    ? sampleTracks(candidates, decision.targetCount, sampleSeed)
    : candidates;
  if (decision.needsSampling) {
    log(`[generate] Sampling ${sent.length} tracks from ${candidates.length} (seed ${sampleSeed})`);
  }

  // 5. Ask the model, then ground every answer in the library
  const generation = await generateSelections(
    sent,
    {
      request,
      seedTrack,
      hints: analysis?.hints,
    },
    { llm: deps.llm, models: deps.models, retryDelayMs: deps.retryDelayMs }
  );

  const results = matchTracks(generation.identifications, sent, {
    excludeIds: seedTrack ? [seedTrack.id] : [],
  });
  const unmatched = unmatchedIdentifications(results);

  const { tracks, droppedLive } = finalTracks(results, request);
  log(`[generate] Matched ${tracks.length} tracks, ${unmatched.length} unmatched`);
  if (droppedLive > 0) {
    log(`[generate] Dropped ${droppedLive} live recordings after matching`);
  }

  const zero: TokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
  const tokenUsage = addUsage(analysis?.usage ?? zero, generation.usage);
  const estimatedCost = sumCosts(
    analysis ? estimateCost(analysis.model, analysis.usage.inputTokens, analysis.usage.outputTokens) : 0,
    estimateCost(generation.model, generation.usage.inputTokens, generation.usage.outputTokens)
  );

  return {
    tracks,
    metadata: {
      tokenUsage,
      estimatedCost,
      unmatchedCount: unmatched.length,
      unmatched,
      droppedLive,
      libraryTrackCount: library.length,
      candidateCount: candidates.length,
      sentToModel: sent.length,
      sampled: decision.needsSampling,
      sampleSeed: decision.needsSampling ? sampleSeed : null,
      analysis: analysis ? analysis.status : "skipped",
      selections: generation.parse,
      filters,
      models: { analysis: analysis ? analysis.model : null, generation: generation.model },
    },
  };
}
