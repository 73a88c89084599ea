import type { TrackRecord } from "../services/types";

/** Ordered, duplicate-free working set handed to budgeting and the LLM. */
export type CandidateSet = TrackRecord[];

/**
 * Inclusive range of decade start years: { from: 1980, to: 1990 } admits
 * 1980 through 1999.
 */
export interface DecadeRange {
  from: number;
  to: number;
}

/**
 * Structured constraints. Absent or empty fields impose nothing.
 */
export interface FilterSpec {
  genres?: string[] | undefined;
  decades?: DecadeRange | undefined;
  minRating?: number | undefined;
  exclude?:
    | {
        ids?: string[] | undefined;
        substrings?: string[] | undefined;
      }
    | undefined;
}

export interface Dimension {
  id: string;
  label: string;
  description: string;
}

export interface GenerationHints {
  reasoning: string | null;
  /** Seed flow only: the musical aspects worth exploring. */
  dimensions: Dimension[];
}

export interface GenerationRequest {
  prompt?: string | undefined;
  seedTrackId?: string | undefined;
  trackCount: number;
  smartGeneration: boolean;
  /** User-supplied constraints; when present, prompt analysis is skipped. */
  filters?: FilterSpec | undefined;
  excludeLive: boolean;
  /** Rating floor applied on top of whichever FilterSpec ends up in use. */
  minRating?: number | undefined;
  /** Upper bound on tracks sent to the model. 0 means no cap beyond the context window. */
  maxTracksToAi: number;
  additionalNotes?: string | undefined;
  /** Seed flow: dimension labels the user picked. */
  dimensions?: string[] | undefined;
  sampleSeed?: number | undefined;
}

export type MatchMethod = "exact" | "fuzzy" | "unmatched";

export interface MatchResult {
  identification: string;
  track: TrackRecord | null;
  /** 0-100. */
  score: number;
  method: MatchMethod;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export type ParseStatus = "parsed" | "degraded";

export type AnalysisStatus = ParseStatus | "skipped";

export interface PlaylistMetadata {
  tokenUsage: TokenUsage;
  /** USD; null when the model's price is unknown. */
  estimatedCost: number | null;
  unmatchedCount: number;
  unmatched: string[];
  /** Matched tracks removed by the post-match live pass. */
  droppedLive: number;
  libraryTrackCount: number;
  candidateCount: number;
  sentToModel: number;
  sampled: boolean;
  sampleSeed: number | null;
  analysis: AnalysisStatus;
  /** How the generation reply was read. */
  selections: ParseStatus;
  filters: FilterSpec;
  models: { analysis: string | null; generation: string };
}

export interface Playlist {
  tracks: TrackRecord[];
  metadata: PlaylistMetadata;
}
