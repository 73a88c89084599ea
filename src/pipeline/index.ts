// Public API for the generation pipeline
export { runGeneration, type GenerationDeps } from "./runner";
export { applyFilters, dedupeTracks, decadeRangeFrom, parseDecade } from "./filters";
export { excludeLive, isLiveRecording } from "./live";
export { decideBudget, type BudgetDecision } from "./budget";
export { sampleTracks } from "./sampler";
export { analyzeRequest, type Analysis, type AnalyzerInput } from "./analyzer";
export { generateSelections } from "./generator";
export { matchTracks, MATCH_THRESHOLD } from "./matcher";
export { summarizeLibrary, searchTracks, type LibrarySummary } from "./library";
export {
  formatAnalysisAsText,
  formatAsIds,
  formatPlaylistAsJson,
  formatPlaylistAsText,
  formatSearchResults,
  formatSummaryAsText,
  normalizeFormat,
  type OutputFormat,
} from "./formatting";
export type {
  CandidateSet,
  FilterSpec,
  GenerationRequest,
  MatchResult,
  Playlist,
} from "./types";
