export type ErrorCode =
  | "REPOSITORY_UNAVAILABLE"
  | "PROVIDER_ERROR"
  | "BUDGET_EXHAUSTED"
  | "SAVE_FAILED"
  | "NO_CANDIDATES"
  | "SEED_NOT_FOUND"
  | "CONFIG_ERROR";

/**
 * Base class for every failure the generation pipeline surfaces.
 * `code` is stable and meant for programmatic handling.
 */
export class TunesmithError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = "TunesmithError";
    this.code = code;
  }
}

/** Library fetch failed. Fatal for the request. */
export class RepositoryUnavailableError extends TunesmithError {
  constructor(detail: string) {
    super(
      `Music library unavailable: ${detail}. Check that the Plex server is reachable and try again.`,
      "REPOSITORY_UNAVAILABLE"
    );
    this.name = "RepositoryUnavailableError";
  }
}

export class ProviderError extends TunesmithError {
  readonly retryable: boolean;
  readonly status: number | null;

  constructor(message: string, options: { retryable: boolean; status?: number | null | undefined }) {
    super(message, "PROVIDER_ERROR");
    this.name = "ProviderError";
    this.retryable = options.retryable;
    this.status = options.status ?? null;
  }
}

/**
 * The provider's context window cannot hold even one candidate line once the
 * reserve is taken out. Always a configuration problem.
 */
export class BudgetExhaustedError extends TunesmithError {
  readonly limitTokens: number;
  readonly usableTokens: number;

  constructor(limitTokens: number, usableTokens: number) {
    super(
      `Context budget exhausted: ${limitTokens} token limit leaves ${usableTokens} usable tokens, ` +
        "not enough for a single track. Raise llm.context_limit or lower defaults.track_count.",
      "BUDGET_EXHAUSTED"
    );
    this.name = "BudgetExhaustedError";
    this.limitTokens = limitTokens;
    this.usableTokens = usableTokens;
  }
}

export class SaveFailedError extends TunesmithError {
  readonly missingIds: string[];

  constructor(message: string, missingIds: string[] = []) {
    super(message, "SAVE_FAILED");
    this.name = "SaveFailedError";
    this.missingIds = missingIds;
  }
}

export class NoCandidatesError extends TunesmithError {
  constructor() {
    super(
      "No tracks match the selected filters. Try broadening your selection.",
      "NO_CANDIDATES"
    );
    this.name = "NoCandidatesError";
  }
}

export class SeedNotFoundError extends TunesmithError {
  readonly seedTrackId: string;

  constructor(seedTrackId: string) {
    super(`Seed track ${seedTrackId} was not found in the library.`, "SEED_NOT_FOUND");
    this.name = "SeedNotFoundError";
    this.seedTrackId = seedTrackId;
  }
}

export class ConfigError extends TunesmithError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

export function isTunesmithError(error: unknown): error is TunesmithError {
  return error instanceof TunesmithError;
}

/** Timeouts, conflicts, rate limits, overload and server errors are worth one more try. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}
