import { BudgetExhaustedError } from "../lib/errors";

/** One serialized "N. Artist - Title (Album, Year) [Genre]" line. */
export const TOKENS_PER_TRACK = 20;

/** Share of the context window kept back for the system prompt and instructions. */
export const RESERVE_FRACTION = 0.25;

/** Expected reply size per requested track: one {"artist","album","title"} object. */
export const OUTPUT_TOKENS_PER_TRACK = 40;

export interface BudgetDecision {
  needsSampling: boolean;
  targetCount: number;
  usableTokens: number;
}

export type BudgetOptions = {
  /** Tokens set aside on top of the reserve fraction, typically the model's reply. */
  reservedTokens?: number | undefined;
  reserveFraction?: number | undefined;
  /** User cap on tracks sent to the model; 0 or absent means none. */
  maxTracks?: number | undefined;
};

export function usableBudget(
  providerLimitTokens: number,
  options: BudgetOptions = {}
): number {
  const reserveFraction = options.reserveFraction ?? RESERVE_FRACTION;
  const reserved = options.reservedTokens ?? 0;
  return Math.floor(providerLimitTokens * (1 - reserveFraction)) - reserved;
}

/**
 * Decides how many candidate lines fit into the prompt.
 * Throws BudgetExhaustedError when not even one line fits.
 */
export function decideBudget(
  candidateCount: number,
  providerLimitTokens: number,
  avgTokensPerTrack: number = TOKENS_PER_TRACK,
  options: BudgetOptions = {}
): BudgetDecision {
  const usableTokens = usableBudget(providerLimitTokens, options);

  if (candidateCount <= 0) {
    return { needsSampling: false, targetCount: 0, usableTokens };
  }

  const fits = Math.floor(usableTokens / avgTokensPerTrack);
  if (fits < 1) {
    throw new BudgetExhaustedError(providerLimitTokens, usableTokens);
  }

  const cap = options.maxTracks != null && options.maxTracks > 0 ? options.maxTracks : Infinity;
  const targetCount = Math.min(candidateCount, fits, cap);

  return {
    needsSampling: targetCount < candidateCount,
    targetCount,
    usableTokens,
  };
}
