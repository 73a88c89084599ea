export const DEFAULT_CONTEXT_LIMIT = 128000;

type ModelInfo = {
  contextLimit: number;
  /** USD per million tokens. */
  inputPrice: number;
  outputPrice: number;
};

// Keyed by prefix so dated snapshots ("claude-haiku-4-5-20251001") resolve too.
const MODEL_CATALOG: Record<string, ModelInfo> = {
  "claude-opus-4": { contextLimit: 200000, inputPrice: 15, outputPrice: 75 },
  "claude-sonnet-4": { contextLimit: 200000, inputPrice: 3, outputPrice: 15 },
  "claude-haiku-4-5": { contextLimit: 200000, inputPrice: 1, outputPrice: 5 },
  "claude-3-7-sonnet": { contextLimit: 200000, inputPrice: 3, outputPrice: 15 },
  "claude-3-5-haiku": { contextLimit: 200000, inputPrice: 0.8, outputPrice: 4 },
  "gpt-4o": { contextLimit: 128000, inputPrice: 2.5, outputPrice: 10 },
  "gpt-4o-mini": { contextLimit: 128000, inputPrice: 0.15, outputPrice: 0.6 },
  "gpt-4.1": { contextLimit: 1047576, inputPrice: 2, outputPrice: 8 },
  "gpt-4.1-mini": { contextLimit: 1047576, inputPrice: 0.4, outputPrice: 1.6 },
  "gpt-4.1-nano": { contextLimit: 1047576, inputPrice: 0.1, outputPrice: 0.4 },
};

export function lookupModel(model: string): ModelInfo | null {
  const normalized = model.trim().toLowerCase();
  let best: string | null = null;
  for (const prefix of Object.keys(MODEL_CATALOG)) {
    if (!normalized.startsWith(prefix)) continue;
    if (best === null || prefix.length > best.length) best = prefix;
  }
  return best !== null ? MODEL_CATALOG[best] ?? null : null;
}

/**
 * Context window for a model. A positive override (llm.context_limit) wins.
 */
export function contextLimitFor(model: string, override?: number): number {
  if (override != null && override > 0) return override;
  return lookupModel(model)?.contextLimit ?? DEFAULT_CONTEXT_LIMIT;
}

export function estimateCost(
  model: string,
  inputTokens: number,
  outputTokens: number
): number | null {
  const info = lookupModel(model);
  if (!info) return null;
  return (inputTokens * info.inputPrice + outputTokens * info.outputPrice) / 1_000_000;
}
