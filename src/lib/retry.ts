import { ProviderError } from "./errors";
import { log } from "./logger";

const DEFAULT_RETRY_DELAY_MS = 2000;
const DEFAULT_MAX_RETRIES = 1;

type RetryOptions = {
  maxRetries?: number | undefined;
  delayMs?: number | undefined;
  label?: string | undefined;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retries an LLM call when it fails with a retryable ProviderError.
 * Backoff doubles per attempt. Every other error is thrown immediately.
 */
export async function withProviderRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const maxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelayMs = options?.delayMs ?? DEFAULT_RETRY_DELAY_MS;
  const label = options?.label ?? "request";

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof ProviderError) || !error.retryable || attempt >= maxRetries) {
        throw error;
      }

      const delayMs = baseDelayMs * Math.pow(2, attempt);
      log(
        `[retry] ${label} — ${error.message}, waiting ${delayMs / 1000}s (attempt ${attempt + 1}/${maxRetries})`
      );
      await sleep(delayMs);
    }
  }
}
