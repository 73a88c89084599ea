import type { TrackRecord } from "../services/types";
import type { CandidateSet } from "./types";

/**
 * Small LCG; good enough for picking tracks and reproducible from a seed.
 */
export function seededRandom(seed: number): () => number {
  let state = Math.abs(Math.trunc(seed)) & 0x7fffffff;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}

/**
 * Uniform sample without replacement. Selected tracks keep their original
 * relative order. The same seed over the same input gives the same sample.
 */
export function sampleTracks(
  candidates: TrackRecord[],
  targetCount: number,
  seed: number
): CandidateSet {
  const count = Math.max(0, Math.min(Math.floor(targetCount), candidates.length));
  if (count === candidates.length) return candidates.slice();

  const random = seededRandom(seed);
  const indices = candidates.map((_, index) => index);

  // Partial Fisher-Yates: the first `count` slots end up as the sample
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (indices.length - i));
    const picked = indices[j];
    const current = indices[i];
    if (picked === undefined || current === undefined) break;
    indices[i] = picked;
    indices[j] = current;
  }

  return indices
    .slice(0, count)
    .sort((a, b) => a - b)
    .flatMap((index) => {
      const track = candidates[index];
      return track ? [track] : [];
    });
}
