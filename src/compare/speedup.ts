import { DEFAULT_THRESHOLDS, NOT_AVAILABLE, type SpeedupThresholds } from "../common/types.js";

export interface Speedup {
  /** `main / current`; above 1 means the current run is faster. `0` when undefined. */
  ratio: number;
  label: string;
}

export type Verdict = "improvement" | "regression" | "similar";

export const NO_SPEEDUP: Speedup = { ratio: 0, label: NOT_AVAILABLE };

export function calculateSpeedup(mainNs: number, currentNs: number): Speedup {
  if (mainNs === 0 || currentNs === 0) {
    return { ...NO_SPEEDUP };
  }

  const ratio = mainNs / currentNs;

  if (ratio > 1) {
    return { ratio, label: `${ratio.toFixed(2)}× faster` };
  }
  if (ratio < 1) {
    return { ratio, label: `${(1 / ratio).toFixed(2)}× slower (regression)` };
  }
  return { ratio: 1, label: "Same" };
}

/**
 * Thresholds are compared against the raw ratio, not the inverted factor the
 * "slower" label shows.
 */
export function classifySpeedup(
  ratio: number,
  thresholds: SpeedupThresholds = DEFAULT_THRESHOLDS,
): Verdict {
  if (ratio > thresholds.improvement) return "improvement";
  if (ratio < thresholds.regression) return "regression";
  return "similar";
}
