import { readFileSync } from "node:fs";
import { ReportReadError } from "../common/errors.js";

export interface BenchmarkRecord {
  /** Median time as written in the report, e.g. `"124.56 µs"`. */
  readonly time: string;
  /** The whole bracketed `[low median high]` segment, verbatim. */
  readonly fullTime: string;
}

export type BenchmarkResults = Map<string, BenchmarkRecord>;

// Matches either a `group/function/parameter` id or a bare identifier, followed
// by the harness' timing line. Long ids are printed on their own line, so the
// gap before `time:` may span a newline.
const TIME_LINE_PATTERN = /(\S+\/\S+\/\d+|[\p{L}\p{N}_]+)\s+time:\s+\[([^\]]+)\]/gu;

// One `<number><unit>` token inside the brackets; the unit may be detached.
const TIME_TOKEN_PATTERN = /\d+(?:\.\d+)?(?:[eE][+-]?\d+)?(?:\s*[^\s\d.]+)?/g;

/**
 * Splits a bracketed segment like `10 ns 12 ns 14 ns` into its time tokens
 * (`["10 ns", "12 ns", "14 ns"]`).
 */
export function splitTimeTokens(segment: string): string[] {
  return segment.match(TIME_TOKEN_PATTERN) ?? [];
}

/**
 * Extracts every benchmark timing from captured harness output.
 *
 * The second token of each `time: [low median high]` triple is kept as the
 * representative figure. Triples with fewer than two tokens are skipped, and a
 * name seen twice keeps its last timing.
 */
export function parseCriterionOutput(content: string): BenchmarkResults {
  const results: BenchmarkResults = new Map();

  for (const match of content.matchAll(TIME_LINE_PATTERN)) {
    const [, name, fullTime] = match;
    const tokens = splitTimeTokens(fullTime);
    if (tokens.length < 2) continue;

    results.set(name, { time: tokens[1], fullTime });
  }

  return results;
}

export function readCriterionReport(path: string): BenchmarkResults {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ReportReadError(path, err);
  }
  return parseCriterionOutput(content);
}
