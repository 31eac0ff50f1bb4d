import { parseTimeToNs } from "../compare/timeUnits.js";
import { calculateSpeedup, classifySpeedup, type Speedup, type Verdict } from "../compare/speedup.js";
import type { BenchmarkResults } from "../parser/criterionParser.js";
import {
  DEFAULT_REPORT_TITLE,
  DEFAULT_THRESHOLDS,
  NOT_AVAILABLE,
  type SpeedupThresholds,
} from "../common/types.js";
import { categoryTitle, groupByCategory, type Category } from "./categories.js";

export interface ComparisonRow {
  name: string;
  mainTime?: string;
  currentTime?: string;
  /** Present only when both runs have a usable time. */
  speedup?: Speedup;
  verdict?: Verdict;
}

export interface CategoryGroup {
  category: Category;
  rows: ComparisonRow[];
}

export interface ComparisonSummary {
  total: number;
  improvements: number;
  regressions: number;
  similar: number;
}

export interface BenchmarkComparison {
  /** Non-empty categories only, in declaration order. */
  groups: CategoryGroup[];
  summary: ComparisonSummary;
  thresholds: SpeedupThresholds;
}

export interface RenderOptions {
  mainPath: string;
  currentPath: string;
  title?: string;
}

const VERDICT_MARKERS: Record<Verdict, string> = {
  improvement: "✅",
  regression: "❌",
  similar: "➖",
};

function compareRow(
  name: string,
  main: BenchmarkResults,
  current: BenchmarkResults,
  thresholds: SpeedupThresholds,
): ComparisonRow {
  const mainTime = main.get(name)?.time;
  const currentTime = current.get(name)?.time;
  const row: ComparisonRow = { name, mainTime, currentTime };

  if (mainTime === undefined || currentTime === undefined) {
    return row;
  }

  const speedup = calculateSpeedup(parseTimeToNs(mainTime), parseTimeToNs(currentTime));
  // A zero reading normalizes to the same "no comparison" as a missing one.
  if (speedup.ratio === 0) {
    return row;
  }

  row.speedup = speedup;
  row.verdict = classifySpeedup(speedup.ratio, thresholds);
  return row;
}

/** Orders by Unicode code point rather than by UTF-16 code unit. */
export function compareCodePoints(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

export function compareBenchmarkResults(
  main: BenchmarkResults,
  current: BenchmarkResults,
  thresholds: SpeedupThresholds = DEFAULT_THRESHOLDS,
): BenchmarkComparison {
  const names = [...new Set([...main.keys(), ...current.keys()])].sort(compareCodePoints);
  const summary: ComparisonSummary = { total: 0, improvements: 0, regressions: 0, similar: 0 };
  const groups: CategoryGroup[] = [];

  for (const [category, members] of groupByCategory(names)) {
    if (members.length === 0) continue;

    const rows = members.map((name) => compareRow(name, main, current, thresholds));
    for (const row of rows) {
      if (row.verdict === "improvement") summary.improvements++;
      else if (row.verdict === "regression") summary.regressions++;
      else if (row.verdict === "similar") summary.similar++;
    }
    groups.push({ category, rows });
  }

  summary.total = summary.improvements + summary.regressions + summary.similar;
  return { groups, summary, thresholds };
}

function formatSpeedup(row: ComparisonRow): string {
  if (!row.speedup || !row.verdict) return NOT_AVAILABLE;
  return `${VERDICT_MARKERS[row.verdict]} ${row.speedup.label}`;
}

function percent(delta: number): number {
  return Math.round(delta * 100);
}

function similarBand(thresholds: SpeedupThresholds): string {
  const up = percent(thresholds.improvement - 1);
  const down = percent(1 - thresholds.regression);
  return up === down ? `±${up}%` : `+${up}% / -${down}%`;
}

export function renderMarkdownReport(comparison: BenchmarkComparison, options: RenderOptions): string {
  const { summary, thresholds } = comparison;
  const lines: string[] = [];

  lines.push(`# ${options.title ?? DEFAULT_REPORT_TITLE}`, "");
  lines.push(`**Main Branch Results**: \`${options.mainPath}\``);
  lines.push(`**Current Branch Results**: \`${options.currentPath}\``, "");

  for (const { category, rows } of comparison.groups) {
    lines.push(`## ${categoryTitle(category)}`, "");
    lines.push("| Benchmark | Main Branch | Current Branch | Speedup |");
    lines.push("|-----------|-------------|----------------|---------|");

    for (const row of rows) {
      lines.push(
        `| \`${row.name}\` | ${row.mainTime ?? NOT_AVAILABLE} | ${row.currentTime ?? NOT_AVAILABLE} | ${formatSpeedup(row)} |`,
      );
    }

    lines.push("");
  }

  lines.push("## Summary", "");
  lines.push(`- **Total benchmarks**: ${summary.total}`);
  lines.push(
    `- **Improvements** (>${percent(thresholds.improvement - 1)}% faster): ${summary.improvements} ${VERDICT_MARKERS.improvement}`,
  );
  lines.push(
    `- **Regressions** (>${percent(1 - thresholds.regression)}% slower): ${summary.regressions} ${VERDICT_MARKERS.regression}`,
  );
  lines.push(`- **Similar** (${similarBand(thresholds)}): ${summary.similar} ${VERDICT_MARKERS.similar}`);

  if (summary.regressions > 0) {
    lines.push("", "⚠️ **WARNING**: Performance regressions detected!");
  } else if (summary.improvements > 0) {
    lines.push("", "🎉 **Success**: Performance improvements detected!");
  }

  return lines.join("\n") + "\n";
}
