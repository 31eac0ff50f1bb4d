import type { Logger } from "pino";
import { createLogger } from "./common/logger.js";
import { readCriterionReport } from "./parser/criterionParser.js";
import {
  compareBenchmarkResults,
  renderMarkdownReport,
  type BenchmarkComparison,
} from "./report/markdownReport.js";
import { resolveThresholds, type ReportConfig } from "./reportConfig.js";

export interface CompareOptions {
  config?: ReportConfig;
  /** Defaults to a stderr logger at the `BENCHDIFF_LOG_LEVEL` level. */
  logger?: Logger;
}

export interface ComparisonReport {
  comparison: BenchmarkComparison;
  markdown: string;
}

/**
 * Reads a baseline and a candidate results file and renders the markdown
 * comparison between them.
 *
 * ```typescript
 * import { compareReportFiles } from "benchdiff";
 *
 * const { markdown, comparison } = compareReportFiles("main.txt", "current.txt");
 * if (comparison.summary.regressions > 0) process.exitCode = 1;
 * ```
 */
export function compareReportFiles(
  mainPath: string,
  currentPath: string,
  options?: CompareOptions,
): ComparisonReport {
  const logger = options?.logger ?? createLogger();

  const main = readCriterionReport(mainPath);
  logger.debug({ path: mainPath, benchmarks: main.size }, "parsed main results");
  const current = readCriterionReport(currentPath);
  logger.debug({ path: currentPath, benchmarks: current.size }, "parsed current results");

  const comparison = compareBenchmarkResults(main, current, resolveThresholds(options?.config));
  logger.info(comparison.summary, "benchmark comparison complete");

  const markdown = renderMarkdownReport(comparison, {
    mainPath,
    currentPath,
    title: options?.config?.title,
  });

  return { comparison, markdown };
}
