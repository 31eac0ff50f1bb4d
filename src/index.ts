export { compareReportFiles } from "./app.js";
export type { CompareOptions, ComparisonReport } from "./app.js";
export { runCli, USAGE_LINE } from "./cli.js";
export type { CliIo } from "./cli.js";
export { BenchdiffError, ReportConfigError, ReportReadError } from "./common/errors.js";
export { createLogger } from "./common/logger.js";
export { DEFAULT_THRESHOLDS } from "./common/types.js";
export type { SpeedupThresholds } from "./common/types.js";
export { parseCriterionOutput, readCriterionReport } from "./parser/criterionParser.js";
export type { BenchmarkRecord, BenchmarkResults } from "./parser/criterionParser.js";
export { parseTimeToNs } from "./compare/timeUnits.js";
export { calculateSpeedup, classifySpeedup } from "./compare/speedup.js";
export type { Speedup, Verdict } from "./compare/speedup.js";
export { CATEGORIES, categorizeBenchmark, groupByCategory } from "./report/categories.js";
export type { Category } from "./report/categories.js";
export { compareBenchmarkResults, renderMarkdownReport } from "./report/markdownReport.js";
export type {
  BenchmarkComparison,
  CategoryGroup,
  ComparisonRow,
  ComparisonSummary,
  RenderOptions,
} from "./report/markdownReport.js";
export { loadReportConfig, resolveThresholds, validateReportConfig } from "./reportConfig.js";
export type { ReportConfig } from "./reportConfig.js";
