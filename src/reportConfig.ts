import { readFileSync } from "node:fs";
import * as v from "valibot";
import { ReportConfigError } from "./common/errors.js";
import { DEFAULT_THRESHOLDS, type SpeedupThresholds } from "./common/types.js";

const ReportConfigSchema = v.strictObject({
  title: v.optional(v.pipe(v.string(), v.nonEmpty())),
  improvementThreshold: v.optional(v.pipe(v.number(), v.minValue(1))),
  regressionThreshold: v.optional(v.pipe(v.number(), v.gtValue(0), v.maxValue(1))),
});

export type ReportConfig = v.InferOutput<typeof ReportConfigSchema>;

function formatIssues(issues: v.BaseIssue<unknown>[]): string {
  return issues
    .map((issue) => {
      const path = v.getDotPath(issue);
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

export function validateReportConfig(data: unknown, path?: string): ReportConfig {
  const result = v.safeParse(ReportConfigSchema, data);
  if (!result.success) {
    throw new ReportConfigError(formatIssues(result.issues), path);
  }
  return result.output;
}

export function loadReportConfig(path: string): ReportConfig {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ReportConfigError(err instanceof Error ? err.message : String(err), path, err);
  }
  return validateReportConfig(data, path);
}

export function resolveThresholds(config: ReportConfig | undefined): SpeedupThresholds {
  return {
    improvement: config?.improvementThreshold ?? DEFAULT_THRESHOLDS.improvement,
    regression: config?.regressionThreshold ?? DEFAULT_THRESHOLDS.regression,
  };
}
