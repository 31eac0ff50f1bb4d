export const DEFAULT_REPORT_TITLE = "Branch Comparison Benchmark Report";

// Ratios are main / current, so above 1 means the current run is faster.
export const DEFAULT_IMPROVEMENT_THRESHOLD = 1.1;
export const DEFAULT_REGRESSION_THRESHOLD = 0.9;

export const NOT_AVAILABLE = "N/A";

export interface SpeedupThresholds {
  improvement: number;
  regression: number;
}

export const DEFAULT_THRESHOLDS: SpeedupThresholds = {
  improvement: DEFAULT_IMPROVEMENT_THRESHOLD,
  regression: DEFAULT_REGRESSION_THRESHOLD,
};
