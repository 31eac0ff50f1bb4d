const NS_PER_UNIT: Record<string, number> = {
  ps: 0.001,
  ns: 1,
  "µs": 1_000, // micro sign, as the harness prints it
  "μs": 1_000, // greek small letter mu
  us: 1_000,
  ms: 1_000_000,
  s: 1_000_000_000,
};

const TIME_PATTERN = /^(\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)\s*(\S*)/;

/**
 * Converts a time string such as `"124.56 µs"` to nanoseconds.
 *
 * Unknown or missing units pass the number through unchanged. A string that
 * does not start with a number yields `0`, which callers treat as missing.
 */
export function parseTimeToNs(time: string): number {
  const match = TIME_PATTERN.exec(time.trim());
  if (!match) return 0;

  const value = Number.parseFloat(match[1]);
  const multiplier = NS_PER_UNIT[match[2]] ?? 1;
  return value * multiplier;
}
