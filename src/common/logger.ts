import pino, { type DestinationStream, type Logger, type LevelWithSilent } from "pino";

const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export const DEFAULT_LOG_LEVEL: LevelWithSilent = "warn";

function isLogLevel(value: string): value is LevelWithSilent {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolves the log level from `BENCHDIFF_LOG_LEVEL`. Unrecognised values fall
 * back to the default instead of failing the run.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const raw = env.BENCHDIFF_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return DEFAULT_LOG_LEVEL;
}

/**
 * Creates the process logger. Logs go to stderr (or the given destination) so
 * stdout only ever carries the markdown report.
 */
export function createLogger(options?: { level?: LevelWithSilent; destination?: DestinationStream }): Logger {
  return pino(
    {
      name: "benchdiff",
      level: options?.level ?? resolveLogLevel(),
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    options?.destination ?? pino.destination(2),
  );
}
