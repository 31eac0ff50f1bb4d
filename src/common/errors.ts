export class BenchdiffError extends Error {
  readonly code: string;
  readonly exitCode: number;

  constructor(code: string, message: string, exitCode: number = 2, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BenchdiffError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ReportReadError extends BenchdiffError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("ReportUnreadable", `cannot read results file '${path}': ${describeCause(cause)}`, 2, {
      cause,
    });
    this.name = "ReportReadError";
    this.path = path;
  }
}

export class ReportConfigError extends BenchdiffError {
  readonly path?: string;

  constructor(message: string, path?: string, cause?: unknown) {
    super("InvalidConfig", path ? `invalid config '${path}': ${message}` : `invalid config: ${message}`, 2, {
      cause,
    });
    this.name = "ReportConfigError";
    this.path = path;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
