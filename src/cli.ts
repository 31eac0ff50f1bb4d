import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import type { Logger } from "pino";
import * as v from "valibot";
import { compareReportFiles } from "./app.js";
import { BenchdiffError } from "./common/errors.js";
import { createLogger } from "./common/logger.js";
import { loadReportConfig } from "./reportConfig.js";

export const CLI_NAME = "analyze_benchmark_results";

const PackageManifestSchema = v.object({ version: v.string() });

// src/ and dist/ both sit directly under the package root.
function readPackageVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return v.parse(PackageManifestSchema, manifest).version;
}

export const CLI_VERSION = readPackageVersion();
export const USAGE_LINE = `Usage: ${CLI_NAME} <main_results_path> <current_results_path>`;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logger?: Logger;
}

interface CliOptions {
  config?: string;
}

function buildProgram(io: CliIo, onRun: (mainPath: string, currentPath: string, options: CliOptions) => void): Command {
  return new Command()
    .name(CLI_NAME)
    .description("Compare two captured benchmark reports and print a markdown table")
    .version(CLI_VERSION, "-v, --version")
    .argument("<main_results_path>", "results captured on the baseline branch")
    .argument("<current_results_path>", "results captured on the candidate branch")
    .option("-c, --config <path>", "JSON file overriding the title and speedup thresholds")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      // runCli prints the fixed usage line instead of commander's message.
      writeErr: () => undefined,
    })
    .action((mainPath: string, currentPath: string, options: CliOptions) => {
      onRun(mainPath, currentPath, options);
    });
}

/**
 * Runs the CLI against `argv` (user arguments only, without the node binary
 * and script path) and returns the exit code.
 */
export function runCli(argv: readonly string[], io: CliIo): number {
  const logger = io.logger ?? createLogger({ destination: { write: (line) => io.stderr(line) } });

  const program = buildProgram(io, (mainPath, currentPath, options) => {
    const config = options.config ? loadReportConfig(options.config) : undefined;
    const { markdown } = compareReportFiles(mainPath, currentPath, { config, logger });
    io.stdout(markdown);
  });

  try {
    program.parse(argv, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version surface as "errors" with exit code 0
      if (err.exitCode === 0) return 0;
      io.stderr(`${USAGE_LINE}\n`);
      return 1;
    }
    if (err instanceof BenchdiffError) {
      logger.debug({ code: err.code, err }, err.message);
      io.stderr(`error: ${err.message}\n`);
      return err.exitCode;
    }
    throw err;
  }
}
