import { readFileSync } from "node:fs";
import { describe, it, expect, afterEach } from "vitest";
import { pino } from "pino";
import { CLI_VERSION, runCli, USAGE_LINE } from "../src/cli.js";
import { captureIo, CURRENT_FIXTURE, MAIN_FIXTURE, writeTempFile } from "./helpers/fixtures.js";

const silent = pino({ level: "silent" });

function run(argv: string[]) {
  const io = captureIo();
  const code = runCli(argv, { ...io, logger: silent });
  return { code, stdout: io.out(), stderr: io.err() };
}

describe("analyze_benchmark_results CLI", () => {
  it("prints the report for two result files", () => {
    const main = writeTempFile("main.txt", "foo/bar/10 time: [10 ns 12 ns 14 ns]\n");
    const current = writeTempFile("current.txt", "foo/bar/10 time: [5 ns 6 ns 7 ns]\n");

    const { code, stdout, stderr } = run([main, current]);

    expect(code).toBe(0);
    expect(stderr).toBe("");
    const lines = stdout.split("\n");
    expect(lines).toContain("| `foo/bar/10` | 12 ns | 6 ns | ✅ 2.00× faster |");
    expect(lines).toContain("- **Improvements** (>10% faster): 1 ✅");
    expect(lines).toContain("- **Regressions** (>10% slower): 0 ❌");
    expect(lines).toContain("- **Similar** (±10%): 0 ➖");
    expect(lines.slice(-2)).toEqual(["🎉 **Success**: Performance improvements detected!", ""]);
  });

  it("exits with 1 and the usage line when no arguments are given", () => {
    const { code, stdout, stderr } = run([]);

    expect(code).toBe(1);
    expect(stdout).toBe("");
    expect(stderr).toBe(`${USAGE_LINE}\n`);
  });

  it("exits with 1 when only one path is given", () => {
    expect(run([MAIN_FIXTURE]).code).toBe(1);
  });

  it("exits with 1 and the usage line when three arguments are given", () => {
    const { code, stdout, stderr } = run([MAIN_FIXTURE, CURRENT_FIXTURE, "extra.txt"]);

    expect(code).toBe(1);
    expect(stdout).toBe("");
    expect(stderr).toBe("Usage: analyze_benchmark_results <main_results_path> <current_results_path>\n");
  });

  it("exits with 2 when a results file cannot be read", () => {
    const { code, stdout, stderr } = run([MAIN_FIXTURE, "/nonexistent/current.txt"]);

    expect(code).toBe(2);
    expect(stdout).toBe("");
    expect(stderr).toMatch(/^error: cannot read results file '\/nonexistent\/current\.txt': /);
  });

  it("reads overrides from --config", () => {
    const config = writeTempFile("benchdiff.json", JSON.stringify({ title: "PR Check" }));

    const { code, stdout } = run(["--config", config, MAIN_FIXTURE, CURRENT_FIXTURE]);

    expect(code).toBe(0);
    expect(stdout.split("\n")[0]).toBe("# PR Check");
  });

  it("exits with 2 for an invalid config", () => {
    const config = writeTempFile("benchdiff.json", JSON.stringify({ improvementThreshold: "high" }));

    const { code, stderr } = run(["-c", config, MAIN_FIXTURE, CURRENT_FIXTURE]);

    expect(code).toBe(2);
    expect(stderr).toMatch(/^error: invalid config '.+benchdiff\.json': improvementThreshold: /);
  });

  it("prints the version from package.json", () => {
    const manifest = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));

    const { code, stdout } = run(["--version"]);

    expect(code).toBe(0);
    expect(CLI_VERSION).toBe(manifest.version);
    expect(stdout).toBe(`${manifest.version}\n`);
  });

  it("prints help to stdout", () => {
    const { code, stdout } = run(["--help"]);

    expect(code).toBe(0);
    expect(stdout).toContain("Usage: analyze_benchmark_results [options] <main_results_path> <current_results_path>");
  });
});

describe("analyze_benchmark_results CLI default logger", () => {
  const savedLevel = process.env.BENCHDIFF_LOG_LEVEL;

  afterEach(() => {
    if (savedLevel === undefined) {
      delete process.env.BENCHDIFF_LOG_LEVEL;
    } else {
      process.env.BENCHDIFF_LOG_LEVEL = savedLevel;
    }
  });

  it("writes only the error line to stderr at the default level", () => {
    delete process.env.BENCHDIFF_LOG_LEVEL;
    const io = captureIo();

    const code = runCli([MAIN_FIXTURE, "/nonexistent/current.txt"], io);

    expect(code).toBe(2);
    expect(io.out()).toBe("");
    expect(io.err().split("\n")).toEqual([
      expect.stringMatching(/^error: cannot read results file '\/nonexistent\/current\.txt': /),
      "",
    ]);
  });

  it("sends debug records through the stderr sink", () => {
    process.env.BENCHDIFF_LOG_LEVEL = "debug";
    const io = captureIo();

    const code = runCli([MAIN_FIXTURE, "/nonexistent/current.txt"], io);

    expect(code).toBe(2);
    const lines = io.err().trimEnd().split("\n");
    const errorLine = lines.pop();
    expect(errorLine).toMatch(/^error: cannot read results file '\/nonexistent\/current\.txt': /);
    const records = lines.map((line) => JSON.parse(line));
    expect(records.at(-1)).toMatchObject({ level: "debug", code: "ReportUnreadable" });
  });
});
