import { Bench } from "tinybench";
import { parseCriterionOutput } from "../src/parser/criterionParser.js";
import { compareBenchmarkResults, renderMarkdownReport } from "../src/report/markdownReport.js";

const GROUPS = ["prefix_fast_path", "bulk_insertion", "pattern_matching", "scalability"];
const SIZES = [10, 100, 1000, 10000];

function buildReport(scale: number): string {
  const lines: string[] = [];
  for (const group of GROUPS) {
    for (let fn = 0; fn < 25; fn++) {
      for (const size of SIZES) {
        const median = ((fn + 1) * size * scale) / 100;
        lines.push(`${group}/case_${fn}/${size}`);
        lines.push(
          `                        time:   [${(median * 0.98).toFixed(2)} µs ${median.toFixed(2)} µs ${(median * 1.02).toFixed(2)} µs]`,
        );
        lines.push("Found 3 outliers among 100 measurements (3.00%)");
      }
    }
  }
  return lines.join("\n");
}

async function run() {
  const bench = new Bench({ warmupIterations: 50 });
  const mainReport = buildReport(1);
  const currentReport = buildReport(0.8);
  const main = parseCriterionOutput(mainReport);
  const current = parseCriterionOutput(currentReport);

  bench.add("parseCriterionOutput (400 benchmarks)", () => {
    parseCriterionOutput(mainReport);
  });

  bench.add("compare + render (400 benchmarks)", () => {
    const comparison = compareBenchmarkResults(main, current);
    renderMarkdownReport(comparison, { mainPath: "main.txt", currentPath: "current.txt" });
  });

  await bench.run();

  console.log("\n--- benchmark report pipeline ---");
  console.table(bench.table());
}

run().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
