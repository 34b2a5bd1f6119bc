// jobs/plot-stats.ts
// Turn per-scene stat files into merged per-sensor CSVs and trend plots.
//
// Usage examples:
//   npx tsx backend/jobs/plot-stats.ts --order_directory=/orders/o-123 --source_host=cache01
//   npx tsx backend/jobs/plot-stats.ts --stats_directory=./stats --marker=diamond --debug
//
// Output (in the work/stats directory):
//   • <sensor>_<band_type>_stats.csv    per contributing sensor
//   • <title>_plot.svg                  five per band type with data
//
// Exit code 0 on success, 1 on any failure.

import { loadEnvironment, loadRunOptions, USAGE } from "../config/loader.js";
import { commandOutput, runWithBoundary } from "../engine/errors/index.js";
import { runStatsPlots } from "../engine/orchestrator.js";
import { logger, setLogLevel } from "../observability/logger.js";

export async function main(argv: readonly string[]): Promise<number> {
  const summary = await runWithBoundary(
    async () => {
      const opts = loadRunOptions(argv, loadEnvironment());
      if (opts.help) {
        console.log(USAGE);
        return "help" as const;
      }
      if (opts.debug) setLogLevel("debug");
      return runStatsPlots(opts);
    },
    {
      kind: "Runtime",
      logger: (err) => {
        const output = commandOutput(err.cause) ?? commandOutput(err);
        if (output) logger.error(`Output [${output.trim()}]`);
        logger.error(err);
        logger.error("Processing failed");
      },
    }
  );

  if (summary === undefined) return 1;
  if (summary !== "help") {
    const plotted = summary.results.filter((r) => r.plots.length).length;
    logger.info(`${plotted} band type(s) plotted in ${summary.directory}`);
  }
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Fatal:", err);
    process.exitCode = 1;
  }
);
