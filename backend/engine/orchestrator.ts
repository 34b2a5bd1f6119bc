// engine/orchestrator.ts
// Drives one stats run over the band-type catalog:
//
//   for each band type (strictly in catalog order)
//     • glob each (pattern, sensor) pair in the working directory
//     • per contributing sensor: merged CSV  "<sensor> <band type>"
//     • one sensor  → five plots titled "<sensor> <band type>"
//       several     → five plots titled "Multi Sensor <band type>"
//     • delete every consumed stat file
//
// Any error aborts the remaining band types; nothing is retried.
//
// Example:
//
//   const results = processStats({
//     directory: "/data/order-42/stats",
//     catalog: loadCatalog(),
//     style: DEFAULT_STYLE,
//     renderer: new SvgChartRenderer(),
//   });

import * as fs from "fs";
import * as path from "path";
import { globSync } from "glob";

import type { RunOptions } from "../config/loader.js";
import { loadCatalog } from "../config/catalog.js";
import { SvgChartRenderer } from "../libs/plot.js";
import type { RangeRegistry } from "../libs/stats/src/index.js";
import { logger } from "../observability/logger.js";
import { aggregateSensorStats } from "../pipelines/aggregate.js";
import { generatePlots } from "../pipelines/plots.js";
import { makeError } from "./errors/index.js";
import type { BandTypeGroup, ChartRenderer, PlotStyle, StatRecord } from "./types.js";
import { ScpFileStager, type RemoteFileStager } from "./transfer/stager.js";

//////////////////////////////
// Public types
//////////////////////////////

export type FileFinder = (pattern: string, directory: string) => string[];

export interface ProcessContext {
  /** Where stat files are found and where CSVs/plots are written. */
  directory: string;
  catalog: readonly BandTypeGroup[];
  style: PlotStyle;
  renderer: ChartRenderer;
  ranges?: RangeRegistry;
  findFiles?: FileFinder;
}

export interface BandTypeResult {
  bandType: string;
  /** Sensor names that had at least one file, in catalog order. */
  sensors: string[];
  csvFiles: string[];
  plots: string[];
  /** Stat files read (and removed) for this band type. */
  consumed: string[];
}

export interface RunDeps {
  renderer?: ChartRenderer;
  stager?: RemoteFileStager;
  catalog?: readonly BandTypeGroup[];
  ranges?: RangeRegistry;
}

export interface RunSummary {
  directory: string;
  results: BandTypeResult[];
  /** Files pushed back to the order host (remote runs only). */
  published: string[];
}

//////////////////////////////
// Discovery
//////////////////////////////

/** Plain file names in `directory` matching `pattern`, sorted. */
export const findStatFiles: FileFinder = (pattern, directory) =>
  globSync(pattern, { cwd: directory, nodir: true, dot: false }).sort();

//////////////////////////////
// Band types
//////////////////////////////

export function processBandType(group: BandTypeGroup, ctx: ProcessContext): BandTypeResult {
  const find = ctx.findFiles ?? findStatFiles;
  const result: BandTypeResult = { bandType: group.bandType, sensors: [], csvFiles: [], plots: [], consumed: [] };
  const pool: StatRecord[] = [];

  for (const { pattern, sensor } of group.sources) {
    const files = find(pattern, ctx.directory).map((f) => path.join(ctx.directory, f));
    if (!files.length) continue;

    const agg = aggregateSensorStats(`${sensor} ${group.bandType}`, files, ctx.directory);
    result.sensors.push(sensor);
    result.csvFiles.push(agg.csvPath);
    result.consumed.push(...files);
    pool.push(...agg.records);
  }

  if (!result.sensors.length) {
    logger.debug(`No stat files for ${group.bandType}; skipping`);
    return result;
  }

  const name = result.sensors.length > 1 ? `Multi Sensor ${group.bandType}` : `${result.sensors[0]} ${group.bandType}`;
  result.plots = generatePlots(name, group.bandType, pool, {
    style: ctx.style,
    renderer: ctx.renderer,
    outDir: ctx.directory,
    ranges: ctx.ranges,
  });

  for (const file of result.consumed) {
    if (fs.existsSync(file)) fs.unlinkSync(file);
  }
  logger.info(`Processed ${group.bandType}: ${result.sensors.join(", ")}`);
  return result;
}

export function processStats(ctx: ProcessContext): BandTypeResult[] {
  return ctx.catalog.map((group) => processBandType(group, ctx));
}

//////////////////////////////
// Whole run
//////////////////////////////

/** True when `dir` is `target` or one of its ancestors. */
function encloses(dir: string, target: string): boolean {
  const rel = path.relative(dir, target);
  return rel === "" || (rel.split(path.sep)[0] !== ".." && !path.isAbsolute(rel));
}

/**
 * The work directory is wiped before and after a remote run, so it may not
 * be, or contain, the current directory or the stats directory.
 */
export function checkWorkDirectory(workDirectory: string, statsDirectory: string): string {
  const directory = path.resolve(workDirectory);
  const guarded = [
    { what: "the current directory", target: process.cwd() },
    { what: "the stats directory", target: path.resolve(statsDirectory) },
  ];
  for (const { what, target } of guarded) {
    if (encloses(directory, target)) {
      throw makeError("Config", `Work directory ${directory} would remove ${what} (${target})`, undefined, {
        workDirectory,
        guarded: target,
      });
    }
  }
  return directory;
}

/**
 * With an order directory: fetch `<order>/stats` into the work directory,
 * process it, push the results to `<order>/<work dir name>` and verify them;
 * the work directory is removed afterwards unless `keep` is set.
 * Without one: process `statsDirectory` in place.
 */
export async function runStatsPlots(opts: RunOptions, deps: RunDeps = {}): Promise<RunSummary> {
  const catalog = deps.catalog ?? loadCatalog();
  const renderer = deps.renderer ?? new SvgChartRenderer();
  const base = { catalog, style: opts.style, renderer, ranges: deps.ranges };

  if (!opts.orderDirectory) {
    const directory = path.resolve(opts.statsDirectory);
    const results = processStats({ ...base, directory });
    logger.info("Plot processing complete");
    return { directory, results, published: [] };
  }

  const stager = deps.stager ?? new ScpFileStager(opts.sourceHost);
  const directory = checkWorkDirectory(opts.workDirectory, opts.statsDirectory);
  const remoteStats = path.posix.join(opts.orderDirectory, "stats");
  const remoteOut = path.posix.join(opts.orderDirectory, path.basename(directory));

  fs.rmSync(directory, { recursive: true, force: true });
  await stager.fetch(remoteStats, directory);

  try {
    const results = processStats({ ...base, directory });
    const published = await stager.push(directory, remoteOut);
    logger.info("Plot processing complete");
    return { directory, results, published };
  } finally {
    if (!opts.keep) fs.rmSync(directory, { recursive: true, force: true });
  }
}
