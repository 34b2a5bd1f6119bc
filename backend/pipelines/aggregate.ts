// pipelines/aggregate.ts
// Merge the stat files of one sensor (or sensor group) into a single CSV
// time series.
//
// Output:
//   <label, lowercased, spaces → "_">_stats.csv
//   DATE,MINIMUM,MAXIMUM,MEAN,STDDEV
//   YYYY-MM-DD,<min>,<max>,<mean>,<stddev>      (ascending by date)

import * as fs from "fs";
import * as path from "path";

import { formatCSVRow, toCSV } from "../engine/reporting/csv.js";
import type { StatRecord } from "../engine/types.js";
import { readStatRecord, requireKnownScene, sceneDate } from "../libs/stats/src/index.js";
import { logger } from "../observability/logger.js";

export const CSV_COLUMNS = ["date", "minimum", "maximum", "mean", "stddev"] as const;
export const CSV_HEADERS = ["DATE", "MINIMUM", "MAXIMUM", "MEAN", "STDDEV"] as const;

export type AggregateResult = {
  label: string;
  csvPath: string;
  /** Parsed records, in input order; reused by the plot step. */
  records: StatRecord[];
  rows: number;
};

export function statsFilename(label: string): string {
  return `${label.replace(/ /g, "_").toLowerCase()}_stats.csv`;
}

/** CSV body lines (no header) for the records, sorted ascending. */
export function statLines(records: readonly StatRecord[]): string[] {
  const lines = records.map((rec) => {
    const date = sceneDate(requireKnownScene(rec.source));
    const line = formatCSVRow({ date, ...rec.text }, CSV_COLUMNS);
    logger.debug(`${path.basename(rec.source)} → ${line}`);
    return line;
  });
  // ISO dates lead each line, so plain string order is date order.
  return lines.sort();
}

export function renderStatTable(records: readonly StatRecord[]): string {
  const header = toCSV([], { columns: CSV_COLUMNS, headers: CSV_HEADERS, trailingEol: false });
  return [header, ...statLines(records)].join("\n");
}

/**
 * Read every stat file, write `<label>_stats.csv` into `outDir`
 * (overwriting any previous table) and hand back the parsed records.
 */
export function aggregateSensorStats(
  label: string,
  statFiles: readonly string[],
  outDir: string
): AggregateResult {
  const records = statFiles.map((f) => readStatRecord(f));
  const csvPath = path.join(outDir, statsFilename(label));
  fs.mkdirSync(outDir, { recursive: true });
  fs.writeFileSync(csvPath, renderStatTable(records), "utf8");
  logger.info(`Wrote ${records.length} row(s) → ${path.basename(csvPath)}`);
  return { label, csvPath, records, rows: records.length };
}
