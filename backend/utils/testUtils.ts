// utils/testUtils.ts
// Shared helpers for the unit and integration tests.

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import type { ChartRenderer, ChartSpec } from "../engine/types.js";

// Compare two number arrays with tolerance
export function arraysClose(a: readonly number[], b: readonly number[], tol = 1e-9): boolean {
  if (a.length !== b.length) return false;
  return a.every((v, i) => Math.abs(v - (b[i] ?? NaN)) <= tol);
}

export function tmpDir(prefix = "stats-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export type StatValues = { minimum: number | string; maximum: number | string; mean: number | string; stddev: number | string };

/** Write a `.stats` file the way the upstream statistics step does. */
export function writeStatFile(dir: string, name: string, v: StatValues): string {
  const file = path.join(dir, name);
  const body = [
    `FILENAME=${name}`,
    `MINIMUM=${v.minimum}`,
    `MAXIMUM=${v.maximum}`,
    `MEAN=${v.mean}`,
    `STDDEV=${v.stddev}`,
    "VALID=true",
  ].join("\n");
  fs.writeFileSync(file, body + "\n", "utf8");
  return file;
}

/** Landsat scene stat file name, e.g. LT50290302007193PAC01_sr_band1.stats */
export function landsatName(sensor: "LT4" | "LT5" | "LE7", year: number, doy: number, suffix: string): string {
  return `${sensor}029030${year}${String(doy).padStart(3, "0")}PAC01${suffix}`;
}

/** MODIS granule stat file name, e.g. MOD09GA.A2016033.h10v04.005.2016035000000_sur_refl_b01.stats */
export function modisName(prefix: "MOD" | "MYD", year: number, doy: number, suffix: string): string {
  return `${prefix}09GA.A${year}${String(doy).padStart(3, "0")}.h10v04.005.2016035000000${suffix}`;
}

/** Keeps chart descriptions in memory instead of drawing them. */
export class MemoryRenderer implements ChartRenderer {
  readonly charts: ChartSpec[] = [];

  render(chart: ChartSpec, directory: string): string {
    this.charts.push(chart);
    return path.join(directory, `${chart.filename}.svg`);
  }
}
