/* =========================================================
   Band-type range registry
   ---------------------------------------------------------
   Band-type labels are matched by prefix ("NDVI", "Emis Band 20",
   "LST Day" ...). The table is kept longest-prefix-first so a label
   like "NBR2" can never land on the "NBR" entry.
   ========================================================= */

import { makeError } from "../../../engine/errors/index.js";
import type { BandTypeRangeSpec } from "../../../engine/types.js";

export interface RangeEntry {
  readonly prefix: string;
  readonly spec: BandTypeRangeSpec;
}

// Reflectance: 0..10000 → 0..1
const REFLECTANCE: BandTypeRangeSpec = {
  dataMin: 0,
  dataMax: 10000,
  scaleMin: 0,
  scaleMax: 1,
  displayMin: 0,
  displayMax: 1,
  maxTickCount: 12,
};

// Vegetation / burn / moisture indices: -1000..10000 → -0.1..1
const INDEX: BandTypeRangeSpec = {
  dataMin: -1000,
  dataMax: 10000,
  scaleMin: -0.1,
  scaleMax: 1,
  displayMin: -0.1,
  displayMax: 1,
  maxTickCount: 13,
};

const LST: BandTypeRangeSpec = {
  dataMin: 7500,
  dataMax: 65535,
  scaleMin: 0,
  scaleMax: 1,
  displayMin: 0,
  displayMax: 1,
  maxTickCount: 12,
};

const EMISSIVITY: BandTypeRangeSpec = {
  dataMin: 1,
  dataMax: 255,
  scaleMin: 0,
  scaleMax: 1,
  displayMin: 0,
  displayMax: 1,
  maxTickCount: 12,
};

export class RangeRegistry {
  private readonly entries: readonly RangeEntry[];

  constructor(entries: readonly RangeEntry[]) {
    for (const { prefix, spec } of entries) {
      if (!(spec.dataMax > spec.dataMin)) {
        throw makeError("Config", `Range '${prefix}' needs dataMax > dataMin`, undefined, { prefix });
      }
    }
    // Stable sort: equal-length prefixes keep their declared order.
    this.entries = Object.freeze(
      [...entries].sort((a, b) => b.prefix.length - a.prefix.length)
    );
  }

  /** Ordered as they are checked. */
  prefixes(): string[] {
    return this.entries.map((e) => e.prefix);
  }

  find(bandType: string): RangeEntry | undefined {
    return this.entries.find((e) => bandType.startsWith(e.prefix));
  }

  resolve(bandType: string): BandTypeRangeSpec {
    const entry = this.find(bandType);
    if (!entry) {
      throw makeError("Config", `No data range is registered for band type '${bandType}'`, undefined, {
        bandType,
        prefixes: this.prefixes(),
      });
    }
    return entry.spec;
  }
}

export const BAND_TYPE_RANGES = new RangeRegistry([
  { prefix: "SR", spec: REFLECTANCE },
  { prefix: "TOA", spec: REFLECTANCE },
  { prefix: "NDVI", spec: INDEX },
  { prefix: "EVI", spec: INDEX },
  { prefix: "SAVI", spec: INDEX },
  { prefix: "MSAVI", spec: INDEX },
  { prefix: "NBR", spec: INDEX },
  { prefix: "NBR2", spec: INDEX },
  { prefix: "NDMI", spec: INDEX },
  { prefix: "LST", spec: LST },
  { prefix: "Emis", spec: EMISSIVITY },
]);
