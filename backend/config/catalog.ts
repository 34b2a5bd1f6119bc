// config/catalog.ts
// Band-type catalog: which stat files (glob patterns) feed which band type,
// and under which sensor name. The data lives in band-types.json.

import * as fs from "fs";

import { expectArray, expectObject, expectString, invariant, makeError } from "../engine/errors/index.js";
import type { BandTypeGroup, BandTypeSource } from "../engine/types.js";
import { BAND_TYPE_RANGES, RangeRegistry } from "../libs/stats/src/index.js";

export const CATALOG_URL = new URL("./band-types.json", import.meta.url);

function parseSource(v: unknown, bandType: string, i: number): BandTypeSource {
  const o = expectObject(v, `${bandType}: source #${i} must be an object`);
  return {
    pattern: expectString(o.pattern, `${bandType}: source #${i} needs a 'pattern'`),
    sensor: expectString(o.sensor, `${bandType}: source #${i} needs a 'sensor'`),
  };
}

function parseGroup(v: unknown, i: number): BandTypeGroup {
  const o = expectObject(v, `catalog entry #${i} must be an object`);
  const bandType = expectString(o.bandType, `catalog entry #${i} needs a 'bandType'`);
  const sources = expectArray(o.sources, `${bandType}: 'sources' must be an array`).map((s, j) =>
    parseSource(s, bandType, j)
  );
  return { bandType, sources };
}

/**
 * Validate a parsed catalog: shape, unique band types, and every band type
 * resolving to a registered data range.
 */
export function parseCatalog(raw: unknown, ranges: RangeRegistry = BAND_TYPE_RANGES): BandTypeGroup[] {
  const groups = expectArray(raw, "band-type catalog must be an array").map(parseGroup);
  const seen = new Set<string>();
  for (const g of groups) {
    invariant(!seen.has(g.bandType), `band type '${g.bandType}' is declared twice`, "Config");
    seen.add(g.bandType);
    ranges.resolve(g.bandType);
  }
  return groups;
}

export function loadCatalog(source: URL | string = CATALOG_URL, ranges?: RangeRegistry): BandTypeGroup[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(source, "utf8"));
  } catch (e) {
    throw makeError("Config", `Unable to read band-type catalog ${String(source)}`, e);
  }
  return parseCatalog(raw, ranges);
}
