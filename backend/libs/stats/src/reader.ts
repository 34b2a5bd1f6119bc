/* =========================================================
   Stat file reader: `key=value` lines → case-insensitive map
   ========================================================= */

import * as fs from "fs";
import * as path from "path";

import { makeError } from "../../../engine/errors/index.js";
import { STAT_FIELDS, type StatField, type StatRecord } from "../../../engine/types.js";

/** A `[key, value]` pair, or a lone `[key]` when the line had no `=`. */
export type StatEntry = readonly [string] | readonly [string, string];

/** Trim + lowercase each non-empty line and split it on the first `=`. */
export function* parseStatLines(text: string): Generator<StatEntry> {
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim().toLowerCase();
    if (!line) continue;
    const eq = line.indexOf("=");
    if (eq < 0) {
      yield [line];
      continue;
    }
    yield [line.slice(0, eq), line.slice(eq + 1)];
  }
}

export function* readStats(statFile: string): Generator<StatEntry> {
  yield* parseStatLines(fs.readFileSync(statFile, "utf8"));
}

/** Every entry must be a `key=value` pair; a bare line is a Data error naming `source`. */
export function toStatMap(entries: Iterable<StatEntry>, source: string): Map<string, string> {
  const out = new Map<string, string>();
  for (const entry of entries) {
    if (entry.length !== 2) {
      throw makeError("Data", `Malformed line '${entry[0]}' in ${path.basename(source)}`, undefined, {
        source,
        line: entry[0],
      });
    }
    out.set(entry[0], entry[1]);
  }
  return out;
}

function requireField(map: ReadonlyMap<string, string>, field: StatField, source: string): string {
  const value = map.get(field);
  if (value === undefined) {
    throw makeError("Data", `Missing required key '${field}' in ${path.basename(source)}`, undefined, {
      source,
      field,
    });
  }
  return value;
}

function numeric(text: string, field: StatField, source: string): number {
  const n = Number(text);
  if (text.trim() === "" || !Number.isFinite(n)) {
    throw makeError("Data", `Key '${field}' in ${path.basename(source)} is not a number: '${text}'`, undefined, {
      source,
      field,
      value: text,
    });
  }
  return n;
}

/** Build a StatRecord from already-parsed entries; all four stat keys are required. */
export function toStatRecord(source: string, entries: Iterable<StatEntry>): StatRecord {
  const map = toStatMap(entries, source);
  const text = {
    minimum: requireField(map, "minimum", source),
    maximum: requireField(map, "maximum", source),
    mean: requireField(map, "mean", source),
    stddev: requireField(map, "stddev", source),
  };
  const [minimum, maximum, mean, stddev] = STAT_FIELDS.map((f) => numeric(text[f], f, source));
  return { source, text, minimum, maximum, mean, stddev };
}

export function readStatRecord(statFile: string): StatRecord {
  return toStatRecord(statFile, readStats(statFile));
}
