/* =========================================================
   Scene identity: acquisition date + sensor from a filename
   ========================================================= */

import * as path from "path";

import { makeError } from "../../../engine/errors/index.js";
import type { KnownSensor, SceneIdentity } from "../../../engine/types.js";
import { formatISODate, monthDayFromDayOfYear } from "../../../utils/dates.js";

/** Year + day-of-year as encoded in a scene name. */
export interface YearDay {
  year: number;
  dayOfYear: number;
}

export interface NamingConvention {
  readonly sensor: KnownSensor;
  matches(name: string): boolean;
  yearDay(name: string): YearDay;
}

export const UNKNOWN_SCENE: SceneIdentity = {
  year: 0,
  month: 0,
  dayOfMonth: 0,
  sensorId: "Unknown",
};

function digits(name: string, start: number, end: number): number {
  const s = name.slice(start, end);
  if (!/^\d+$/.test(s)) {
    throw makeError("Data", `Scene name '${name}' has no date digits at [${start}, ${end})`, undefined, { name });
  }
  return Number(s);
}

/**
 * MODIS products: `MOD09GA.A2016033.h10v04...`, the second `.` field is
 * `A` + YYYY + DDD.
 */
class ModisConvention implements NamingConvention {
  constructor(readonly sensor: KnownSensor, private readonly prefix: string) {}

  matches(name: string) {
    return name.startsWith(this.prefix);
  }

  yearDay(name: string): YearDay {
    const field = name.split(".")[1] ?? "";
    return { year: digits(field, 1, 5), dayOfYear: digits(field, 5, 8) };
  }
}

/** Landsat scene ids: sensor(3) + path(3) + row(3) + YYYY + DDD + ... */
class LandsatConvention implements NamingConvention {
  constructor(readonly sensor: KnownSensor, private readonly tag: string) {}

  matches(name: string) {
    return name.includes(this.tag);
  }

  yearDay(name: string): YearDay {
    return { year: digits(name, 9, 13), dayOfYear: digits(name, 13, 16) };
  }
}

/** Checked in order; the first convention that matches decides. */
export const NAMING_CONVENTIONS: readonly NamingConvention[] = [
  new ModisConvention("Terra", "MOD"),
  new ModisConvention("Aqua", "MYD"),
  new LandsatConvention("LT4", "LT4"),
  new LandsatConvention("LT5", "LT5"),
  new LandsatConvention("LE7", "LE7"),
];

export function sceneFromYearDay(sensor: KnownSensor, { year, dayOfYear }: YearDay): SceneIdentity {
  const md = monthDayFromDayOfYear(year, dayOfYear);
  if (!md) {
    throw makeError("Data", `Day-of-year ${dayOfYear} does not exist in ${year}`, undefined, { year, dayOfYear });
  }
  return { year, month: md.month, dayOfMonth: md.dayOfMonth, sensorId: sensor };
}

/**
 * Resolve the scene behind a stat file. Directory parts of the path are
 * ignored. Names no convention recognizes come back as UNKNOWN_SCENE.
 */
export function resolveScene(
  filename: string,
  conventions: readonly NamingConvention[] = NAMING_CONVENTIONS
): SceneIdentity {
  const name = path.basename(filename);
  const convention = conventions.find((c) => c.matches(name));
  if (!convention) return UNKNOWN_SCENE;
  return sceneFromYearDay(convention.sensor, convention.yearDay(name));
}

export type KnownScene = SceneIdentity & { readonly sensorId: KnownSensor };

/** Like resolveScene, but an unrecognized name is a Data error. */
export function requireKnownScene(filename: string): KnownScene {
  const scene = resolveScene(filename);
  if (!isKnownScene(scene)) {
    throw makeError("Data", `Cannot determine date and sensor from '${path.basename(filename)}'`, undefined, {
      filename,
    });
  }
  return scene;
}

function isKnownScene(scene: SceneIdentity): scene is KnownScene {
  return scene.sensorId !== "Unknown";
}

export function sceneDate(scene: SceneIdentity): string {
  return formatISODate(scene.year, scene.month, scene.dayOfMonth);
}
