// config/loader.ts
// Run options: defaults → environment (.env via dotenv) → command-line flags.
// The result is frozen; nothing changes it once the run has started.

import dotenv from "dotenv";

import { makeError } from "../engine/errors/index.js";
import { KNOWN_SENSORS, type KnownSensor, type MarkerShape, type PlotStyle } from "../engine/types.js";

/* =========================
   Types
   ========================= */

export type RunOptions = {
  debug: boolean;
  help: boolean;
  /** Host the order lives on (scp/ssh target). */
  sourceHost: string;
  /** Remote order directory; when absent, statsDirectory is processed in place. */
  orderDirectory?: string;
  statsDirectory: string;
  /** Local staging directory for remote runs; also the remote output directory name. */
  workDirectory: string;
  keep: boolean;
  style: PlotStyle;
};

export type Flags = Record<string, string | boolean>;

/* =========================
   Defaults
   ========================= */

export const DEFAULT_STYLE: PlotStyle = Object.freeze({
  sensorColors: Object.freeze({
    Terra: "#664400", // dirt brown
    Aqua: "#00cccc",  // cyan
    LT4: "#cc3333",   // red
    LT5: "#0066cc",   // blue
    LE7: "#00cc33",   // green
  }),
  background: "#f3f3f3",
  marker: "circle",
  markerSize: 5,
});

export const DEFAULTS = {
  sourceHost: "localhost",
  statsDirectory: ".",
  workDirectory: "stats_plots",
} as const;

const MARKERS: readonly MarkerShape[] = ["circle", "triangle", "square", "diamond"];

const BOOLEAN_FLAGS = new Set(["debug", "keep", "help"]);
const VALUE_FLAGS = new Set([
  "source_host",
  "order_directory",
  "stats_directory",
  "work_directory",
  "terra_color",
  "aqua_color",
  "lt4_color",
  "lt5_color",
  "le7_color",
  "bg_color",
  "marker",
  "marker_size",
]);

const COLOR_FLAGS: Record<KnownSensor, string> = {
  Terra: "terra_color",
  Aqua: "aqua_color",
  LT4: "lt4_color",
  LT5: "lt5_color",
  LE7: "le7_color",
};

export const USAGE = `Generate plots and merged CSV tables of per-scene statistics

Usage: plot-stats [options]

  --order_directory=DIR   order directory on the source host (stats are read from DIR/stats)
  --source_host=HOST      host where the order resides (default localhost)
  --stats_directory=DIR   process DIR in place when no order directory is given (default .)
  --work_directory=DIR    local staging directory (default stats_plots)
  --terra_color=COLOR     --aqua_color=COLOR  --lt4_color=COLOR  --lt5_color=COLOR  --le7_color=COLOR
  --bg_color=COLOR        plot and legend background
  --marker=SHAPE          circle | triangle | square | diamond
  --marker_size=N         marker size in points
  --keep                  keep the staging directory
  --debug                 debug logging
  --help                  show this text`;

/* =========================
   Parsing
   ========================= */

/** `--k=v`, `--k v` and bare boolean flags. Positional arguments are rejected. */
export function parseArgs(args: readonly string[]): Flags {
  const flags: Flags = {};
  for (let i = 0; i < args.length; i++) {
    const tok = args[i] ?? "";
    if (!tok.startsWith("--")) {
      throw makeError("Config", `Unexpected argument '${tok}'`, undefined, { argument: tok });
    }
    const [key = "", ...rest] = tok.slice(2).split("=");
    if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = rest.length ? asBool(rest.join("="), key) : true;
    } else if (VALUE_FLAGS.has(key)) {
      if (rest.length) {
        flags[key] = rest.join("=");
      } else {
        const next = args[i + 1];
        if (next === undefined || next.startsWith("--")) {
          throw makeError("Config", `Option --${key} needs a value`, undefined, { option: key });
        }
        flags[key] = next;
        i++;
      }
    } else {
      throw makeError("Config", `Unknown option --${key}`, undefined, { option: key });
    }
  }
  return flags;
}

function asBool(v: string, name: string): boolean {
  const t = v.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(t)) return true;
  if (["0", "false", "no", "n", "off", ""].includes(t)) return false;
  throw makeError("Config", `Option ${name} expects a boolean, got '${v}'`, undefined, { option: name, value: v });
}

/* =========================
   Validation
   ========================= */

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;
const NAMED_COLOR = /^[a-zA-Z]+$/;

export function expectColor(v: string, name: string): string {
  const t = v.trim();
  if (HEX_COLOR.test(t) || NAMED_COLOR.test(t)) return t;
  throw makeError("Config", `${name} must be a #hex or named color, got '${v}'`, undefined, { option: name, value: v });
}

function isMarker(v: string): v is MarkerShape {
  return MARKERS.some((m) => m === v);
}

export function expectMarker(v: string, name: string): MarkerShape {
  const t = v.trim().toLowerCase();
  if (isMarker(t)) return t;
  throw makeError("Config", `${name} must be one of ${MARKERS.join(", ")}, got '${v}'`, undefined, {
    option: name,
    value: v,
  });
}

export function expectMarkerSize(v: string, name: string): number {
  const n = Number(v);
  if (v.trim() !== "" && Number.isFinite(n) && n > 0) return n;
  throw makeError("Config", `${name} must be a positive number, got '${v}'`, undefined, { option: name, value: v });
}

/* =========================
   Loading
   ========================= */

/** Read `.env` into process.env (existing variables win) and return it. */
export function loadEnvironment(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}

export function loadRunOptions(args: readonly string[], env: NodeJS.ProcessEnv = {}): RunOptions {
  const flags = parseArgs(args);
  const str = (flag: string, envName: string): string | undefined => {
    const f = flags[flag];
    if (typeof f === "string") return f;
    const e = env[envName];
    return e === undefined || e === "" ? undefined : e;
  };

  const colors: Record<KnownSensor, string> = { ...DEFAULT_STYLE.sensorColors };
  for (const sensor of KNOWN_SENSORS) {
    const flag = COLOR_FLAGS[sensor];
    const v = str(flag, `STATS_${flag.toUpperCase()}`);
    if (v !== undefined) colors[sensor] = expectColor(v, flag);
  }

  const bg = str("bg_color", "STATS_BG_COLOR");
  const marker = str("marker", "STATS_MARKER");
  const markerSize = str("marker_size", "STATS_MARKER_SIZE");

  const style: PlotStyle = Object.freeze({
    sensorColors: Object.freeze(colors),
    background: bg === undefined ? DEFAULT_STYLE.background : expectColor(bg, "bg_color"),
    marker: marker === undefined ? DEFAULT_STYLE.marker : expectMarker(marker, "marker"),
    markerSize: markerSize === undefined ? DEFAULT_STYLE.markerSize : expectMarkerSize(markerSize, "marker_size"),
  });

  return Object.freeze({
    debug: flags.debug === true || env.LOG_LEVEL === "debug",
    help: flags.help === true,
    sourceHost: str("source_host", "STATS_SOURCE_HOST") ?? DEFAULTS.sourceHost,
    orderDirectory: str("order_directory", "STATS_ORDER_DIRECTORY"),
    statsDirectory: str("stats_directory", "STATS_DIRECTORY") ?? DEFAULTS.statsDirectory,
    workDirectory: str("work_directory", "STATS_WORK_DIRECTORY") ?? DEFAULTS.workDirectory,
    keep: flags.keep === true,
    style,
  });
}
