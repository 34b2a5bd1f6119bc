// pipelines/plots.ts
// Build the chart descriptions for one band type and hand them to a renderer.
//
// Per band type five charts are drawn (PLOT_VARIANTS):
//   • Range  – min→max segment per date + mean line, per sensor
//   • Value  – Minimum, Maximum, Mean, StdDev, one line per sensor
//
// Values are rescaled from the band type's data range onto its scale range
// before plotting; axis extents come from the display range and the observed
// dates, padded away from the plot border.

import { makeError } from "../engine/errors/index.js";
import type {
  BandTypeRangeSpec,
  ChartRenderer,
  ChartSeries,
  ChartSpec,
  KnownSensor,
  PlotStyle,
  PlotType,
  PlotVariant,
  SensorSample,
  StatRecord,
  Subject,
} from "../engine/types.js";
import { BAND_TYPE_RANGES, RangeRegistry, requireKnownScene, sceneDate, scaleSeries } from "../libs/stats/src/index.js";
import { logger } from "../observability/logger.js";
import { addDays, daysBetween } from "../utils/dates.js";

/* ---------------- constants ---------------- */

export const PLOT_VARIANTS: readonly PlotVariant[] = [
  { plotType: "Range", subjects: ["Minimum", "Maximum", "Mean"] },
  { plotType: "Value", subjects: ["Minimum"] },
  { plotType: "Value", subjects: ["Maximum"] },
  { plotType: "Value", subjects: ["Mean"] },
  { plotType: "Value", subjects: ["StdDev"] },
];

/** Space between the display range and the Y-axis edges. */
export const Y_MARGIN = 0.025;
/** Days added to each end of the date axis, once per 365 days spanned (at least once). */
export const DATE_PAD_DAYS = 5;

const SUBJECTS: readonly Subject[] = ["Minimum", "Maximum", "Mean", "StdDev"];

export function isPlotType(v: unknown): v is PlotType {
  return v === "Range" || v === "Value";
}

export function isSubject(v: unknown): v is Subject {
  return typeof v === "string" && SUBJECTS.some((s) => s === v);
}

/* ---------------- naming ---------------- */

export function plotTitle(name: string, subjects: readonly Subject[]): string {
  return [name, "-", ...subjects].join(" ");
}

export function plotFilename(title: string): string {
  return `${title.split("- ").join("").toLowerCase().replace(/ /g, "_")}_plot`;
}

/* ---------------- series ---------------- */

export type SeriesByDate = {
  series: Map<KnownSensor, SensorSample[]>;
  dateMin: string;
  dateMax: string;
};

function compareSamples(a: SensorSample, b: SensorSample): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return a.minimum - b.minimum || a.maximum - b.maximum || a.mean - b.mean || a.stddev - b.stddev;
}

/**
 * Group records by sensor (first-seen order), each sensor's samples sorted
 * by date, and track the overall date extent.
 */
export function buildSensorSeries(records: readonly StatRecord[]): SeriesByDate {
  const first = records[0];
  if (!first) throw makeError("Validation", "Cannot build a time series from zero stat records");

  const series = new Map<KnownSensor, SensorSample[]>();
  let dateMin = "";
  let dateMax = "";

  for (const rec of records) {
    const scene = requireKnownScene(rec.source);
    const date = sceneDate(scene);
    const sample: SensorSample = {
      date,
      minimum: rec.minimum,
      maximum: rec.maximum,
      mean: rec.mean,
      stddev: rec.stddev,
    };
    const list = series.get(scene.sensorId);
    if (list) list.push(sample);
    else series.set(scene.sensorId, [sample]);

    if (!dateMin || date < dateMin) dateMin = date;
    if (!dateMax || date > dateMax) dateMax = date;
  }

  for (const list of series.values()) list.sort(compareSamples);
  return { series, dateMin, dateMax };
}

/* ---------------- axes ---------------- */

/** Pad both ends by DATE_PAD_DAYS for every full 365 days spanned, plus once. */
export function padDateRange(dateMin: string, dateMax: string): { min: string; max: string; passes: number } {
  const passes = Math.floor(daysBetween(dateMin, dateMax) / 365) + 1;
  const pad = passes * DATE_PAD_DAYS;
  return { min: addDays(dateMin, -pad), max: addDays(dateMax, pad), passes };
}

const NICE_STEPS = [1, 2, 2.5, 5, 10];

/**
 * Tick positions at a "nice" step (1, 2, 2.5, 5 × 10^k) giving at most
 * `maxIntervals` intervals across [min, max].
 */
export function niceTicks(min: number, max: number, maxIntervals: number): number[] {
  if (!(max > min) || maxIntervals < 1) return [min];
  const raw = (max - min) / maxIntervals;
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  let step = magnitude * 10;
  for (const m of NICE_STEPS) {
    if (m * magnitude >= raw) {
      step = m * magnitude;
      break;
    }
  }
  // round away float noise (0.30000000000000004 and friends)
  const decimals = Math.max(0, -Math.floor(Math.log10(step)) + 2);
  const ticks: number[] = [];
  for (let i = Math.ceil(min / step - 1e-9); i * step <= max + 1e-9; i++) {
    ticks.push(Number((i * step).toFixed(decimals)));
  }
  return ticks;
}

/* ---------------- chart description ---------------- */

function subjectValues(samples: readonly SensorSample[], subject: Subject): number[] {
  switch (subject) {
    case "Minimum": return samples.map((s) => s.minimum);
    case "Maximum": return samples.map((s) => s.maximum);
    case "Mean": return samples.map((s) => s.mean);
    case "StdDev": return samples.map((s) => s.stddev);
  }
}

function validateVariant(variant: PlotVariant): Subject {
  if (!isPlotType(variant.plotType)) {
    throw makeError("Validation", `plot type '${String(variant.plotType)}' must be one of (Range, Value)`, undefined, {
      plotType: variant.plotType,
    });
  }
  if (variant.plotType === "Range") return "Mean";

  const [subject, ...extra] = variant.subjects;
  if (!isSubject(subject) || extra.length) {
    throw makeError("Validation", "Value plots take exactly one of Minimum, Maximum, Mean, StdDev", undefined, {
      subjects: variant.subjects,
    });
  }
  return subject;
}

export type ChartInput = {
  /** Sensor/group part of the title, e.g. "Landsat 5 SR Blue" or "Multi Sensor NDVI". */
  name: string;
  bandType: string;
  variant: PlotVariant;
  records: readonly StatRecord[];
  style: PlotStyle;
  ranges?: RangeRegistry;
};

export function buildChart(input: ChartInput): ChartSpec {
  const { name, bandType, variant, records, style } = input;
  const subject = validateVariant(variant);
  const range: BandTypeRangeSpec = (input.ranges ?? BAND_TYPE_RANGES).resolve(bandType);
  const { dataMin, dataMax, scaleMin, scaleMax } = range;
  const rescale = (values: number[]) => scaleSeries(values, dataMin, dataMax, scaleMin, scaleMax);

  const { series, dateMin, dateMax } = buildSensorSeries(records);

  const chartSeries: ChartSeries[] = [];
  for (const [sensor, samples] of series) {
    const dates = samples.map((s) => s.date);
    const values = rescale(subjectValues(samples, subject));
    const entry: ChartSeries = {
      sensor,
      color: style.sensorColors[sensor],
      points: dates.map((date, i) => ({ date, value: values[i] ?? 0 })),
    };
    if (variant.plotType === "Range") {
      const lows = rescale(subjectValues(samples, "Minimum"));
      const highs = rescale(subjectValues(samples, "Maximum"));
      chartSeries.push({ ...entry, spans: dates.map((date, i) => ({ date, low: lows[i] ?? 0, high: highs[i] ?? 0 })) });
    } else {
      chartSeries.push(entry);
    }
  }

  const yMin = range.displayMin - Y_MARGIN;
  const yMax = range.displayMax + Y_MARGIN;
  const x = padDateRange(dateMin, dateMax);
  logger.debug(`Date axis ${x.min} → ${x.max} (${x.passes} pad pass(es))`);

  const title = plotTitle(name, variant.subjects);
  return {
    title,
    filename: plotFilename(title),
    plotType: variant.plotType,
    series: chartSeries,
    xAxis: { min: x.min, max: x.max, label: "Date" },
    yAxis: { min: yMin, max: yMax, ticks: niceTicks(yMin, yMax, range.maxTickCount), label: title },
    legend: [...series.keys()],
    background: style.background,
    marker: style.marker,
    markerSize: style.markerSize,
  };
}

/* ---------------- drawing ---------------- */

export type PlotContext = {
  style: PlotStyle;
  renderer: ChartRenderer;
  outDir: string;
  ranges?: RangeRegistry;
};

export function generatePlot(
  name: string,
  bandType: string,
  variant: PlotVariant,
  records: readonly StatRecord[],
  ctx: PlotContext
): string {
  const chart = buildChart({ name, bandType, variant, records, style: ctx.style, ranges: ctx.ranges });
  const out = ctx.renderer.render(chart, ctx.outDir);
  logger.info(`Plotted ${chart.title}`);
  return out;
}

/** All five variants, in PLOT_VARIANTS order. */
export function generatePlots(
  name: string,
  bandType: string,
  records: readonly StatRecord[],
  ctx: PlotContext
): string[] {
  return PLOT_VARIANTS.map((variant) => generatePlot(name, bandType, variant, records, ctx));
}
