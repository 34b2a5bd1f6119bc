// engine/types.ts
// Shared domain types for the stats → CSV/plot pipeline.

/* =========================
   Sensors & scenes
   ========================= */

export type SensorId = "Terra" | "Aqua" | "LT4" | "LT5" | "LE7" | "Unknown";

/** Sensors that can carry a color; `Unknown` is never plotted. */
export type KnownSensor = Exclude<SensorId, "Unknown">;

export const KNOWN_SENSORS: readonly KnownSensor[] = ["Terra", "Aqua", "LT4", "LT5", "LE7"];

export interface SceneIdentity {
  readonly year: number;
  readonly month: number;
  readonly dayOfMonth: number;
  readonly sensorId: SensorId;
}

/* =========================
   Stat records
   ========================= */

export type StatField = "minimum" | "maximum" | "mean" | "stddev";

export const STAT_FIELDS: readonly StatField[] = ["minimum", "maximum", "mean", "stddev"];

export interface StatRecord {
  /** Path the record was read from; its basename carries the scene name. */
  readonly source: string;
  /** Values exactly as written in the stat file (lowercased). */
  readonly text: Readonly<Record<StatField, string>>;
  readonly minimum: number;
  readonly maximum: number;
  readonly mean: number;
  readonly stddev: number;
}

/* =========================
   Band types
   ========================= */

export interface BandTypeRangeSpec {
  readonly dataMin: number;
  readonly dataMax: number;
  readonly scaleMin: number;
  readonly scaleMax: number;
  readonly displayMin: number;
  readonly displayMax: number;
  /** Upper bound on the number of Y-axis tick intervals. */
  readonly maxTickCount: number;
}

export interface BandTypeSource {
  readonly pattern: string;
  readonly sensor: string;
}

export interface BandTypeGroup {
  readonly bandType: string;
  readonly sources: readonly BandTypeSource[];
}

/* =========================
   Plotting
   ========================= */

export type Subject = "Minimum" | "Maximum" | "Mean" | "StdDev";

export type PlotType = "Range" | "Value";

/** One of the five charts drawn per band type. */
export interface PlotVariant {
  readonly plotType: PlotType;
  readonly subjects: readonly Subject[];
}

export type MarkerShape = "circle" | "triangle" | "square" | "diamond";

export interface PlotStyle {
  readonly sensorColors: Readonly<Record<KnownSensor, string>>;
  readonly background: string;
  readonly marker: MarkerShape;
  readonly markerSize: number;
}

export interface SensorSample {
  /** ISO date, YYYY-MM-DD */
  readonly date: string;
  readonly minimum: number;
  readonly maximum: number;
  readonly mean: number;
  readonly stddev: number;
}

export interface ChartPoint {
  readonly date: string;
  readonly value: number;
}

export interface ChartSpan {
  readonly date: string;
  readonly low: number;
  readonly high: number;
}

export interface ChartSeries {
  readonly sensor: KnownSensor;
  readonly color: string;
  readonly points: readonly ChartPoint[];
  /** Min→max segments, present on Range plots only. */
  readonly spans?: readonly ChartSpan[];
}

export interface DateAxis {
  readonly min: string;
  readonly max: string;
  readonly label: string;
}

export interface ValueAxis {
  readonly min: number;
  readonly max: number;
  readonly ticks: readonly number[];
  readonly label: string;
}

/** Everything a renderer needs; no further computation on data is expected of it. */
export interface ChartSpec {
  readonly title: string;
  readonly filename: string;
  readonly plotType: PlotType;
  readonly series: readonly ChartSeries[];
  readonly xAxis: DateAxis;
  readonly yAxis: ValueAxis;
  readonly legend: readonly KnownSensor[];
  readonly background: string;
  readonly marker: MarkerShape;
  readonly markerSize: number;
}

export interface ChartRenderer {
  /** Draws the chart into `directory` and returns the written file path. */
  render(chart: ChartSpec, directory: string): string;
}
