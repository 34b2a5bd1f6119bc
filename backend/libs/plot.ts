// libs/plot.ts
// SVG chart renderer for the stats trend plots, no external deps.
// Works with NodeNext/ESM. Import with: import { SvgChartRenderer } from "../libs/plot.js"

import * as fs from "fs";
import * as path from "path";

import type { ChartRenderer, ChartSeries, ChartSpec, MarkerShape } from "../engine/types.js";
import { fromDayNumber, toDayNumber } from "../utils/dates.js";

/* ========================= Types ========================= */

export type SvgLayout = {
  width: number;           // px (default 1100, 11in at 100dpi)
  height: number;          // px (default 850, 8.5in at 100dpi)
  margin: { top: number; right: number; bottom: number; left: number };
  strokeWidth: number;     // series line width
  gridColor: string;
  legendHeight: number;
};

export const DEFAULT_LAYOUT: SvgLayout = {
  width: 1100,
  height: 850,
  margin: { top: 85, right: 88, bottom: 85, left: 110 },
  strokeWidth: 1,
  gridColor: "#b0b0b0",
  legendHeight: 30,
};

export type DateTick = { date: string; label: string };

/* ====================== Helpers ======================= */

export function escapeXml(s: string): string {
  return s.replace(/[<&>"]/g, (c) => {
    switch (c) {
      case "<": return "&lt;";
      case ">": return "&gt;";
      case "&": return "&amp;";
      default: return "&quot;";
    }
  });
}

export function formatTick(v: number): string {
  const a = Math.abs(v);
  if (a >= 1e3) return v.toFixed(0);
  return Number.isInteger(v) ? v.toFixed(1) : String(Number(v.toFixed(3)));
}

/**
 * Date ticks between two ISO dates: yearly for long spans, every
 * 1–6 months for medium ones, weekly otherwise.
 */
export function dateTicks(min: string, max: string): DateTick[] {
  const d0 = toDayNumber(min);
  const d1 = toDayNumber(max);
  const span = d1 - d0;
  const ticks: DateTick[] = [];

  if (span > 3 * 365) {
    const step = Math.max(1, Math.ceil(span / 365 / 10));
    for (let y = Number(min.slice(0, 4)) + 1; ; y += step) {
      const date = `${String(y).padStart(4, "0")}-01-01`;
      if (toDayNumber(date) > d1) break;
      ticks.push({ date, label: String(y) });
    }
    return ticks;
  }

  if (span > 60) {
    const months = span / 30.44;
    const step = months > 24 ? 6 : months > 12 ? 3 : months > 6 ? 2 : 1;
    let y = Number(min.slice(0, 4));
    let m = Number(min.slice(5, 7)) + 1;
    for (;;) {
      while (m > 12) { m -= 12; y += 1; }
      const date = `${String(y).padStart(4, "0")}-${String(m).padStart(2, "0")}-01`;
      if (toDayNumber(date) > d1) break;
      if ((m - 1) % step === 0) ticks.push({ date, label: date.slice(0, 7) });
      m += 1;
    }
    return ticks;
  }

  for (let d = d0 + 1; d < d1; d += 7) {
    const date = fromDayNumber(d);
    ticks.push({ date, label: date });
  }
  return ticks;
}

/* ===================== Drawing surface ===================== */

/** One chart's worth of SVG fragments; released once the file is written. */
class SvgSurface {
  private parts: string[] = [];

  add(fragment: string) {
    this.parts.push(fragment);
  }

  markup(width: number, height: number): string {
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
      ...this.parts,
      "</svg>",
    ].join("\n");
  }

  release() {
    this.parts = [];
  }
}

function markerMarkup(shape: MarkerShape, x: number, y: number, size: number, color: string): string {
  const r = size * 0.7;
  const fx = (n: number) => n.toFixed(2);
  switch (shape) {
    case "circle":
      return `<circle cx="${fx(x)}" cy="${fx(y)}" r="${fx(r)}" fill="${color}" />`;
    case "square":
      return `<rect x="${fx(x - r)}" y="${fx(y - r)}" width="${fx(2 * r)}" height="${fx(2 * r)}" fill="${color}" />`;
    case "triangle":
      return `<polygon points="${fx(x)},${fx(y - r)} ${fx(x + r)},${fx(y + r)} ${fx(x - r)},${fx(y + r)}" fill="${color}" />`;
    case "diamond":
      return `<polygon points="${fx(x)},${fx(y - r)} ${fx(x + r)},${fx(y)} ${fx(x)},${fx(y + r)} ${fx(x - r)},${fx(y)}" fill="${color}" />`;
  }
}

/* ===================== SVG renderer ===================== */

export class SvgChartRenderer implements ChartRenderer {
  constructor(private readonly layout: SvgLayout = DEFAULT_LAYOUT) {}

  /** Chart → SVG markup string (no DOM, no canvas). */
  toSvg(chart: ChartSpec): string {
    const surface = new SvgSurface();
    try {
      this.draw(surface, chart);
      return surface.markup(this.layout.width, this.layout.height);
    } finally {
      surface.release();
    }
  }

  render(chart: ChartSpec, directory: string): string {
    return writeSVG(this.toSvg(chart), path.join(directory, `${chart.filename}.svg`));
  }

  private draw(s: SvgSurface, chart: ChartSpec) {
    const { width, height, margin: m, strokeWidth, gridColor, legendHeight } = this.layout;
    const innerW = width - m.left - m.right;
    const innerH = height - m.top - m.bottom;
    const x0 = toDayNumber(chart.xAxis.min);
    const xSpan = toDayNumber(chart.xAxis.max) - x0 || 1;
    const ySpan = chart.yAxis.max - chart.yAxis.min || 1;
    const px = (date: string) => m.left + ((toDayNumber(date) - x0) / xSpan) * innerW;
    const py = (v: number) => m.top + (1 - (v - chart.yAxis.min) / ySpan) * innerH;
    const f = (n: number) => n.toFixed(2);

    s.add(`<rect x="0" y="0" width="${width}" height="${height}" fill="#ffffff" />`);
    s.add(`<rect x="${m.left}" y="${m.top}" width="${innerW}" height="${innerH}" fill="${chart.background}" stroke="#000000" />`);

    // Y grid + labels
    for (const t of chart.yAxis.ticks) {
      const yy = f(py(t));
      s.add(`<line x1="${m.left}" y1="${yy}" x2="${m.left + innerW}" y2="${yy}" stroke="${gridColor}" />`);
      s.add(`<text x="${m.left - 6}" y="${f(py(t) + 4)}" text-anchor="end" font-size="12">${formatTick(t)}</text>`);
    }

    // X ticks
    for (const t of dateTicks(chart.xAxis.min, chart.xAxis.max)) {
      const xx = f(px(t.date));
      s.add(`<line x1="${xx}" y1="${m.top + innerH}" x2="${xx}" y2="${m.top + innerH + 5}" stroke="#000000" />`);
      s.add(`<text x="${xx}" y="${m.top + innerH + 20}" text-anchor="middle" font-size="12">${escapeXml(t.label)}</text>`);
    }

    s.add(`<text x="${m.left + innerW / 2}" y="${height - m.bottom / 3}" text-anchor="middle" font-size="14">${escapeXml(chart.xAxis.label)}</text>`);
    s.add(
      `<text x="${m.left / 3}" y="${m.top + innerH / 2}" text-anchor="middle" font-size="14" transform="rotate(-90 ${m.left / 3} ${m.top + innerH / 2})">${escapeXml(chart.yAxis.label)}</text>`
    );

    // Data
    for (const series of chart.series) {
      for (const span of series.spans ?? []) {
        const xx = f(px(span.date));
        s.add(`<line x1="${xx}" y1="${f(py(span.low))}" x2="${xx}" y2="${f(py(span.high))}" stroke="${series.color}" stroke-width="1" />`);
      }
      this.drawSeries(s, series, chart, px, py, strokeWidth);
    }

    this.drawLegend(s, chart, m.left, m.top - legendHeight - 4, innerW, legendHeight);
  }

  private drawSeries(
    s: SvgSurface,
    series: ChartSeries,
    chart: ChartSpec,
    px: (date: string) => number,
    py: (v: number) => number,
    strokeWidth: number
  ) {
    if (!series.points.length) return;
    const d = series.points
      .map((p, i) => `${i === 0 ? "M" : "L"}${px(p.date).toFixed(2)},${py(p.value).toFixed(2)}`)
      .join(" ");
    s.add(`<path d="${d}" fill="none" stroke="${series.color}" stroke-width="${strokeWidth}" />`);
    for (const p of series.points) {
      s.add(markerMarkup(chart.marker, px(p.date), py(p.value), chart.markerSize, series.color));
    }
  }

  private drawLegend(s: SvgSurface, chart: ChartSpec, x: number, y: number, w: number, h: number) {
    s.add(`<rect x="${x}" y="${y}" width="${w}" height="${h}" fill="${chart.background}" stroke="#000000" />`);
    const colW = w / 5;
    chart.legend.forEach((sensor, i) => {
      const color = chart.series.find((ser) => ser.sensor === sensor)?.color ?? "#000000";
      const cx = x + (i % 5) * colW + 20;
      const cy = y + h / 2;
      s.add(`<line x1="${cx - 12}" y1="${cy}" x2="${cx + 12}" y2="${cy}" stroke="${color}" />`);
      s.add(markerMarkup(chart.marker, cx, cy, chart.markerSize, color));
      s.add(`<text x="${cx + 18}" y="${cy + 4}" font-size="12">${escapeXml(sensor)}</text>`);
    });
  }
}

export function writeSVG(svg: string, outPath: string): string {
  const dir = path.dirname(outPath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(outPath, svg, "utf8");
  return outPath;
}
