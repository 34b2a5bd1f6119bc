// tests/unit/plots.test.ts

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import * as path from "path";

import { DEFAULT_STYLE } from "../../config/loader.js";
import { isAppError } from "../../engine/errors/index.js";
import type { PlotVariant, StatRecord } from "../../engine/types.js";
import {
  PLOT_VARIANTS,
  buildChart,
  buildSensorSeries,
  generatePlots,
  niceTicks,
  padDateRange,
  plotFilename,
  plotTitle,
} from "../../pipelines/plots.js";
import { MemoryRenderer, landsatName, modisName } from "../../utils/testUtils.js";

function record(source: string, minimum: number, maximum: number, mean: number, stddev: number): StatRecord {
  return {
    source,
    text: { minimum: String(minimum), maximum: String(maximum), mean: String(mean), stddev: String(stddev) },
    minimum,
    maximum,
    mean,
    stddev,
  };
}

// Values chosen so every rescaled number is a short binary fraction.
const JULY = record(landsatName("LT5", 2007, 193, "_sr_band1.stats"), 0, 10000, 5000, 1250);
const JANUARY = record(landsatName("LT5", 2007, 1, "_sr_band1.stats"), 2500, 7500, 8750, 625);

const isKind = (kind: string) => (e: unknown) => isAppError(e) && e.kind === kind;

describe("naming", () => {
  it("builds titles and file names", () => {
    const title = plotTitle("Landsat 5 SR Blue", ["Minimum", "Maximum", "Mean"]);
    assert.equal(title, "Landsat 5 SR Blue - Minimum Maximum Mean");
    assert.equal(plotFilename(title), "landsat_5_sr_blue_minimum_maximum_mean_plot");
    assert.equal(plotFilename(plotTitle("Multi Sensor NDVI", ["StdDev"])), "multi_sensor_ndvi_stddev_plot");
  });
});

describe("padDateRange", () => {
  it("pads once for spans under a year", () => {
    assert.deepEqual(padDateRange("2016-01-01", "2016-06-01"), { min: "2015-12-27", max: "2016-06-06", passes: 1 });
  });

  it("pads once more per full year spanned", () => {
    assert.deepEqual(padDateRange("2015-01-10", "2016-03-01"), { min: "2014-12-31", max: "2016-03-11", passes: 2 });
  });

  it("keeps a single date off the border", () => {
    assert.deepEqual(padDateRange("2016-05-05", "2016-05-05"), { min: "2016-04-30", max: "2016-05-10", passes: 1 });
  });
});

describe("niceTicks", () => {
  it("picks a step that keeps within the interval limit", () => {
    assert.deepEqual(niceTicks(-0.025, 1.025, 12), [0, 0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1]);
    assert.deepEqual(niceTicks(-0.125, 1.025, 13), [-0.1, 0, 0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1]);
  });

  it("returns the lower bound for an empty range", () => {
    assert.deepEqual(niceTicks(1, 1, 10), [1]);
  });
});

describe("buildSensorSeries", () => {
  it("groups by sensor in first-seen order and sorts each by date", () => {
    const terra = record(modisName("MOD", 2007, 100, "_NDVI.stats"), 1, 2, 3, 4);
    const { series, dateMin, dateMax } = buildSensorSeries([JULY, terra, JANUARY]);
    assert.deepEqual([...series.keys()], ["LT5", "Terra"]);
    assert.deepEqual(
      series.get("LT5")?.map((s) => s.date),
      ["2007-01-01", "2007-07-12"]
    );
    assert.equal(dateMin, "2007-01-01");
    assert.equal(dateMax, "2007-07-12");
  });

  it("refuses an empty record set", () => {
    assert.throws(() => buildSensorSeries([]), isKind("Validation"));
  });
});

describe("buildChart", () => {
  const base = { name: "Landsat 5 SR Blue", bandType: "SR Blue", records: [JULY, JANUARY], style: DEFAULT_STYLE };

  it("describes a range plot with mean points and min→max spans", () => {
    const chart = buildChart({ ...base, variant: { plotType: "Range", subjects: ["Minimum", "Maximum", "Mean"] } });

    assert.equal(chart.title, "Landsat 5 SR Blue - Minimum Maximum Mean");
    assert.equal(chart.filename, "landsat_5_sr_blue_minimum_maximum_mean_plot");
    assert.equal(chart.plotType, "Range");
    assert.deepEqual(chart.legend, ["LT5"]);
    assert.equal(chart.series.length, 1);

    const [lt5] = chart.series;
    assert.equal(lt5?.color, "#0066cc");
    assert.deepEqual(lt5?.points, [
      { date: "2007-01-01", value: 0.875 },
      { date: "2007-07-12", value: 0.5 },
    ]);
    assert.deepEqual(lt5?.spans, [
      { date: "2007-01-01", low: 0.25, high: 0.75 },
      { date: "2007-07-12", low: 0, high: 1 },
    ]);

    assert.deepEqual(chart.xAxis, { min: "2006-12-27", max: "2007-07-17", label: "Date" });
    assert.equal(chart.yAxis.min, -0.025);
    assert.equal(chart.yAxis.max, 1.025);
    assert.equal(chart.yAxis.label, chart.title);
    assert.deepEqual(chart.yAxis.ticks, [0, 0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1]);
    assert.equal(chart.background, "#f3f3f3");
    assert.equal(chart.marker, "circle");
    assert.equal(chart.markerSize, 5);
  });

  it("plots the single subject of a value plot without spans", () => {
    const chart = buildChart({ ...base, variant: { plotType: "Value", subjects: ["StdDev"] } });
    assert.equal(chart.title, "Landsat 5 SR Blue - StdDev");
    const [lt5] = chart.series;
    assert.deepEqual(lt5?.points, [
      { date: "2007-01-01", value: 0.0625 },
      { date: "2007-07-12", value: 0.125 },
    ]);
    assert.equal(lt5?.spans, undefined);
  });

  it("gives each sensor its configured color", () => {
    const terra = record(modisName("MOD", 2016, 33, "_NDVI.stats"), -1000, 10000, 4500, 10);
    const le7 = record(landsatName("LE7", 2016, 60, "_sr_ndvi.stats"), 0, 8000, 3500, 20);
    const chart = buildChart({
      name: "Multi Sensor NDVI",
      bandType: "NDVI",
      variant: { plotType: "Value", subjects: ["Mean"] },
      records: [terra, le7],
      style: DEFAULT_STYLE,
    });
    assert.deepEqual(
      chart.series.map((s) => [s.sensor, s.color]),
      [
        ["Terra", "#664400"],
        ["LE7", "#00cc33"],
      ]
    );
    assert.equal(chart.yAxis.min, -0.125);
    assert.equal(chart.yAxis.max, 1.025);
    assert.deepEqual(chart.xAxis, { min: "2016-01-28", max: "2016-03-05", label: "Date" });
  });

  it("rejects unknown plot types", () => {
    const variant: PlotVariant = JSON.parse('{"plotType":"Bar","subjects":["Mean"]}');
    assert.throws(() => buildChart({ ...base, variant }), isKind("Validation"));
  });

  it("rejects value plots with more than one subject", () => {
    assert.throws(
      () => buildChart({ ...base, variant: { plotType: "Value", subjects: ["Mean", "Minimum"] } }),
      isKind("Validation")
    );
  });

  it("rejects band types without a data range", () => {
    assert.throws(
      () => buildChart({ ...base, bandType: "Cloud Mask", variant: { plotType: "Value", subjects: ["Mean"] } }),
      isKind("Config")
    );
  });
});

describe("generatePlots", () => {
  it("renders all five variants in order", () => {
    const renderer = new MemoryRenderer();
    const paths = generatePlots("Landsat 5 SR Blue", "SR Blue", [JULY, JANUARY], {
      style: DEFAULT_STYLE,
      renderer,
      outDir: "/out",
    });
    assert.deepEqual(paths, [
      path.join("/out", "landsat_5_sr_blue_minimum_maximum_mean_plot.svg"),
      path.join("/out", "landsat_5_sr_blue_minimum_plot.svg"),
      path.join("/out", "landsat_5_sr_blue_maximum_plot.svg"),
      path.join("/out", "landsat_5_sr_blue_mean_plot.svg"),
      path.join("/out", "landsat_5_sr_blue_stddev_plot.svg"),
    ]);
    assert.deepEqual(
      renderer.charts.map((c) => c.plotType),
      PLOT_VARIANTS.map((v) => v.plotType)
    );
  });
});
