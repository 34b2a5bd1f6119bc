// tests/unit/ranges.test.ts

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { isAppError } from "../../engine/errors/index.js";
import type { BandTypeRangeSpec } from "../../engine/types.js";
import { BAND_TYPE_RANGES, RangeRegistry } from "../../libs/stats/src/index.js";

const spec = (dataMax: number): BandTypeRangeSpec => ({
  dataMin: 0,
  dataMax,
  scaleMin: 0,
  scaleMax: 1,
  displayMin: 0,
  displayMax: 1,
  maxTickCount: 10,
});

const isConfig = (e: unknown) => isAppError(e) && e.kind === "Config";

describe("BAND_TYPE_RANGES.resolve", () => {
  it("covers reflectance bands", () => {
    assert.deepEqual(BAND_TYPE_RANGES.resolve("SR Blue"), {
      dataMin: 0,
      dataMax: 10000,
      scaleMin: 0,
      scaleMax: 1,
      displayMin: 0,
      displayMax: 1,
      maxTickCount: 12,
    });
    assert.equal(BAND_TYPE_RANGES.resolve("SR Thermal").dataMax, 10000);
  });

  it("covers the vegetation indices", () => {
    for (const label of ["NDVI", "EVI", "SAVI", "MSAVI", "NBR", "NBR2", "NDMI"]) {
      const r = BAND_TYPE_RANGES.resolve(label);
      assert.equal(r.dataMin, -1000, label);
      assert.equal(r.scaleMin, -0.1, label);
      assert.equal(r.displayMin, -0.1, label);
      assert.equal(r.maxTickCount, 13, label);
    }
  });

  it("covers temperature and emissivity", () => {
    assert.equal(BAND_TYPE_RANGES.resolve("LST Day").dataMin, 7500);
    assert.equal(BAND_TYPE_RANGES.resolve("LST Night").dataMax, 65535);
    assert.equal(BAND_TYPE_RANGES.resolve("Emis Band 20").dataMin, 1);
    assert.equal(BAND_TYPE_RANGES.resolve("Emis Band 32").dataMax, 255);
  });

  it("fails for a band type with no registered range", () => {
    assert.throws(() => BAND_TYPE_RANGES.resolve("Cloud Mask"), isConfig);
  });
});

describe("RangeRegistry", () => {
  it("checks longer prefixes first", () => {
    assert.deepEqual(BAND_TYPE_RANGES.prefixes(), [
      "MSAVI",
      "NDVI",
      "SAVI",
      "NBR2",
      "NDMI",
      "Emis",
      "TOA",
      "EVI",
      "NBR",
      "LST",
      "SR",
    ]);
  });

  it("routes a label to the most specific prefix regardless of declaration order", () => {
    const short = spec(100);
    const long = spec(200);
    const forward = new RangeRegistry([
      { prefix: "NBR", spec: short },
      { prefix: "NBR2", spec: long },
    ]);
    const backward = new RangeRegistry([
      { prefix: "NBR2", spec: long },
      { prefix: "NBR", spec: short },
    ]);
    for (const reg of [forward, backward]) {
      assert.equal(reg.resolve("NBR2"), long);
      assert.equal(reg.resolve("NBR2 Landsat"), long);
      assert.equal(reg.resolve("NBR"), short);
    }
  });

  it("rejects an entry whose data range is empty", () => {
    assert.throws(() => new RangeRegistry([{ prefix: "X", spec: spec(0) }]), isConfig);
  });
});
