// tests/unit/catalog.test.ts

import { after, describe, it } from "node:test";
import assert from "node:assert/strict";
import * as fs from "fs";
import * as path from "path";

import { loadCatalog, parseCatalog } from "../../config/catalog.js";
import { isAppError } from "../../engine/errors/index.js";
import { BAND_TYPE_RANGES } from "../../libs/stats/src/index.js";
import { removeDir, tmpDir } from "../../utils/testUtils.js";

const isConfig = (e: unknown) => isAppError(e) && e.kind === "Config";

describe("loadCatalog (bundled)", () => {
  const catalog = loadCatalog();

  it("lists every band type once, in processing order", () => {
    const names = catalog.map((g) => g.bandType);
    assert.equal(names.length, 29);
    assert.equal(new Set(names).size, names.length);
    assert.deepEqual(names.slice(0, 8), [
      "SR Blue",
      "SR Green",
      "SR Red",
      "SR NIR",
      "SR SWIR1",
      "SR SWIR2",
      "SR SWIR B5",
      "SR Thermal",
    ]);
    assert.equal(names[names.length - 1], "NDMI");
  });

  it("maps each band type onto a data range", () => {
    for (const g of catalog) assert.ok(BAND_TYPE_RANGES.find(g.bandType), g.bandType);
  });

  it("pairs patterns with sensor names", () => {
    const ndvi = catalog.find((g) => g.bandType === "NDVI");
    assert.deepEqual(ndvi?.sources, [
      { pattern: "LT4*_sr_ndvi.stats", sensor: "Landsat 4" },
      { pattern: "LT5*_sr_ndvi.stats", sensor: "Landsat 5" },
      { pattern: "LE7*_sr_ndvi.stats", sensor: "Landsat 7" },
      { pattern: "MOD*_NDVI.stats", sensor: "Terra" },
      { pattern: "MYD*_NDVI.stats", sensor: "Aqua" },
    ]);
  });
});

describe("parseCatalog", () => {
  const group = (bandType: string) => ({ bandType, sources: [{ pattern: "*.stats", sensor: "Terra" }] });

  it("accepts a well-formed catalog", () => {
    assert.deepEqual(parseCatalog([group("NDVI")]), [group("NDVI")]);
  });

  it("rejects duplicate band types", () => {
    assert.throws(() => parseCatalog([group("NDVI"), group("NDVI")]), isConfig);
  });

  it("rejects band types with no data range", () => {
    assert.throws(() => parseCatalog([group("Cloud Mask")]), isConfig);
  });

  it("rejects malformed entries", () => {
    assert.throws(() => parseCatalog({ bandType: "NDVI" }), isConfig);
    assert.throws(() => parseCatalog([{ bandType: "NDVI", sources: [{ sensor: "Terra" }] }]), isConfig);
    assert.throws(() => parseCatalog([{ bandType: "", sources: [] }]), isConfig);
  });
});

describe("loadCatalog (file)", () => {
  const dir = tmpDir();
  after(() => removeDir(dir));

  it("reads a catalog from a path", () => {
    const file = path.join(dir, "band-types.json");
    fs.writeFileSync(file, JSON.stringify([{ bandType: "LST Day", sources: [{ pattern: "MOD*_LST_Day_1km.stats", sensor: "Terra" }] }]));
    assert.deepEqual(
      loadCatalog(file).map((g) => g.bandType),
      ["LST Day"]
    );
  });

  it("reports unreadable or invalid files as configuration errors", () => {
    assert.throws(() => loadCatalog(path.join(dir, "missing.json")), isConfig);
    const bad = path.join(dir, "bad.json");
    fs.writeFileSync(bad, "[{");
    assert.throws(() => loadCatalog(bad), isConfig);
  });
});
