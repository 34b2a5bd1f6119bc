// tests/unit/csv.test.ts

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { formatCSVRow, toCSV } from "../../engine/reporting/csv.js";

describe("toCSV", () => {
  it("infers columns and quotes cells that need it", () => {
    assert.equal(toCSV([{ a: 1, b: "x,y" }, { b: 'say "hi"', c: true }]), 'a,b,c\n1,"x,y",\n,"say ""hi""",true\n');
  });

  it("uses header labels over column keys", () => {
    const csv = toCSV([{ date: "2016-01-01", mean: 2 }], {
      columns: ["date", "mean"],
      headers: ["DATE", "MEAN"],
      trailingEol: false,
    });
    assert.equal(csv, "DATE,MEAN\n2016-01-01,2");
  });

  it("writes just the header for zero rows with explicit columns", () => {
    assert.equal(toCSV([], { columns: ["a", "b"], trailingEol: false }), "a,b");
  });

  it("returns an empty string when there is nothing to write", () => {
    assert.equal(toCSV([]), "");
  });
});

describe("formatCSVRow", () => {
  it("blanks missing and non-finite cells", () => {
    assert.equal(formatCSVRow({ a: null, b: false, c: Number.NaN }, ["a", "b", "c", "d"]), ",false,,");
  });

  it("honours a custom separator", () => {
    assert.equal(formatCSVRow({ a: "1;2", b: 3 }, ["a", "b"], ";"), '"1;2";3');
  });
});
