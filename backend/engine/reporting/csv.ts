// reporting/csv.ts
// Lightweight CSV helpers: stringify records and rows.
// ESM/NodeNext friendly.

/* =========================
   Types
   ========================= */

export type Cell = string | number | boolean | null | undefined;
export type Row = Record<string, Cell>;

export type ToCSVOptions = {
  /** Explicit column order. If omitted, inferred from data (stable). */
  columns?: readonly string[];
  /** Header labels, one per column (defaults to the column keys). */
  headers?: readonly string[];
  /** Include header row (default true) */
  header?: boolean;
  /** Field separator (default ",") */
  sep?: string;
  /** Line separator (default "\n") */
  eol?: string;
  /** End the last line with `eol` (default true) */
  trailingEol?: boolean;
};

/* =========================
   Internals
   ========================= */

const DEFAULT_SEP = ",";
const DEFAULT_EOL = "\n";

function stringifyCell(v: Cell): string {
  if (v === undefined || v === null) return "";
  if (typeof v === "number") return Number.isFinite(v) ? String(v) : "";
  if (typeof v === "boolean") return v ? "true" : "false";
  return v;
}

/** CSV escape per RFC4180-ish: quote if contains sep/quote/newline; double quotes inside. */
function csvEscape(raw: string, sep = DEFAULT_SEP): string {
  const mustQuote = raw.includes(sep) || raw.includes('"') || raw.includes("\n") || raw.includes("\r");
  if (!mustQuote) return raw;
  return `"${raw.replace(/"/g, '""')}"`;
}

/** Infer stable columns from rows (in insertion order across rows). */
function inferColumns(rows: readonly Row[]): string[] {
  const set = new Set<string>();
  for (const r of rows) Object.keys(r).forEach(k => set.add(k));
  return Array.from(set);
}

/* =========================
   Public API
   ========================= */

/** One CSV line (no line separator) for `row` over `columns`. */
export function formatCSVRow(row: Row, columns: readonly string[], sep = DEFAULT_SEP): string {
  return columns.map(c => csvEscape(stringifyCell(row[c]), sep)).join(sep);
}

/** Convert array of records to CSV string. */
export function toCSV(rows: readonly Row[], opts: ToCSVOptions = {}): string {
  const sep = opts.sep ?? DEFAULT_SEP;
  const eol = opts.eol ?? DEFAULT_EOL;
  const cols = (opts.columns && opts.columns.length) ? opts.columns : inferColumns(rows);
  const withHeader = opts.header !== false;

  const out: string[] = [];

  if (withHeader && cols.length) {
    const labels = opts.headers && opts.headers.length === cols.length ? opts.headers : cols;
    out.push(labels.map(h => csvEscape(h, sep)).join(sep));
  }

  for (const r of rows) out.push(formatCSVRow(r, cols, sep));

  if (!out.length) return "";
  return out.join(eol) + (opts.trailingEol === false ? "" : eol);
}
