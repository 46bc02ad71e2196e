/**
 * Plain-text rendering of run tables.
 */
import { LAZY_DATA, type JsonValue } from "@labtrack/core";
import type { GroupedRuns } from "./grouped-runs.js";
import type { RunCollection } from "./run-collection.js";

export interface RenderOptions {
  /** Only these columns, in this order. */
  readonly columns?: readonly string[];
  /** Longer cells are cut and end in "…". */
  readonly maxCellWidth?: number;
}

const DEFAULT_CELL_WIDTH = 24;

export function formatCell(value: JsonValue | undefined, maxWidth = DEFAULT_CELL_WIDTH): string {
  let text: string;
  if (value === undefined) text = "";
  else if (value === LAZY_DATA) text = "<lazy>";
  else if (typeof value === "string") text = value;
  else text = JSON.stringify(value);
  return text.length > maxWidth ? `${text.slice(0, Math.max(0, maxWidth - 1))}…` : text;
}

/** Left-aligned columns separated by two spaces, with a dashed rule under the header. */
export function renderGrid(header: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  const line = (cells: readonly string[]) =>
    cells.map((c, i) => c.padEnd(widths[i])).join("  ").trimEnd();
  return [line(header), line(widths.map((w) => "-".repeat(w))), ...rows.map(line)].join("\n");
}

export function renderTable(runs: RunCollection, options: RenderOptions = {}): string {
  const table = runs.toTable();
  const columns = options.columns ?? table.columns;
  const rows = table.rows.map((row) => columns.map((c) => formatCell(row[c], options.maxCellWidth)));
  return renderGrid(columns, rows);
}

export function renderGroupedTable(grouped: GroupedRuns, options: RenderOptions = {}): string {
  const table = grouped.toTable();
  const columns = options.columns ?? table.columns;
  const rows = table.rows.map((row) => [
    ...row.index.map((v) => v ?? ""),
    ...columns.map((c) => formatCell(row.values[c], options.maxCellWidth)),
  ]);
  return renderGrid([...table.indexColumns, ...columns], rows);
}
