/**
 * Plain text table for the operator console.
 *
 * Columns are sized to the widest visible cell; numeric columns are
 * right-aligned. Cells may carry ANSI styling.
 */

import { padLeft, padRight, visibleLength } from "./style";

export type ColumnAlign = "left" | "right";

export type TableColumn = {
  header: string;
  align?: ColumnAlign;
};

export function renderTable(columns: readonly TableColumn[], rows: readonly (readonly string[])[]): string[] {
  const widths = columns.map((col, i) =>
    rows.reduce((max, row) => Math.max(max, visibleLength(row[i] ?? "")), visibleLength(col.header)),
  );

  const renderRow = (cells: readonly string[]): string =>
    columns
      .map((col, i) => {
        const cell = cells[i] ?? "";
        const width = widths[i] ?? 0;
        return col.align === "right" ? padLeft(cell, width) : padRight(cell, width);
      })
      .join("  ")
      .trimEnd();

  const header = renderRow(columns.map(c => c.header));
  const rule = widths.map(w => "-".repeat(w)).join("  ");

  return [header, rule, ...rows.map(renderRow)];
}
