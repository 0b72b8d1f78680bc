/**
 * Table Formatter Utility
 *
 * Aligned plain-text tables for list output.
 */

/**
 * Table column configuration
 */
export interface TableColumn<Row> {
  /** Column header text */
  header: string;
  /** Property key to extract from row objects */
  key: keyof Row & string;
  /** Maximum column width (truncate with ellipsis if exceeded) */
  maxWidth?: number;
}

/**
 * Truncate string with ellipsis if exceeds max width
 */
export function truncateString(str: string, maxWidth: number): string {
  const chars = [...str];
  if (chars.length <= maxWidth) {
    return str;
  }
  return chars.slice(0, Math.max(0, maxWidth - 1)).join("") + "…";
}

/**
 * Format rows as a left-aligned table with a header and a rule line
 *
 * Trailing padding is trimmed from every line.
 */
export function formatTable<Row extends Record<string, string>>(
  rows: readonly Row[],
  columns: readonly TableColumn<Row>[],
  separator = "  ",
): string {
  const cells: string[][] = rows.map((row) =>
    columns.map((col) => {
      const value: string = row[col.key];
      return col.maxWidth ? truncateString(value, col.maxWidth) : value;
    })
  );

  const widths = columns.map((col, i) =>
    Math.max([...col.header].length, ...cells.map((line) => [...line[i]].length))
  );

  const render = (values: string[]): string =>
    values.map((value, i) => value + " ".repeat(widths[i] - [...value].length))
      .join(separator)
      .trimEnd();

  return [
    render(columns.map((col) => col.header)),
    render(widths.map((w) => "-".repeat(w))),
    ...cells.map(render),
  ].join("\n");
}
