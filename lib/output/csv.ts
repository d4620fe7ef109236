/**
 * CSV encoding for the run's tables.
 *
 * Columns are fixed per table so that identical records always produce
 * byte-identical files.
 */

export type CsvValue = string | number | null | undefined;

export type CsvColumn<T> = {
  header: string;
  value: (row: T) => CsvValue;
};

export function escapeCsvValue(value: CsvValue): string {
  if (value === null || value === undefined) return "";
  const str = typeof value === "number" ? (Number.isFinite(value) ? String(value) : "") : value;
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function toCsv<T>(columns: CsvColumn<T>[], rows: readonly T[]): string {
  const lines = [columns.map((column) => escapeCsvValue(column.header)).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvValue(column.value(row))).join(","));
  }
  return lines.join("\n") + "\n";
}
