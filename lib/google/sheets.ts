/**
 * Optional Google Sheet of registered invoices.
 *
 * Enabled by GOOGLE_SHEETS_ID. The sheet doubles as the cross-run registry:
 * invoices whose document_id or file_hash is already on it are not processed
 * again. New headers are appended below the existing data; the column row is
 * written first when the sheet is empty.
 */

import { google, type sheets_v4 } from "googleapis";
import type { GoogleAuthClient } from "@/lib/google/auth";
import type { InvoiceHeaderRecord } from "@/lib/invoices/types";
import type { Logger } from "@/lib/utils/logger";
import { INVOICE_HEADER_COLUMNS } from "@/lib/output/tables";

export type SheetCell = string | number;

export type SheetTarget = {
  spreadsheetId: string;
  sheetName: string;
};

export function createSheetsClient(auth: GoogleAuthClient) {
  return google.sheets({ version: "v4", auth });
}

/**
 * Format a sheet name for use in A1 notation range.
 * Sheet names with spaces or special characters must be quoted.
 */
export function formatSheetRange(sheetName: string, range: string = "1:1"): string {
  if (/^[A-Za-z0-9_]+$/.test(sheetName)) {
    return `${sheetName}!${range}`;
  }
  return `'${sheetName.replace(/'/g, "''")}'!${range}`;
}

/**
 * The part of `sheets.spreadsheets.values` the port calls.
 */
export type SheetValuesApi = {
  get(
    params: sheets_v4.Params$Resource$Spreadsheets$Values$Get,
    options: { timeout: number }
  ): Promise<{ data: sheets_v4.Schema$ValueRange }>;
  append(
    params: sheets_v4.Params$Resource$Spreadsheets$Values$Append,
    options: { timeout: number }
  ): Promise<{ data: sheets_v4.Schema$AppendValuesResponse }>;
};

export interface SheetsPort {
  readRows(spreadsheetId: string, range: string): Promise<string[][]>;
  /** Returns the number of rows the API reports as written. */
  appendRows(spreadsheetId: string, sheetName: string, rows: SheetCell[][]): Promise<number>;
}

export function createSheetsPort(values: SheetValuesApi, timeoutMs: number): SheetsPort {
  return {
    async readRows(spreadsheetId, range) {
      const response = await values.get({ spreadsheetId, range }, { timeout: timeoutMs });
      const rows: unknown[][] = response.data.values ?? [];
      return rows.map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
    },

    async appendRows(spreadsheetId, sheetName, rows) {
      const response = await values.append(
        {
          spreadsheetId,
          range: formatSheetRange(sheetName, "A1"),
          valueInputOption: "RAW",
          insertDataOption: "INSERT_ROWS",
          requestBody: { values: rows },
        },
        { timeout: timeoutMs }
      );
      return response.data.updates?.updatedRows ?? 0;
    },
  };
}

export function headerRecordToRow(record: InvoiceHeaderRecord): SheetCell[] {
  return INVOICE_HEADER_COLUMNS.map((column) => {
    const value = column.value(record);
    return value === null || value === undefined ? "" : value;
  });
}

export type SheetRegistry = {
  columnRow: string[];
  documentIds: ReadonlySet<string>;
  fileHashes: ReadonlySet<string>;
};

const EXPECTED_COLUMNS = INVOICE_HEADER_COLUMNS.map((column) => column.header);

export function columnRowMatches(columnRow: readonly string[]): boolean {
  return (
    columnRow.length === EXPECTED_COLUMNS.length &&
    columnRow.every((cell, index) => cell.trim() === EXPECTED_COLUMNS[index])
  );
}

/**
 * Read the invoices already on the sheet. Columns are located by name in
 * the first row, so a reordered sheet is still read correctly.
 */
export async function readSheetRegistry(port: SheetsPort, target: SheetTarget): Promise<SheetRegistry> {
  const rows = await port.readRows(target.spreadsheetId, formatSheetRange(target.sheetName, "A:Z"));
  const [columnRow = [], ...dataRows] = rows;

  const idColumn = columnRow.findIndex((cell) => cell.trim() === "document_id");
  const hashColumn = columnRow.findIndex((cell) => cell.trim() === "file_hash");

  const collect = (column: number) =>
    new Set(column === -1 ? [] : dataRows.map((row) => (row[column] ?? "").trim()).filter((value) => value !== ""));

  return { columnRow, documentIds: collect(idColumn), fileHashes: collect(hashColumn) };
}

/**
 * Append one row per header. Returns the number of data rows the API
 * reported as written. Refuses to append under a column row that does not
 * match the table layout.
 */
export async function exportHeadersToSheet(
  port: SheetsPort,
  target: SheetTarget,
  registry: SheetRegistry,
  headers: readonly InvoiceHeaderRecord[],
  logger: Logger
): Promise<number> {
  if (headers.length === 0) {
    logger.info("No new invoice headers to export to Sheets");
    return 0;
  }

  const isEmpty = registry.columnRow.every((cell) => cell.trim() === "");
  if (!isEmpty && !columnRowMatches(registry.columnRow)) {
    throw new Error(
      `Sheet "${target.sheetName}" has columns [${registry.columnRow.join(", ")}], expected [${EXPECTED_COLUMNS.join(", ")}]`
    );
  }

  const rows = headers.map(headerRecordToRow);
  if (isEmpty) {
    rows.unshift([...EXPECTED_COLUMNS]);
  }

  const written = await port.appendRows(target.spreadsheetId, target.sheetName, rows);
  const dataRows = Math.max(written - (isEmpty ? 1 : 0), 0);
  if (dataRows !== headers.length) {
    logger.warn(`Sheets reported ${dataRows} rows written for ${headers.length} headers`);
  }
  logger.info(`Appended ${dataRows} rows to sheet "${target.sheetName}"`);
  return dataRows;
}
