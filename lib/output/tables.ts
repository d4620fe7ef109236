/**
 * Column layout of the output tables.
 */

import type { InvoiceHeaderRecord, LineItemRecord, OcrRow } from "@/lib/invoices/types";
import type { CsvColumn } from "@/lib/output/csv";

export const INVOICE_HEADER_COLUMNS: CsvColumn<InvoiceHeaderRecord>[] = [
  { header: "document_id", value: (r) => r.documentId },
  { header: "file_name", value: (r) => r.fileName },
  { header: "relative_path", value: (r) => r.relativePath },
  { header: "file_hash", value: (r) => r.fileHash },
  { header: "vendor_name", value: (r) => r.vendorName },
  { header: "vendor_tax_id", value: (r) => r.vendorTaxId },
  { header: "invoice_number", value: (r) => r.invoiceNumber },
  { header: "invoice_date", value: (r) => r.invoiceDate },
  { header: "due_date", value: (r) => r.dueDate },
  { header: "currency", value: (r) => r.currency },
  { header: "net_amount", value: (r) => r.netAmount },
  { header: "tax_amount", value: (r) => r.taxAmount },
  { header: "tax_rate", value: (r) => r.taxRate },
  { header: "total_amount", value: (r) => r.totalAmount },
  { header: "payment_terms", value: (r) => r.paymentTerms },
];

export const LINE_ITEM_COLUMNS: CsvColumn<LineItemRecord>[] = [
  { header: "document_id", value: (r) => r.documentId },
  { header: "line_number", value: (r) => r.lineNumber },
  { header: "description", value: (r) => r.description },
  { header: "quantity", value: (r) => r.quantity },
  { header: "unit_price", value: (r) => r.unitPrice },
  { header: "line_total", value: (r) => r.lineTotal },
];

export const OCR_RESULT_COLUMNS: CsvColumn<OcrRow>[] = [
  { header: "document_id", value: (r) => r.documentId },
  { header: "file_name", value: (r) => r.fileName },
  { header: "page_count", value: (r) => r.pageCount },
  { header: "text_chars", value: (r) => r.textChars },
  { header: "ocr_fields", value: (r) => JSON.stringify(r.fields) },
];

export const TABLE_FILE_NAMES = {
  headers: "invoice_headers.csv",
  lineItems: "invoice_line_items.csv",
  ocrResults: "ocr_results.csv",
} as const;

/**
 * Line items whose documentId has no header in the same run.
 */
export function findOrphanLineItems(
  headers: readonly InvoiceHeaderRecord[],
  lineItems: readonly LineItemRecord[]
): LineItemRecord[] {
  const documentIds = new Set(headers.map((h) => h.documentId));
  return lineItems.filter((item) => !documentIds.has(item.documentId));
}

/**
 * documentIds that appear on more than one header row.
 */
export function findDuplicateHeaders(headers: readonly InvoiceHeaderRecord[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const header of headers) {
    if (seen.has(header.documentId)) duplicates.add(header.documentId);
    seen.add(header.documentId);
  }
  return [...duplicates];
}
