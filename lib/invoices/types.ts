/**
 * Records produced by one ETL run.
 *
 * Header and line-item records are created per successfully structured PDF
 * and never mutated afterwards. They live in memory until the writer
 * materializes them.
 */

/**
 * A PDF found in the Drive folder tree.
 */
export type FileDescriptor = {
  id: string;
  name: string;
  mimeType: string;
  relativePath: string; // "" for the root folder, "2024/Q1" for nested folders
  modifiedTime: string | null;
  size: number | null;
};

export type InvoiceHeaderRecord = {
  documentId: string;
  fileName: string;
  relativePath: string;
  fileHash: string;
  vendorName: string;
  vendorTaxId: string | null;
  invoiceNumber: string;
  invoiceDate: string | null;
  dueDate: string | null;
  currency: string | null;
  netAmount: number | null;
  taxAmount: number | null;
  taxRate: number | null;
  totalAmount: number;
  paymentTerms: string | null;
};

export type LineItemRecord = {
  documentId: string; // references InvoiceHeaderRecord.documentId
  lineNumber: number; // 1-based within the invoice
  description: string;
  quantity: number | null;
  unitPrice: number | null;
  lineTotal: number | null;
};

export type StructuredInvoice = {
  header: InvoiceHeaderRecord;
  lineItems: LineItemRecord[];
};

/**
 * OCR output kept for the transformed-data artifact.
 */
export type OcrRow = {
  documentId: string;
  fileName: string;
  pageCount: number;
  textChars: number;
  fields: Record<string, string>;
};
