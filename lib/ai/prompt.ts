/**
 * Fixed instruction template for invoice structuring.
 */

import type { FileDescriptor } from "@/lib/invoices/types";
import type { OcrResult } from "@/lib/ocr/documentAi";

export const SYSTEM_PROMPT =
  "You are a highly accurate Invoice Extraction Engine. Always respond with valid JSON only, no explanations.";

export const TRUNCATION_MARKER = "\n[...text truncated...]";

function formatOcrFields(fields: Record<string, string>): string {
  const entries = Object.entries(fields);
  if (entries.length === 0) return "(none)";
  return entries.map(([key, value]) => `- ${key}: ${value}`).join("\n");
}

export function truncateText(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) + TRUNCATION_MARKER : text;
}

export function buildStructuringPrompt(file: FileDescriptor, ocr: OcrResult, maxChars: number): string {
  return `Extract the invoice header and every billable line from the OCR text of one invoice.

Rules:
- Copy identifiers (invoice number, tax id) exactly as printed.
- Dates as YYYY-MM-DD when the date is unambiguous, otherwise as printed.
- Amounts as numbers without currency symbols. Use null when a value is not on the invoice.
- currency as an ISO 4217 code (EUR, USD, ...).
- net_amount is the total before tax, tax_amount the total tax, total_amount the amount payable.
- One entry in line_items per billable line; do not add subtotal, tax or total lines.
- The OCR hints below come from an automatic parser and may be wrong; the text wins.

FILE NAME:
${file.name}

OCR HINTS:
${formatOcrFields(ocr.fields)}

OCR TEXT (${ocr.pageCount} pages):
${truncateText(ocr.text, maxChars)}

RETURN JSON EXACTLY IN THIS FORMAT:

{
  "invoice": {
    "vendor_name": "",
    "vendor_tax_id": "",
    "invoice_number": "",
    "invoice_date": "",
    "due_date": "",
    "currency": "EUR",
    "net_amount": 0,
    "tax_amount": 0,
    "total_amount": 0,
    "payment_terms": ""
  },
  "line_items": [
    {
      "description": "",
      "quantity": 0,
      "unit_price": 0,
      "line_total": 0
    }
  ]
}

Return ONLY JSON.`;
}
