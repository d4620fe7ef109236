/**
 * Writer tests run against a real temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { createFileOutputWriter, type OutputDirectories } from "@/lib/output/writer";
import type { InvoiceHeaderRecord, LineItemRecord, OcrRow } from "@/lib/invoices/types";
import { WriteError } from "@/lib/errors";
import { createTestLogger } from "../helpers/fakes";

const header: InvoiceHeaderRecord = {
  documentId: "doc-1",
  fileName: "inv 1.pdf",
  relativePath: "2025",
  fileHash: "hash-1",
  vendorName: "Acme, Inc.",
  vendorTaxId: "DE123",
  invoiceNumber: "INV-1",
  invoiceDate: "2025-02-01",
  dueDate: "2025-03-01",
  currency: "EUR",
  netAmount: 100,
  taxAmount: 19,
  taxRate: 0.19,
  totalAmount: 119,
  paymentTerms: "30 days",
};

const items: LineItemRecord[] = [
  { documentId: "doc-1", lineNumber: 1, description: "Widget", quantity: 2, unitPrice: 25, lineTotal: 50 },
  { documentId: "doc-1", lineNumber: 2, description: "Service", quantity: null, unitPrice: null, lineTotal: 50 },
];

const ocrRows: OcrRow[] = [
  { documentId: "doc-1", fileName: "inv 1.pdf", pageCount: 1, textChars: 42, fields: { total_amount: "119.00" } },
];

describe("createFileOutputWriter", () => {
  let root: string;
  let dirs: OutputDirectories;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "invoice-etl-writer-"));
    dirs = {
      output: path.join(root, "03_Outputs"),
      transformed: path.join(root, "02_TransformedData"),
      logs: path.join(root, "04_Logs"),
    };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const writer = () => createFileOutputWriter(dirs, createTestLogger().scope("Writer"));

  it("writes both tables under the run directory", async () => {
    const written = await writer().writeTables({ runName: "run_1", headers: [header], lineItems: items, ocrRows });

    expect(written.outputDir).toBe(path.join(dirs.output, "run_1"));
    expect(await readFile(path.join(written.outputDir, "invoice_headers.csv"), "utf8")).toBe(
      "document_id,file_name,relative_path,file_hash,vendor_name,vendor_tax_id,invoice_number,invoice_date,due_date,currency,net_amount,tax_amount,tax_rate,total_amount,payment_terms\n" +
        'doc-1,inv 1.pdf,2025,hash-1,"Acme, Inc.",DE123,INV-1,2025-02-01,2025-03-01,EUR,100,19,0.19,119,30 days\n'
    );
    expect(await readFile(path.join(written.outputDir, "invoice_line_items.csv"), "utf8")).toBe(
      "document_id,line_number,description,quantity,unit_price,line_total\n" +
        "doc-1,1,Widget,2,25,50\n" +
        "doc-1,2,Service,,,50\n"
    );
    expect(await readFile(path.join(dirs.transformed, "run_1", "ocr_results.csv"), "utf8")).toBe(
      'document_id,file_name,page_count,text_chars,ocr_fields\ndoc-1,inv 1.pdf,1,42,"{""total_amount"":""119.00""}"\n'
    );
    expect(await readdir(dirs.output)).toEqual(["run_1"]);
  });

  it("writes header-only tables for an empty run", async () => {
    const written = await writer().writeTables({ runName: "empty", headers: [], lineItems: [], ocrRows: [] });

    const lines = (await readFile(path.join(written.outputDir, "invoice_line_items.csv"), "utf8")).split("\n");
    expect(lines).toEqual(["document_id,line_number,description,quantity,unit_price,line_total", ""]);
  });

  it("refuses line items without a header", async () => {
    await expect(
      writer().writeTables({ runName: "run_1", headers: [], lineItems: items, ocrRows: [] })
    ).rejects.toThrow("Refusing to write 2 line items without a header (document doc-1)");
  });

  it("does not overwrite an existing run directory", async () => {
    await writer().writeTables({ runName: "run_1", headers: [header], lineItems: items, ocrRows });

    await expect(
      writer().writeTables({ runName: "run_1", headers: [header], lineItems: items, ocrRows })
    ).rejects.toThrow(WriteError);
  });

  it("leaves no partial tables when the destination is unwritable", async () => {
    // A regular file where the output directory should be.
    await writeFile(dirs.output, "not a directory");

    await expect(
      writer().writeTables({ runName: "run_1", headers: [header], lineItems: items, ocrRows })
    ).rejects.toThrow("Failed to write tables for run_1");
    expect(await readFile(dirs.output, "utf8")).toBe("not a directory");
  });

  it("writes the log text and JSON report", async () => {
    const files = await writer().writeRunLog({ runName: "run_1", logText: "line\n", report: { ok: true } });

    expect(files).toEqual([path.join(dirs.logs, "log_run_1.log"), path.join(dirs.logs, "run_run_1.json")]);
    expect(await readFile(files[0], "utf8")).toBe("line\n");
    expect(JSON.parse(await readFile(files[1], "utf8"))).toEqual({ ok: true });
  });
});
