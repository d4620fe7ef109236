import { describe, it, expect, vi } from "vitest";
import {
  collectEntityFields,
  createDocumentAiExtractor,
  createDocumentAiPort,
  documentAiRootUrl,
  processorResourceName,
  type DocumentAiPort,
  type DocumentAiProcessorsApi,
} from "@/lib/ocr/documentAi";
import { OcrServiceError } from "@/lib/errors";
import { createTestLogger, noSleep, pdfFile } from "../helpers/fakes";

const file = pdfFile("file-1", "invoice.pdf");
const content = Buffer.from("%PDF-1.4 test");

function extractor(port: DocumentAiPort, attempts = 2) {
  return createDocumentAiExtractor(port, {
    attempts,
    retryBaseDelayMs: 10,
    logger: createTestLogger().scope("OCR"),
    sleep: noSleep,
  });
}

describe("processor naming", () => {
  it("builds the resource name and regional endpoint", () => {
    expect(processorResourceName({ projectId: "p", location: "eu", processorId: "abc" })).toBe(
      "projects/p/locations/eu/processors/abc"
    );
    expect(documentAiRootUrl("eu")).toBe("https://eu-documentai.googleapis.com/");
  });
});

describe("collectEntityFields", () => {
  it("prefers normalized values and flattens nested properties", () => {
    const fields = collectEntityFields({
      entities: [
        { type: "supplier_name", mentionText: " Acme GmbH " },
        { type: "invoice_date", mentionText: "1. Feb 2025", normalizedValue: { text: "2025-02-01" } },
        { type: "supplier_name", mentionText: "Acme" },
        {
          type: "line_item",
          mentionText: "Widget 2 x 25",
          properties: [{ type: "amount", mentionText: "50,00" }],
        },
        { mentionText: "untyped" },
      ],
    });

    expect(fields).toEqual({
      supplier_name: "Acme GmbH",
      invoice_date: "2025-02-01",
      line_item: "Widget 2 x 25",
      "line_item/amount": "50,00",
    });
  });
});

describe("createDocumentAiExtractor", () => {
  it("returns the text, page count and fields", async () => {
    const process = vi.fn(async () => ({
      text: "  INVOICE 4711\nTotal 119.00  ",
      pages: [{}, {}],
      entities: [{ type: "total_amount", mentionText: "119.00" }],
    }));

    const result = await extractor({ process }).extract(file, content);

    expect(result).toEqual({ text: "INVOICE 4711\nTotal 119.00", pageCount: 2, fields: { total_amount: "119.00" } });
    expect(process).toHaveBeenCalledWith(content, "application/pdf");
  });

  it("retries a rate-limited request once", async () => {
    const process = vi
      .fn<DocumentAiPort["process"]>()
      .mockRejectedValueOnce(Object.assign(new Error("Quota exceeded"), { response: { status: 429 } }))
      .mockResolvedValueOnce({ text: "INVOICE", pages: [{}] });

    const result = await extractor({ process }).extract(file, content);

    expect(result.text).toBe("INVOICE");
    expect(process).toHaveBeenCalledTimes(2);
  });

  it("reports the provider status once attempts are used up", async () => {
    const quotaError = Object.assign(new Error("Quota exceeded"), {
      response: { status: 429, data: { error: { status: "RESOURCE_EXHAUSTED" } } },
    });
    const process = vi.fn(async () => {
      throw quotaError;
    });

    const error = await extractor({ process }, 2)
      .extract(file, content)
      .catch((e: unknown) => e);

    if (!(error instanceof OcrServiceError)) throw new Error("expected an OcrServiceError");
    expect(error.message).toBe("Document AI failed for invoice.pdf: Quota exceeded");
    expect(error.status).toBe(429);
    expect(error.providerCode).toBe("RESOURCE_EXHAUSTED");
    expect(error.fatal).toBe(false);
    expect(process).toHaveBeenCalledTimes(2);
  });

  it("retries a request that ran into the timeout", async () => {
    const process = vi
      .fn<DocumentAiPort["process"]>()
      .mockRejectedValueOnce(new Error("timeout of 60000ms exceeded"))
      .mockResolvedValueOnce({ text: "INVOICE", pages: [{}] });

    const result = await extractor({ process }).extract(file, content);

    expect(result.text).toBe("INVOICE");
    expect(process).toHaveBeenCalledTimes(2);
  });

  it("reports the network code when every attempt times out", async () => {
    const process = vi.fn(async () => {
      throw Object.assign(new Error("connect ETIMEDOUT"), { code: "ETIMEDOUT" });
    });

    const error = await extractor({ process }, 3)
      .extract(file, content)
      .catch((e: unknown) => e);

    if (!(error instanceof OcrServiceError)) throw new Error("expected an OcrServiceError");
    expect(error.providerCode).toBe("ETIMEDOUT");
    expect(error.status).toBeUndefined();
    expect(process).toHaveBeenCalledTimes(3);
  });

  it("does not retry an invalid document", async () => {
    const process = vi.fn(async () => {
      throw Object.assign(new Error("Invalid PDF"), { response: { status: 400 } });
    });

    await expect(extractor({ process }).extract(file, content)).rejects.toThrow(OcrServiceError);
    expect(process).toHaveBeenCalledTimes(1);
  });

  it("treats a blank scan as an OCR failure", async () => {
    const error = await extractor({ process: async () => ({ text: "  \n ", pages: [{}] }) })
      .extract(file, content)
      .catch((e: unknown) => e);

    if (!(error instanceof OcrServiceError)) throw new Error("expected an OcrServiceError");
    expect(error.providerCode).toBe("EMPTY_TEXT");
  });
});

describe("createDocumentAiPort", () => {
  it("sends the PDF inline with the request timeout", async () => {
    const processors = {
      process: vi.fn<DocumentAiProcessorsApi["process"]>(async () => ({ data: { document: { text: "INVOICE" } } })),
    };
    const port = createDocumentAiPort(processors, { projectId: "p", location: "eu", processorId: "abc" }, 60_000);

    const document = await port.process(content, "application/pdf");

    expect(document).toEqual({ text: "INVOICE" });
    expect(processors.process).toHaveBeenCalledWith(
      {
        name: "projects/p/locations/eu/processors/abc",
        requestBody: {
          rawDocument: { content: content.toString("base64"), mimeType: "application/pdf" },
          skipHumanReview: true,
        },
      },
      { timeout: 60_000 }
    );
  });

  it("returns null when the response has no document", async () => {
    const port = createDocumentAiPort(
      { process: async () => ({ data: {} }) },
      { projectId: "p", location: "us", processorId: "abc" },
      1_000
    );

    expect(await port.process(content, "application/pdf")).toBeNull();
  });
});
