/**
 * Turns OCR text into invoice header and line-item records via OpenAI.
 *
 * The model response is never trusted as-is: it is parsed into a validated
 * variant and only the success branch yields records.
 */

import OpenAI from "openai";
import type { FileDescriptor, InvoiceHeaderRecord, LineItemRecord, StructuredInvoice } from "@/lib/invoices/types";
import type { OcrResult } from "@/lib/ocr/documentAi";
import type { Logger } from "@/lib/utils/logger";
import type { AiLineItem } from "@/lib/invoices/schemas";
import { aiInvoiceResponseSchema } from "@/lib/invoices/schemas";
import { deriveTaxRate } from "@/lib/invoices/amounts";
import { estimateCostUsd, MODEL_PRICES, type TokenUsage } from "@/lib/config/ai";
import { StructuringError } from "@/lib/errors";
import { getErrorMessage, getHttpStatus, getProviderCode } from "@/lib/utils/error";
import { buildStructuringPrompt, SYSTEM_PROMPT } from "@/lib/ai/prompt";

export type ChatRequest = {
  system: string;
  user: string;
};

export type ChatResult = {
  content: string | null;
  usage: TokenUsage | null;
};

export interface ChatPort {
  readonly model: string;
  complete(request: ChatRequest): Promise<ChatResult>;
}

export function createOpenAiClient(apiKey: string, options: { timeoutMs: number; maxRetries: number }): OpenAI {
  // The client retries 429 and 5xx itself, with backoff, up to maxRetries.
  return new OpenAI({ apiKey, timeout: options.timeoutMs, maxRetries: options.maxRetries });
}

export function createOpenAiChatPort(
  client: OpenAI,
  settings: { model: string; temperature: number; maxTokens: number }
): ChatPort {
  return {
    model: settings.model,
    async complete({ system, user }) {
      const response = await client.chat.completions.create({
        model: settings.model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
        response_format: { type: "json_object" },
        temperature: settings.temperature,
        max_tokens: settings.maxTokens,
      });

      const usage = response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            cachedPromptTokens: response.usage.prompt_tokens_details?.cached_tokens ?? 0,
            completionTokens: response.usage.completion_tokens,
          }
        : null;

      return { content: response.choices[0]?.message?.content ?? null, usage };
    },
  };
}

export type ParseContext = {
  file: FileDescriptor;
  fileHash: string;
};

export type ParseOutcome =
  | { ok: true; invoice: StructuredInvoice }
  | { ok: false; reason: string; preview: string };

const PREVIEW_CHARS = 300;

function extractJsonText(responseText: string): string {
  const trimmed = responseText.trim();
  const codeBlockMatch = trimmed.match(/```(?:json)?\s*(\{[\s\S]*\})\s*```/);
  if (codeBlockMatch) return codeBlockMatch[1];

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  return start !== -1 && end > start ? trimmed.slice(start, end + 1) : trimmed;
}

function isBlankLine(item: AiLineItem): boolean {
  return !item.description && item.quantity === null && item.unit_price === null && item.line_total === null;
}

/**
 * Parse and validate one model response. Missing vendor name, invoice
 * number or total amount make the whole response invalid.
 */
export function parseStructuredResponse(responseText: string, { file, fileHash }: ParseContext): ParseOutcome {
  const preview = responseText.slice(0, PREVIEW_CHARS);

  let json: unknown;
  try {
    json = JSON.parse(extractJsonText(responseText));
  } catch (error) {
    return { ok: false, reason: `response is not JSON (${getErrorMessage(error)})`, preview };
  }

  const parsed = aiInvoiceResponseSchema.safeParse(json);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return { ok: false, reason: `response does not match the invoice schema (${reason})`, preview };
  }

  const { invoice, line_items } = parsed.data;
  const header: InvoiceHeaderRecord = {
    documentId: file.id,
    fileName: file.name,
    relativePath: file.relativePath,
    fileHash,
    vendorName: invoice.vendor_name,
    vendorTaxId: invoice.vendor_tax_id,
    invoiceNumber: invoice.invoice_number,
    invoiceDate: invoice.invoice_date,
    dueDate: invoice.due_date,
    currency: invoice.currency,
    netAmount: invoice.net_amount,
    taxAmount: invoice.tax_amount,
    taxRate: deriveTaxRate(invoice.net_amount, invoice.total_amount),
    totalAmount: invoice.total_amount,
    paymentTerms: invoice.payment_terms,
  };

  const lineItems: LineItemRecord[] = line_items
    .filter((item) => !isBlankLine(item))
    .map((item, index) => ({
      documentId: file.id,
      lineNumber: index + 1,
      description: item.description ?? "",
      quantity: item.quantity,
      unitPrice: item.unit_price,
      lineTotal: item.line_total,
    }));

  return { ok: true, invoice: { header, lineItems } };
}

export type UsageTotals = {
  calls: number;
  promptTokens: number;
  completionTokens: number;
  costUsd: number;
};

export interface Structurer {
  structure(file: FileDescriptor, fileHash: string, ocr: OcrResult): Promise<StructuredInvoice>;
  usage(): UsageTotals;
}

export function createInvoiceStructurer(
  port: ChatPort,
  options: { maxInputChars: number; logger: Logger }
): Structurer {
  const { logger } = options;
  const totals: UsageTotals = { calls: 0, promptTokens: 0, completionTokens: 0, costUsd: 0 };

  if (!MODEL_PRICES[port.model]) {
    logger.warn(`No price known for model "${port.model}"; cost estimate will be 0`);
  }

  return {
    async structure(file, fileHash, ocr) {
      let result: ChatResult;
      try {
        result = await port.complete({
          system: SYSTEM_PROMPT,
          user: buildStructuringPrompt(file, ocr, options.maxInputChars),
        });
      } catch (error) {
        throw new StructuringError(
          `OpenAI request failed for ${file.name}: ${getErrorMessage(error)}`,
          { fileId: file.id, fileName: file.name, status: getHttpStatus(error), providerCode: getProviderCode(error) },
          { cause: error }
        );
      }

      totals.calls += 1;
      if (result.usage) {
        totals.promptTokens += result.usage.promptTokens;
        totals.completionTokens += result.usage.completionTokens;
        totals.costUsd += estimateCostUsd(port.model, result.usage);
      }

      if (!result.content) {
        throw new StructuringError(`Empty response from OpenAI for ${file.name}`, {
          fileId: file.id,
          fileName: file.name,
        });
      }

      const outcome = parseStructuredResponse(result.content, { file, fileHash });
      if (!outcome.ok) {
        logger.debug(`Rejected response for ${file.name}: ${outcome.preview}`);
        throw new StructuringError(`Invalid structured output for ${file.name}: ${outcome.reason}`, {
          fileId: file.id,
          fileName: file.name,
        });
      }

      logger.info(
        `Structured ${file.name}: invoice ${outcome.invoice.header.invoiceNumber}, ${outcome.invoice.lineItems.length} line items`
      );
      return outcome.invoice;
    },

    usage() {
      return { ...totals };
    },
  };
}
