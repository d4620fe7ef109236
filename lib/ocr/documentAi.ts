/**
 * OCR through a Google Document AI processor.
 *
 * The PDF is sent inline (base64) to `processors.process`. An invoice
 * processor also returns typed entities (supplier_name, total_amount, ...);
 * those are kept as hints for the structuring prompt.
 */

import { google, type documentai_v1 } from "googleapis";
import type { GoogleAuthClient } from "@/lib/google/auth";
import type { FileDescriptor } from "@/lib/invoices/types";
import type { Logger } from "@/lib/utils/logger";
import { OcrServiceError } from "@/lib/errors";
import { getErrorMessage, getHttpStatus, getProviderCode, isTransientError } from "@/lib/utils/error";
import { withRetry } from "@/lib/utils/retry";

type DocumentAiDocument = documentai_v1.Schema$GoogleCloudDocumentaiV1Document;

export type OcrResult = {
  text: string;
  pageCount: number;
  fields: Record<string, string>;
};

export type DocumentAiProcessor = {
  projectId: string;
  location: string;
  processorId: string;
};

export function processorResourceName({ projectId, location, processorId }: DocumentAiProcessor): string {
  return `projects/${projectId}/locations/${location}/processors/${processorId}`;
}

/**
 * Non-US processors only answer on their regional endpoint.
 */
export function documentAiRootUrl(location: string): string {
  return `https://${location}-documentai.googleapis.com/`;
}

export function createDocumentAiClient(auth: GoogleAuthClient, location: string) {
  return google.documentai({ version: "v1", auth, rootUrl: documentAiRootUrl(location) });
}

export interface DocumentAiPort {
  process(content: Buffer, mimeType: string): Promise<DocumentAiDocument | null>;
}

/**
 * The part of `documentai.projects.locations.processors` the port calls.
 */
export type DocumentAiProcessorsApi = {
  process(
    params: documentai_v1.Params$Resource$Projects$Locations$Processors$Process,
    options: { timeout: number }
  ): Promise<{ data: documentai_v1.Schema$GoogleCloudDocumentaiV1ProcessResponse }>;
};

export function createDocumentAiPort(
  processors: DocumentAiProcessorsApi,
  processor: DocumentAiProcessor,
  timeoutMs: number
): DocumentAiPort {
  const name = processorResourceName(processor);
  return {
    async process(content, mimeType) {
      const response = await processors.process(
        {
          name,
          requestBody: {
            rawDocument: { content: content.toString("base64"), mimeType },
            skipHumanReview: true,
          },
        },
        { timeout: timeoutMs }
      );
      return response.data.document ?? null;
    },
  };
}

/**
 * Entity type -> mention text. The first mention of a type wins; nested
 * properties (line_item/amount) are flattened with a slash.
 */
export function collectEntityFields(document: DocumentAiDocument): Record<string, string> {
  const fields: Record<string, string> = {};

  const visit = (entities: documentai_v1.Schema$GoogleCloudDocumentaiV1DocumentEntity[], prefix: string) => {
    for (const entity of entities) {
      if (!entity.type) continue;
      const key = prefix ? `${prefix}/${entity.type}` : entity.type;
      const value = (entity.normalizedValue?.text ?? entity.mentionText ?? "").trim();
      if (value && !(key in fields)) fields[key] = value;
      if (entity.properties?.length) visit(entity.properties, key);
    }
  };

  visit(document.entities ?? [], "");
  return fields;
}

export interface TextExtractor {
  extract(file: FileDescriptor, content: Buffer): Promise<OcrResult>;
}

export type DocumentAiExtractorOptions = {
  attempts: number;
  retryBaseDelayMs: number;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export function createDocumentAiExtractor(port: DocumentAiPort, options: DocumentAiExtractorOptions): TextExtractor {
  const { logger } = options;

  return {
    async extract(file, content) {
      let document: DocumentAiDocument | null;
      try {
        document = await withRetry(() => port.process(content, file.mimeType || "application/pdf"), {
          attempts: options.attempts,
          baseDelayMs: options.retryBaseDelayMs,
          shouldRetry: isTransientError,
          sleep: options.sleep,
          onRetry: (error, attempt, delayMs) =>
            logger.warn(`OCR for ${file.name} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${getErrorMessage(error)}`),
        });
      } catch (error) {
        throw new OcrServiceError(
          `Document AI failed for ${file.name}: ${getErrorMessage(error)}`,
          { fileId: file.id, fileName: file.name, status: getHttpStatus(error), providerCode: getProviderCode(error) },
          { cause: error }
        );
      }

      const text = (document?.text ?? "").trim();
      if (!document || !text) {
        throw new OcrServiceError(`Document AI returned no text for ${file.name} (blank or unreadable scan)`, {
          fileId: file.id,
          fileName: file.name,
          providerCode: "EMPTY_TEXT",
        });
      }

      const result: OcrResult = {
        text,
        pageCount: document.pages?.length ?? 0,
        fields: collectEntityFields(document),
      };
      logger.info(
        `Extracted ${result.text.length} chars from ${file.name} (${result.pageCount} pages, ${Object.keys(result.fields).length} fields)`
      );
      return result;
    },
  };
}
