/**
 * Builds the live Google and OpenAI clients for a run.
 *
 * Called by the orchestrator only after the credentials decoded, so each
 * client is handed just the credential it needs.
 */

import type { RunConfig } from "@/lib/config/runConfig";
import type { CredentialArtifacts } from "@/lib/credentials/loadCredentials";
import type { RunLogger } from "@/lib/utils/logger";
import type { PipelineServices } from "@/lib/pipeline/orchestrator";
import { writeCredentialFiles } from "@/lib/credentials/loadCredentials";
import {
  CLOUD_PLATFORM_SCOPE,
  DRIVE_READONLY_SCOPE,
  SHEETS_SCOPE,
  createOAuthClient,
  createServiceAccountAuth,
} from "@/lib/google/auth";
import { createDriveClient, createDriveFileStore, createDrivePort } from "@/lib/google/drive";
import { createSheetsClient, createSheetsPort } from "@/lib/google/sheets";
import { createDocumentAiClient, createDocumentAiExtractor, createDocumentAiPort } from "@/lib/ocr/documentAi";
import { createInvoiceStructurer, createOpenAiChatPort, createOpenAiClient } from "@/lib/ai/structurer";
import { ConfigError } from "@/lib/errors";

export async function createLiveServices(
  config: RunConfig,
  credentials: CredentialArtifacts,
  logger: RunLogger
): Promise<PipelineServices> {
  if (config.directories.credentials) {
    const written = await writeCredentialFiles(credentials, config.directories.credentials);
    logger.scope("Credentials").info(`Wrote ${written.length} credential files to ${config.directories.credentials}`);
  }

  const projectId = config.documentAi.projectId ?? credentials.serviceAccountKey.project_id;
  if (!projectId) {
    throw new ConfigError("DOCUMENTAI_PROJECT_ID is not set and the service account key has no project_id", {
      variable: "DOCUMENTAI_PROJECT_ID",
    });
  }

  const driveAuth =
    config.drive.auth === "oauth"
      ? createOAuthClient(credentials)
      : createServiceAccountAuth(credentials.serviceAccountKey, [DRIVE_READONLY_SCOPE]);

  const files = createDriveFileStore(createDrivePort(createDriveClient(driveAuth).files, config.requestTimeoutMs), {
    pageSize: config.drive.pageSize,
    listAttempts: config.drive.listAttempts,
    retryBaseDelayMs: config.retryBaseDelayMs,
    logger: logger.scope("Drive"),
  });

  const ocrAuth = createServiceAccountAuth(credentials.serviceAccountKey, [CLOUD_PLATFORM_SCOPE]);
  const extractor = createDocumentAiExtractor(
    createDocumentAiPort(
      createDocumentAiClient(ocrAuth, config.documentAi.location).projects.locations.processors,
      { projectId, location: config.documentAi.location, processorId: config.documentAi.processorId },
      config.requestTimeoutMs
    ),
    {
      attempts: config.documentAi.attempts,
      retryBaseDelayMs: config.retryBaseDelayMs,
      logger: logger.scope("OCR"),
    }
  );

  const openai = createOpenAiClient(config.openai.apiKey, {
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.openai.maxRetries,
  });
  const structurer = createInvoiceStructurer(
    createOpenAiChatPort(openai, {
      model: config.openai.model,
      temperature: config.openai.temperature,
      maxTokens: config.openai.maxTokens,
    }),
    { maxInputChars: config.openai.maxInputChars, logger: logger.scope("AI") }
  );

  const sheets = config.sheets
    ? {
        port: createSheetsPort(
          createSheetsClient(createServiceAccountAuth(credentials.serviceAccountKey, [SHEETS_SCOPE])).spreadsheets.values,
          config.requestTimeoutMs
        ),
        spreadsheetId: config.sheets.spreadsheetId,
        sheetName: config.sheets.sheetName,
      }
    : null;

  return { files, extractor, structurer, sheets };
}
