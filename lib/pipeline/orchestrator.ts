/**
 * Drives one ETL run.
 *
 *   Init -> ListingFiles -> ProcessingFile(0..n) -> WritingOutputs -> Done
 *
 * Failed is reachable from Init (credentials), ListingFiles (listing retries
 * exhausted) and WritingOutputs (unwritable destination). A failure while
 * processing one file is logged and the next file is processed.
 */

import type { CredentialArtifacts } from "@/lib/credentials/loadCredentials";
import type { FileStore } from "@/lib/google/drive";
import type { SheetRegistry, SheetsPort } from "@/lib/google/sheets";
import type { FileDescriptor, InvoiceHeaderRecord, LineItemRecord, OcrRow } from "@/lib/invoices/types";
import type { TextExtractor } from "@/lib/ocr/documentAi";
import type { Structurer, UsageTotals } from "@/lib/ai/structurer";
import type { OutputWriter, RunLogInput } from "@/lib/output/writer";
import type { RunLogger } from "@/lib/utils/logger";
import type { PipelineErrorKind } from "@/lib/errors";
import { isPipelineError } from "@/lib/errors";
import { exportHeadersToSheet, readSheetRegistry } from "@/lib/google/sheets";
import { sha256Buffer } from "@/lib/invoices/fileHash";
import { RunLog, type RunLogEntry } from "@/lib/output/runLog";
import { getErrorMessage } from "@/lib/utils/error";

export type RunState =
  | { name: "Init" }
  | { name: "ListingFiles" }
  | { name: "ProcessingFile"; index: number; fileId: string }
  | { name: "WritingOutputs" }
  | { name: "Done" }
  | { name: "Failed"; from: "Init" | "ListingFiles" | "WritingOutputs" };

export function formatState(state: RunState): string {
  switch (state.name) {
    case "ProcessingFile":
      return `ProcessingFile(${state.index})`;
    case "Failed":
      return `Failed(${state.from})`;
    default:
      return state.name;
  }
}

export type PipelineServices = {
  files: FileStore;
  extractor: TextExtractor;
  structurer: Structurer;
  sheets: { port: SheetsPort; spreadsheetId: string; sheetName: string } | null;
};

export type PipelineOptions = {
  runName: string;
  folderId: string;
  maxFiles: number | null;
};

export type PipelineDeps = {
  options: PipelineOptions;
  loadCredentials: () => CredentialArtifacts;
  createServices: (credentials: CredentialArtifacts) => PipelineServices | Promise<PipelineServices>;
  writer: OutputWriter;
  logger: RunLogger;
  now?: () => Date;
  onStateChange?: (state: RunState) => void;
};

export type RunSummary = {
  runName: string;
  state: "Done" | "Failed";
  transitions: string[];
  startedAt: string;
  finishedAt: string;
  filesListed: number;
  filesSucceeded: number;
  filesFailed: number;
  filesSkipped: number;
  headers: number;
  lineItems: number;
  ai: UsageTotals | null;
  sheetsRows: number | null;
  outputDir: string | null;
  logFiles: string[];
  error: { kind: PipelineErrorKind | "UnexpectedError"; message: string } | null;
  exitCode: 0 | 1;
};

export type RunReport = RunSummary & { entries: readonly RunLogEntry[] };

class StageFailure extends Error {
  constructor(readonly from: "Init" | "ListingFiles" | "WritingOutputs", readonly original: unknown) {
    super(getErrorMessage(original));
  }
}

export async function runInvoicePipeline(deps: PipelineDeps): Promise<RunSummary> {
  const now = deps.now ?? (() => new Date());
  const log = deps.logger.scope("Pipeline");
  const runLog = new RunLog(now);
  const startedAt = now();
  const transitions: string[] = [];

  const headers: InvoiceHeaderRecord[] = [];
  const lineItems: LineItemRecord[] = [];
  const ocrRows: OcrRow[] = [];

  const seenIds = new Set<string>();
  const seenHashes = new Map<string, string>(); // sha256 -> first file name

  let services: PipelineServices | null = null;
  let registry: SheetRegistry | null = null;
  let filesListed = 0;
  let sheetsRows: number | null = null;
  let outputDir: string | null = null;
  let logFiles: string[] = [];

  const enter = (state: RunState) => {
    transitions.push(formatState(state));
    deps.onStateChange?.(state);
    log.debug(`State -> ${formatState(state)}`);
  };

  const summarize = (
    state: "Done" | "Failed",
    error: RunSummary["error"]
  ): RunSummary => ({
    runName: deps.options.runName,
    state,
    transitions: [...transitions],
    startedAt: startedAt.toISOString(),
    finishedAt: now().toISOString(),
    filesListed,
    filesSucceeded: runLog.count("succeeded"),
    filesFailed: runLog.count("failed"),
    filesSkipped: runLog.count("skipped"),
    headers: headers.length,
    lineItems: lineItems.length,
    ai: services ? services.structurer.usage() : null,
    sheetsRows,
    outputDir,
    logFiles,
    error,
    exitCode: state === "Done" ? 0 : 1,
  });

  const report = (summary: RunSummary): RunReport => ({ ...summary, entries: runLog.all() });

  try {
    // Init: nothing that touches the network exists until credentials decode.
    enter({ name: "Init" });
    const active = await initialize();
    services = active;
    const { files, structurer } = active;

    enter({ name: "ListingFiles" });
    registry = await loadRegistry(active);
    log.info(`Listing PDFs in Drive folder ${deps.options.folderId}`);

    try {
      for await (const file of files.listPdfFiles(deps.options.folderId)) {
        if (deps.options.maxFiles !== null && filesListed >= deps.options.maxFiles) {
          log.info(`MAX_FILES=${deps.options.maxFiles} reached; remaining files are left for the next run`);
          break;
        }

        const index = filesListed++;
        enter({ name: "ProcessingFile", index, fileId: file.id });

        if (seenIds.has(file.id)) {
          runLog.skipped(file, "listed twice (file has more than one parent folder)");
          continue;
        }
        seenIds.add(file.id);

        if (registry?.documentIds.has(file.id)) {
          runLog.skipped(file, "already registered in the sheet");
          continue;
        }

        await processFile(active, file);
      }
    } catch (error) {
      if (error instanceof StageFailure) throw error;
      throw new StageFailure("ListingFiles", error);
    }

    enter({ name: "WritingOutputs" });
    log.info(
      `Processed ${filesListed} files: ${runLog.count("succeeded")} succeeded, ${runLog.count("failed")} failed, ${runLog.count("skipped")} skipped`
    );

    try {
      const written = await deps.writer.writeTables({
        runName: deps.options.runName,
        headers,
        lineItems,
        ocrRows,
      });
      outputDir = written.outputDir;
    } catch (error) {
      throw new StageFailure("WritingOutputs", error);
    }

    // Only a run whose tables are on disk registers its invoices.
    if (active.sheets && registry) {
      try {
        sheetsRows = await exportHeadersToSheet(
          active.sheets.port,
          { spreadsheetId: active.sheets.spreadsheetId, sheetName: active.sheets.sheetName },
          registry,
          headers,
          deps.logger.scope("Sheets")
        );
      } catch (error) {
        log.warn(`Sheets export failed: ${getErrorMessage(error)}`);
      }
    }

    const usage = structurer.usage();
    log.info(`OpenAI usage: ${usage.calls} calls, ${usage.promptTokens + usage.completionTokens} tokens, ~$${usage.costUsd.toFixed(4)}`);
    log.info(`Run ${deps.options.runName} finished`);

    try {
      const final = summarize("Done", null);
      logFiles = await deps.writer.writeRunLog({
        runName: deps.options.runName,
        logText: deps.logger.render(),
        report: report({ ...final, transitions: [...final.transitions, "Done"] }),
      });
    } catch (error) {
      throw new StageFailure("WritingOutputs", error);
    }

    enter({ name: "Done" });
    return summarize("Done", null);
  } catch (error) {
    if (!(error instanceof StageFailure)) throw error;

    const original = error.original;
    const kind = isPipelineError(original) ? original.kind : "UnexpectedError";
    log.error(`Run failed during ${error.from}: ${getErrorMessage(original)}`);
    enter({ name: "Failed", from: error.from });

    const failed = summarize("Failed", { kind, message: getErrorMessage(original) });
    try {
      // The log is the main diagnostic for a failed run; write it even
      // when the tables could not be written.
      logFiles = await deps.writer.writeRunLog({
        runName: deps.options.runName,
        logText: deps.logger.render(),
        report: report(failed),
      });
    } catch (logError) {
      log.warn(`Could not write the run log: ${getErrorMessage(logError)}`);
    }
    return { ...failed, logFiles };
  }

  async function initialize(): Promise<PipelineServices> {
    try {
      const credentials = deps.loadCredentials();
      return await deps.createServices(credentials);
    } catch (error) {
      throw new StageFailure("Init", error);
    }
  }

  /**
   * Invoices already on the sheet are skipped. When the sheet cannot be
   * read, this run neither skips nor exports.
   */
  async function loadRegistry(active: PipelineServices): Promise<SheetRegistry | null> {
    if (!active.sheets) return null;
    const sheetsLog = deps.logger.scope("Sheets");
    try {
      const loaded = await readSheetRegistry(active.sheets.port, {
        spreadsheetId: active.sheets.spreadsheetId,
        sheetName: active.sheets.sheetName,
      });
      sheetsLog.info(`${loaded.documentIds.size} invoices already registered in sheet "${active.sheets.sheetName}"`);
      return loaded;
    } catch (error) {
      sheetsLog.warn(`Could not read sheet "${active.sheets.sheetName}"; export disabled for this run: ${getErrorMessage(error)}`);
      return null;
    }
  }

  async function processFile(active: PipelineServices, file: FileDescriptor): Promise<void> {
    const fileLog = deps.logger.scope("File");
    const started = now().getTime();

    try {
      const content = await active.files.downloadFile(file);
      const fileHash = sha256Buffer(content);

      const duplicateOf = seenHashes.get(fileHash);
      if (duplicateOf !== undefined) {
        runLog.skipped(file, `same content as ${duplicateOf}`);
        fileLog.info(`Skipping ${file.name}: same content as ${duplicateOf}`);
        return;
      }
      seenHashes.set(fileHash, file.name);

      if (registry?.fileHashes.has(fileHash)) {
        runLog.skipped(file, "same content is already registered in the sheet");
        fileLog.info(`Skipping ${file.name}: same content is already registered in the sheet`);
        return;
      }

      const ocr = await active.extractor.extract(file, content);
      ocrRows.push({
        documentId: file.id,
        fileName: file.name,
        pageCount: ocr.pageCount,
        textChars: ocr.text.length,
        fields: ocr.fields,
      });

      const invoice = await active.structurer.structure(file, fileHash, ocr);
      headers.push(invoice.header);
      lineItems.push(...invoice.lineItems);
      runLog.succeeded(file, { lineItemCount: invoice.lineItems.length }, now().getTime() - started);
    } catch (error) {
      if (isPipelineError(error) && error.fatal) throw error;
      const entry = runLog.failed(file, error, now().getTime() - started);
      fileLog.error(`${file.name} failed (${entry.errorKind}): ${entry.message}`);
    }
  }
}

/**
 * Record a run that stopped before Init because its configuration was
 * invalid. The log and report go to the usual place so the uploaded
 * artifacts explain the failure.
 */
export async function recordConfigFailure(deps: {
  runName: string;
  error: unknown;
  writeRunLog: (input: RunLogInput) => Promise<string[]>;
  logger: RunLogger;
  now?: () => Date;
}): Promise<RunSummary> {
  const now = deps.now ?? (() => new Date());
  const log = deps.logger.scope("Config");
  const at = now().toISOString();
  const message = getErrorMessage(deps.error);
  log.error(message);

  const summary: RunSummary = {
    runName: deps.runName,
    state: "Failed",
    transitions: ["Init", "Failed(Init)"],
    startedAt: at,
    finishedAt: at,
    filesListed: 0,
    filesSucceeded: 0,
    filesFailed: 0,
    filesSkipped: 0,
    headers: 0,
    lineItems: 0,
    ai: null,
    sheetsRows: null,
    outputDir: null,
    logFiles: [],
    error: { kind: isPipelineError(deps.error) ? deps.error.kind : "UnexpectedError", message },
    exitCode: 1,
  };

  try {
    const logFiles = await deps.writeRunLog({
      runName: deps.runName,
      logText: deps.logger.render(),
      report: { ...summary, entries: [] },
    });
    return { ...summary, logFiles };
  } catch (logError) {
    log.warn(`Could not write the run log: ${getErrorMessage(logError)}`);
    return summary;
  }
}
