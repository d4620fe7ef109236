/**
 * Writes the run's artifacts to disk.
 *
 * Tables: OUTPUT_DIR/<runName>/invoice_headers.csv + invoice_line_items.csv.
 * Both are written into a hidden staging directory that is renamed into
 * place in one step, so a failed run never leaves one table without the other.
 */

import { mkdir, rename, rm, stat, writeFile } from "fs/promises";
import path from "path";
import type { InvoiceHeaderRecord, LineItemRecord, OcrRow } from "@/lib/invoices/types";
import type { Logger } from "@/lib/utils/logger";
import { WriteError } from "@/lib/errors";
import { getErrorMessage } from "@/lib/utils/error";
import { toCsv } from "@/lib/output/csv";
import {
  findDuplicateHeaders,
  findOrphanLineItems,
  INVOICE_HEADER_COLUMNS,
  LINE_ITEM_COLUMNS,
  OCR_RESULT_COLUMNS,
  TABLE_FILE_NAMES,
} from "@/lib/output/tables";

export type TablesInput = {
  runName: string;
  headers: readonly InvoiceHeaderRecord[];
  lineItems: readonly LineItemRecord[];
  ocrRows: readonly OcrRow[];
};

export type RunLogInput = {
  runName: string;
  logText: string;
  report: unknown; // serialized as JSON
};

export type WrittenTables = {
  outputDir: string;
  files: string[];
};

export interface OutputWriter {
  writeTables(input: TablesInput): Promise<WrittenTables>;
  writeRunLog(input: RunLogInput): Promise<string[]>;
}

export type OutputDirectories = {
  output: string;
  transformed: string;
  logs: string;
};

async function exists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write to a temp file next to the target, then rename over it.
 */
async function writeFileAtomic(target: string, content: string): Promise<void> {
  const temp = `${target}.tmp-${process.pid}`;
  try {
    await writeFile(temp, content, "utf8");
    await rename(temp, target);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

/**
 * LOGS_DIR/log_<runName>.log and LOGS_DIR/run_<runName>.json.
 */
export async function writeRunLogFiles(logsDir: string, { runName, logText, report }: RunLogInput): Promise<string[]> {
  const logFile = path.join(logsDir, `log_${runName}.log`);
  const reportFile = path.join(logsDir, `run_${runName}.json`);
  try {
    await mkdir(logsDir, { recursive: true });
    await writeFileAtomic(logFile, logText);
    await writeFileAtomic(reportFile, JSON.stringify(report, null, 2) + "\n");
    return [logFile, reportFile];
  } catch (error) {
    throw new WriteError(`Failed to write run log for ${runName}: ${getErrorMessage(error)}`, {}, { cause: error });
  }
}

export function createFileOutputWriter(directories: OutputDirectories, logger: Logger): OutputWriter {
  return {
    async writeTables({ runName, headers, lineItems, ocrRows }) {
      const orphans = findOrphanLineItems(headers, lineItems);
      if (orphans.length > 0) {
        throw new WriteError(
          `Refusing to write ${orphans.length} line items without a header (document ${orphans[0].documentId})`
        );
      }
      const duplicates = findDuplicateHeaders(headers);
      if (duplicates.length > 0) {
        throw new WriteError(`Refusing to write duplicate headers for document ${duplicates[0]}`);
      }

      const outputDir = path.join(directories.output, runName);
      const stagingDir = path.join(directories.output, `.${runName}.partial-${process.pid}`);
      const transformedDir = path.join(directories.transformed, runName);

      try {
        if (await exists(outputDir)) {
          throw new Error(`${outputDir} already exists`);
        }

        await mkdir(transformedDir, { recursive: true });
        const ocrFile = path.join(transformedDir, TABLE_FILE_NAMES.ocrResults);
        await writeFileAtomic(ocrFile, toCsv(OCR_RESULT_COLUMNS, ocrRows));

        await mkdir(stagingDir, { recursive: true });
        await writeFile(path.join(stagingDir, TABLE_FILE_NAMES.headers), toCsv(INVOICE_HEADER_COLUMNS, headers), "utf8");
        await writeFile(path.join(stagingDir, TABLE_FILE_NAMES.lineItems), toCsv(LINE_ITEM_COLUMNS, lineItems), "utf8");
        await rename(stagingDir, outputDir);

        const files = [
          path.join(outputDir, TABLE_FILE_NAMES.headers),
          path.join(outputDir, TABLE_FILE_NAMES.lineItems),
          ocrFile,
        ];
        logger.info(`Wrote ${headers.length} headers and ${lineItems.length} line items to ${outputDir}`);
        return { outputDir, files };
      } catch (error) {
        await rm(stagingDir, { recursive: true, force: true }).catch((cleanupError: unknown) =>
          logger.warn(`Could not remove staging directory ${stagingDir}`, cleanupError)
        );
        throw new WriteError(`Failed to write tables for ${runName}: ${getErrorMessage(error)}`, {}, { cause: error });
      }
    },

    writeRunLog(input) {
      return writeRunLogFiles(directories.logs, input);
    },
  };
}
