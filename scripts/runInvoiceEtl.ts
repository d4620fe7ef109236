/**
 * Entry point for one scheduled run: `npm start`.
 *
 * Exit code 0 when the run finished (per-file failures included) or was
 * skipped because another run holds the lock; 1 on any fatal failure.
 */

import { config } from "dotenv";
import { resolve } from "path";
import {
  isDebugEnabled,
  loadRunConfig,
  resolveLogsDir,
  resolveRunName,
  type RunConfig,
} from "@/lib/config/runConfig";
import { loadCredentials } from "@/lib/credentials/loadCredentials";
import { recordConfigFailure, runInvoicePipeline } from "@/lib/pipeline/orchestrator";
import { acquireRunLock } from "@/lib/pipeline/runLock";
import { createLiveServices } from "@/lib/pipeline/services";
import { createFileOutputWriter, writeRunLogFiles } from "@/lib/output/writer";
import { RunLogger } from "@/lib/utils/logger";

// Load .env.local first, then .env
config({ path: resolve(process.cwd(), ".env.local") });
config({ path: resolve(process.cwd(), ".env") });

async function main(): Promise<number> {
  const startedAt = new Date();
  // Created before the configuration loads so a config failure is logged too.
  const logger = new RunLogger({ debug: isDebugEnabled(process.env) });
  const log = logger.scope("Main");

  let runConfig: RunConfig;
  try {
    runConfig = loadRunConfig(process.env, startedAt);
  } catch (error) {
    const logsDir = resolveLogsDir(process.env);
    const summary = await recordConfigFailure({
      runName: resolveRunName(process.env, startedAt),
      error,
      writeRunLog: (input) => writeRunLogFiles(logsDir, input),
      logger,
    });
    if (summary.logFiles.length > 0) {
      log.info(`Wrote ${summary.logFiles.join(", ")}`);
    }
    return summary.exitCode;
  }

  const lock = await acquireRunLock(runConfig.lock.file, {
    runName: runConfig.runName,
    staleMs: runConfig.lock.staleMs,
  });
  if (!lock.acquired) {
    log.warn(
      `Another run holds ${runConfig.lock.file}` +
        (lock.holder ? ` (${lock.holder.runName}, pid ${lock.holder.pid}, since ${lock.holder.startedAt})` : "") +
        "; skipping this run"
    );
    return 0;
  }

  try {
    log.info(`Starting run ${runConfig.runName}`);
    const summary = await runInvoicePipeline({
      options: {
        runName: runConfig.runName,
        folderId: runConfig.drive.folderId,
        maxFiles: runConfig.maxFiles,
      },
      loadCredentials: () => loadCredentials(process.env),
      createServices: (credentials) => createLiveServices(runConfig, credentials, logger),
      writer: createFileOutputWriter(runConfig.directories, logger.scope("Writer")),
      logger,
    });

    if (summary.exitCode === 0) {
      log.info(
        `Done: ${summary.headers} invoices, ${summary.lineItems} line items, ${summary.filesFailed} failed files`
      );
    } else {
      log.error(`Run failed: ${summary.error?.kind ?? "UnexpectedError"}: ${summary.error?.message ?? ""}`);
    }
    return summary.exitCode;
  } finally {
    await lock.release();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[Main] Unexpected failure:", error);
    process.exitCode = 1;
  });
