/**
 * Append-only record of what happened to each file in a run.
 */

import type { FileDescriptor } from "@/lib/invoices/types";
import type { PipelineErrorKind } from "@/lib/errors";
import { isPipelineError } from "@/lib/errors";
import { getErrorMessage, getHttpStatus, getProviderCode } from "@/lib/utils/error";

export type RunLogStatus = "succeeded" | "failed" | "skipped";

export type RunLogEntry = {
  at: string; // ISO timestamp
  fileId: string;
  fileName: string;
  status: RunLogStatus;
  errorKind?: PipelineErrorKind | "UnexpectedError";
  message?: string;
  providerStatus?: number;
  providerCode?: string;
  headerCount: number;
  lineItemCount: number;
  durationMs: number;
};

export class RunLog {
  private readonly entries: RunLogEntry[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  succeeded(file: FileDescriptor, counts: { lineItemCount: number }, durationMs: number): RunLogEntry {
    return this.append({
      at: this.now().toISOString(),
      fileId: file.id,
      fileName: file.name,
      status: "succeeded",
      headerCount: 1,
      lineItemCount: counts.lineItemCount,
      durationMs,
    });
  }

  failed(file: FileDescriptor, error: unknown, durationMs: number): RunLogEntry {
    const status = isPipelineError(error) ? error.context.status : getHttpStatus(error);
    const code = isPipelineError(error) ? error.context.providerCode : getProviderCode(error);
    return this.append({
      at: this.now().toISOString(),
      fileId: file.id,
      fileName: file.name,
      status: "failed",
      errorKind: isPipelineError(error) ? error.kind : "UnexpectedError",
      message: getErrorMessage(error),
      ...(status !== undefined ? { providerStatus: status } : {}),
      ...(code !== undefined ? { providerCode: code } : {}),
      headerCount: 0,
      lineItemCount: 0,
      durationMs,
    });
  }

  skipped(file: FileDescriptor, message: string): RunLogEntry {
    return this.append({
      at: this.now().toISOString(),
      fileId: file.id,
      fileName: file.name,
      status: "skipped",
      message,
      headerCount: 0,
      lineItemCount: 0,
      durationMs: 0,
    });
  }

  all(): readonly RunLogEntry[] {
    return this.entries;
  }

  count(status: RunLogStatus): number {
    return this.entries.filter((entry) => entry.status === status).length;
  }

  private append(entry: RunLogEntry): RunLogEntry {
    const frozen = Object.freeze(entry);
    this.entries.push(frozen);
    return frozen;
  }
}
