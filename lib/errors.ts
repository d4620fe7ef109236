/**
 * Error taxonomy for an ETL run.
 *
 * Fatal errors end the run with a non-zero exit code. Per-file errors are
 * caught by the orchestrator, recorded in the run log, and the batch moves on.
 */

export type PipelineErrorKind =
  | "ConfigError"
  | "CredentialMissing"
  | "CredentialCorrupt"
  | "RemoteListError"
  | "DownloadError"
  | "OcrServiceError"
  | "StructuringError"
  | "WriteError";

export type PipelineErrorContext = {
  fileId?: string;
  fileName?: string;
  status?: number;
  providerCode?: string;
  [key: string]: string | number | undefined;
};

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  abstract readonly fatal: boolean;
  readonly context: PipelineErrorContext;

  constructor(message: string, context: PipelineErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }
}

export class ConfigError extends PipelineError {
  readonly kind = "ConfigError";
  readonly fatal = true;
}

export class CredentialMissingError extends PipelineError {
  readonly kind = "CredentialMissing";
  readonly fatal = true;

  constructor(readonly variable: string) {
    super(`${variable} is not set or empty`, { variable });
  }
}

export class CredentialCorruptError extends PipelineError {
  readonly kind = "CredentialCorrupt";
  readonly fatal = true;

  constructor(readonly variable: string, reason: string) {
    super(`${variable} could not be decoded: ${reason}`, { variable });
  }
}

export class RemoteListError extends PipelineError {
  readonly kind = "RemoteListError";
  readonly fatal = true;
}

export class DownloadError extends PipelineError {
  readonly kind = "DownloadError";
  readonly fatal = false;
}

export class OcrServiceError extends PipelineError {
  readonly kind = "OcrServiceError";
  readonly fatal = false;

  get status(): number | undefined {
    return this.context.status;
  }

  get providerCode(): string | undefined {
    return this.context.providerCode;
  }
}

export class StructuringError extends PipelineError {
  readonly kind = "StructuringError";
  readonly fatal = false;
}

export class WriteError extends PipelineError {
  readonly kind = "WriteError";
  readonly fatal = true;
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
