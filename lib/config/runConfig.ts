/**
 * Run configuration, read once from the environment at startup.
 *
 * Secrets are not part of RunConfig: the credential loader reads them
 * separately so that each client only receives the handle it needs.
 */

import path from "path";
import { ConfigError } from "@/lib/errors";
import { getAiModelName } from "@/lib/config/ai";

export type DriveAuthMode = "service_account" | "oauth";

export type RunConfig = {
  runName: string;
  drive: {
    folderId: string;
    auth: DriveAuthMode;
    pageSize: number;
    listAttempts: number;
  };
  documentAi: {
    projectId: string | null; // null: take project_id from the service account key
    location: string;
    processorId: string;
    attempts: number;
  };
  openai: {
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens: number;
    maxRetries: number;
    maxInputChars: number;
  };
  sheets: {
    spreadsheetId: string;
    sheetName: string;
  } | null;
  directories: {
    output: string;
    transformed: string;
    logs: string;
    credentials: string | null;
  };
  lock: {
    file: string;
    staleMs: number;
  };
  requestTimeoutMs: number;
  retryBaseDelayMs: number;
  maxFiles: number | null;
  debug: boolean;
};

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`${name} is not set. Add it to your .env file or the workflow secrets.`, {
      variable: name,
    });
  }
  return value;
}

function optional(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function integer(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 0): number {
  const raw = optional(env, name);
  if (raw === null) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`, { variable: name });
  }
  return value;
}

function decimal(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === null) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number (got "${raw}")`, { variable: name });
  }
  return value;
}

function flag(env: NodeJS.ProcessEnv, name: string): boolean {
  const raw = optional(env, name)?.toLowerCase();
  return raw === "true" || raw === "1" || raw === "yes";
}

function driveAuth(env: NodeJS.ProcessEnv): DriveAuthMode {
  const raw = optional(env, "GOOGLE_DRIVE_AUTH") ?? "service_account";
  if (raw !== "service_account" && raw !== "oauth") {
    throw new ConfigError(`GOOGLE_DRIVE_AUTH must be "service_account" or "oauth" (got "${raw}")`, {
      variable: "GOOGLE_DRIVE_AUTH",
    });
  }
  return raw;
}

/**
 * Timestamped run name, e.g. "invoices_2025_03_01__07_55_00".
 * Uses UTC so scheduled runs are named the same regardless of runner locale.
 */
export function formatRunName(prefix: string, now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const date = `${now.getUTCFullYear()}_${pad(now.getUTCMonth() + 1)}_${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}_${pad(now.getUTCMinutes())}_${pad(now.getUTCSeconds())}`;
  return `${prefix}_${date}__${time}`;
}

/**
 * The three settings a run can still honour when the rest of the
 * configuration is invalid, so the failure lands in the usual log file.
 */
export function resolveRunName(env: NodeJS.ProcessEnv, now: Date): string {
  return formatRunName(optional(env, "RUN_NAME") ?? "invoices", now);
}

export function resolveLogsDir(env: NodeJS.ProcessEnv): string {
  return path.resolve(process.cwd(), optional(env, "LOGS_DIR") ?? "data/04_Logs");
}

export function isDebugEnabled(env: NodeJS.ProcessEnv): boolean {
  return flag(env, "LOG_DEBUG");
}

export function loadRunConfig(env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): RunConfig {
  const root = process.cwd();
  const dir = (name: string, fallback: string) => path.resolve(root, optional(env, name) ?? fallback);

  const spreadsheetId = optional(env, "GOOGLE_SHEETS_ID");
  const credentialsDir = optional(env, "CREDENTIALS_DIR");
  const maxFiles = integer(env, "MAX_FILES", 0);

  return {
    runName: resolveRunName(env, now),
    drive: {
      folderId: required(env, "GOOGLE_DRIVE_FOLDER_ID"),
      auth: driveAuth(env),
      pageSize: integer(env, "DRIVE_PAGE_SIZE", 100, 1),
      listAttempts: integer(env, "DRIVE_LIST_ATTEMPTS", 3, 1),
    },
    documentAi: {
      projectId: optional(env, "DOCUMENTAI_PROJECT_ID"),
      location: optional(env, "DOCUMENTAI_LOCATION") ?? "eu",
      processorId: required(env, "DOCUMENTAI_PROCESSOR_ID"),
      attempts: integer(env, "OCR_ATTEMPTS", 2, 1),
    },
    openai: {
      apiKey: required(env, "OPENAI_API_KEY"),
      model: getAiModelName(env),
      temperature: decimal(env, "OPENAI_TEMPERATURE", 0.1),
      maxTokens: integer(env, "OPENAI_MAX_TOKENS", 1500, 1),
      maxRetries: integer(env, "OPENAI_MAX_RETRIES", 2),
      maxInputChars: integer(env, "AI_MAX_INPUT_CHARS", 12000, 1),
    },
    sheets: spreadsheetId
      ? { spreadsheetId, sheetName: optional(env, "GOOGLE_SHEETS_SHEET_NAME") ?? "Invoices" }
      : null,
    directories: {
      output: dir("OUTPUT_DIR", "data/03_Outputs"),
      transformed: dir("TRANSFORMED_DIR", "data/02_TransformedData"),
      logs: resolveLogsDir(env),
      credentials: credentialsDir ? path.resolve(root, credentialsDir) : null,
    },
    lock: {
      file: dir("RUN_LOCK_FILE", "data/.invoice-etl.lock"),
      staleMs: integer(env, "RUN_LOCK_STALE_MS", 3 * 60 * 60 * 1000, 1),
    },
    requestTimeoutMs: integer(env, "REQUEST_TIMEOUT_MS", 60_000, 1),
    retryBaseDelayMs: integer(env, "RETRY_BASE_DELAY_MS", 1000),
    maxFiles: maxFiles > 0 ? maxFiles : null,
    debug: isDebugEnabled(env),
  };
}
