/**
 * Console logging with "[Scope]" prefixes, mirrored into the run's log file.
 *
 * Every line written to the console during a run is also kept in memory so
 * the writer can persist it next to the tables at the end of the run.
 */

import { getErrorMessage } from "@/lib/utils/error";

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export type LogLine = {
  at: Date;
  level: LogLevel;
  scope: string;
  message: string;
};

export interface Logger {
  debug(message: string, details?: unknown): void;
  info(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** "2025-03-01 07:55:03", UTC. */
export function formatTimestamp(at: Date): string {
  return (
    `${at.getUTCFullYear()}-${pad(at.getUTCMonth() + 1)}-${pad(at.getUTCDate())} ` +
    `${pad(at.getUTCHours())}:${pad(at.getUTCMinutes())}:${pad(at.getUTCSeconds())}`
  );
}

function describe(details: unknown): string {
  if (details === undefined) return "";
  if (details instanceof Error) return ` ${getErrorMessage(details)}`;
  if (typeof details === "string") return ` ${details}`;
  try {
    return ` ${JSON.stringify(details)}`;
  } catch {
    return ` ${String(details)}`;
  }
}

export function formatLogLine(line: LogLine): string {
  return `${formatTimestamp(line.at)} ${line.level.padEnd(7)} [${line.scope}] ${line.message}`;
}

export class RunLogger {
  private readonly lines: LogLine[] = [];

  constructor(
    private readonly options: {
      debug?: boolean;
      now?: () => Date;
      console?: Pick<Console, "log" | "warn" | "error">;
    } = {}
  ) {}

  scope(scope: string): Logger {
    return {
      debug: (message, details) => this.write("DEBUG", scope, message, details),
      info: (message, details) => this.write("INFO", scope, message, details),
      warn: (message, details) => this.write("WARNING", scope, message, details),
      error: (message, details) => this.write("ERROR", scope, message, details),
    };
  }

  /** Formatted lines captured so far. */
  render(): string {
    return this.lines.map((line) => formatLogLine(line)).join("\n") + (this.lines.length ? "\n" : "");
  }

  get size(): number {
    return this.lines.length;
  }

  private write(level: LogLevel, scope: string, message: string, details?: unknown) {
    if (level === "DEBUG" && !this.options.debug) return;

    const at = (this.options.now ?? (() => new Date()))();
    this.lines.push({ at, level, scope, message: message + describe(details) });

    const out = this.options.console ?? console;
    const prefix = `[${scope}] ${message}`;
    const args = details === undefined ? [prefix] : [prefix, details];
    if (level === "ERROR") out.error(...args);
    else if (level === "WARNING") out.warn(...args);
    else out.log(...args);
  }
}
