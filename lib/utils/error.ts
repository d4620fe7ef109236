/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  const property: unknown = Reflect.get(value, key);
  return property;
}

/**
 * HTTP status carried by a googleapis (Gaxios) or OpenAI error, if any.
 * Gaxios puts it on `response.status`, OpenAI's APIError on `status`.
 */
export function getHttpStatus(error: unknown): number | undefined {
  const direct = readProperty(error, "status");
  if (typeof direct === "number") return direct;

  const nested = readProperty(readProperty(error, "response"), "status");
  return typeof nested === "number" ? nested : undefined;
}

/**
 * Provider error code: the Google API `error.status` (e.g. "RESOURCE_EXHAUSTED"),
 * the OpenAI `code`, or a Node network code such as "ETIMEDOUT".
 */
export function getProviderCode(error: unknown): string | undefined {
  const googleStatus = readProperty(
    readProperty(readProperty(readProperty(error, "response"), "data"), "error"),
    "status"
  );
  if (typeof googleStatus === "string") return googleStatus;

  const code = readProperty(error, "code");
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const TRANSIENT_CODES = new Set([
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "ENOTFOUND",
  "RESOURCE_EXHAUSTED",
  "UNAVAILABLE",
  "DEADLINE_EXCEEDED",
]);

/**
 * Rate limits, 5xx and network-level failures are worth another attempt.
 * Auth and validation failures are not.
 */
export function isTransientError(error: unknown): boolean {
  const status = getHttpStatus(error);
  if (status !== undefined) return TRANSIENT_STATUSES.has(status);

  const code = getProviderCode(error);
  if (code !== undefined && TRANSIENT_CODES.has(code)) return true;

  return error instanceof Error && /timeout|timed out|socket hang up/i.test(error.message);
}
