/**
 * Rebuilds the Google credentials from base64-encoded secrets.
 *
 * The scheduled workflow stores three secrets: the OAuth client secret, the
 * service-account key and the cached OAuth token. Nothing that talks to the
 * network may be constructed before this succeeds.
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { CredentialCorruptError, CredentialMissingError } from "@/lib/errors";

export const CREDENTIAL_VARIABLES = {
  clientSecret: "CLIENT_SECRET_JSON_B64",
  serviceAccountKey: "SERVICE_ACCOUNT_JSON_B64",
  tokenCache: "GOOGLE_TOKEN_B64",
} as const;

// Older workflows named the token secret after the Gmail pickle it used to hold.
const LEGACY_TOKEN_VARIABLE = "GMAIL_TOKEN_PICKLE_B64";

export type ServiceAccountKey = {
  client_email: string;
  private_key: string;
  project_id?: string;
};

export type CredentialArtifacts = {
  clientSecret: Buffer;
  serviceAccountKey: ServiceAccountKey;
  tokenCache: Buffer;
};

const BASE64_PATTERN = /^[A-Za-z0-9+/\-_]+={0,2}$/;

function readEncoded(env: NodeJS.ProcessEnv, variable: string, fallback?: string): { variable: string; value: string } {
  const primary = env[variable]?.trim();
  if (primary) return { variable, value: primary };

  const legacy = fallback ? env[fallback]?.trim() : undefined;
  if (fallback && legacy) return { variable: fallback, value: legacy };

  throw new CredentialMissingError(variable);
}

/**
 * Decode one base64 secret. Whitespace (line-wrapped secrets) is ignored.
 */
export function decodeCredential(variable: string, encoded: string): Buffer {
  const compact = encoded.replace(/\s+/g, "");
  if (!BASE64_PATTERN.test(compact)) {
    throw new CredentialCorruptError(variable, "value is not base64");
  }

  const decoded = Buffer.from(compact, "base64");
  if (decoded.length === 0) {
    throw new CredentialCorruptError(variable, "decoded payload is empty");
  }
  return decoded;
}

function parseJson(variable: string, payload: Buffer): unknown {
  try {
    return JSON.parse(payload.toString("utf8"));
  } catch (error) {
    throw new CredentialCorruptError(variable, `payload is not JSON (${error instanceof Error ? error.message : String(error)})`);
  }
}

function toServiceAccountKey(variable: string, payload: Buffer): ServiceAccountKey {
  const parsed = parseJson(variable, payload);
  if (typeof parsed !== "object" || parsed === null) {
    throw new CredentialCorruptError(variable, "payload is not a JSON object");
  }

  const email: unknown = Reflect.get(parsed, "client_email");
  const key: unknown = Reflect.get(parsed, "private_key");
  const projectId: unknown = Reflect.get(parsed, "project_id");

  if (typeof email !== "string" || !email || typeof key !== "string" || !key) {
    throw new CredentialCorruptError(variable, "service account key lacks client_email or private_key");
  }

  return {
    client_email: email,
    private_key: key,
    ...(typeof projectId === "string" && projectId ? { project_id: projectId } : {}),
  };
}

/**
 * Read and decode all three credentials. Fails on the first missing or
 * corrupt one; there is no retry.
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): CredentialArtifacts {
  // Check presence of all three before decoding any, so the error names
  // the first absent secret rather than a decode problem further down.
  const clientSecret = readEncoded(env, CREDENTIAL_VARIABLES.clientSecret);
  const serviceAccount = readEncoded(env, CREDENTIAL_VARIABLES.serviceAccountKey);
  const token = readEncoded(env, CREDENTIAL_VARIABLES.tokenCache, LEGACY_TOKEN_VARIABLE);

  const clientSecretPayload = decodeCredential(clientSecret.variable, clientSecret.value);
  const clientSecretJson = parseJson(clientSecret.variable, clientSecretPayload);
  if (typeof clientSecretJson !== "object" || clientSecretJson === null) {
    throw new CredentialCorruptError(clientSecret.variable, "payload is not a JSON object");
  }

  return {
    clientSecret: clientSecretPayload,
    serviceAccountKey: toServiceAccountKey(
      serviceAccount.variable,
      decodeCredential(serviceAccount.variable, serviceAccount.value)
    ),
    tokenCache: decodeCredential(token.variable, token.value),
  };
}

export const CREDENTIAL_FILE_NAMES = {
  clientSecret: "client_secret.json",
  serviceAccountKey: "service_account.json",
  tokenCache: "token.json",
} as const;

/**
 * Write the decoded credentials to disk for tools that want file paths.
 * Files are owner-readable only.
 */
export async function writeCredentialFiles(artifacts: CredentialArtifacts, dir: string): Promise<string[]> {
  await mkdir(dir, { recursive: true, mode: 0o700 });

  const files: Array<[string, Buffer | string]> = [
    [CREDENTIAL_FILE_NAMES.clientSecret, artifacts.clientSecret],
    [CREDENTIAL_FILE_NAMES.serviceAccountKey, JSON.stringify(artifacts.serviceAccountKey, null, 2)],
    [CREDENTIAL_FILE_NAMES.tokenCache, artifacts.tokenCache],
  ];

  const written: string[] = [];
  for (const [name, content] of files) {
    const filePath = path.join(dir, name);
    await writeFile(filePath, content, { mode: 0o600 });
    written.push(filePath);
  }
  return written;
}
