/**
 * Unit tests for credential reconstruction from base64 secrets.
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm, stat } from "fs/promises";
import os from "os";
import path from "path";
import {
  decodeCredential,
  loadCredentials,
  writeCredentialFiles,
} from "@/lib/credentials/loadCredentials";
import { CredentialCorruptError, CredentialMissingError } from "@/lib/errors";

const b64 = (value: string) => Buffer.from(value, "utf8").toString("base64");

const clientSecretJson = JSON.stringify({
  installed: { client_id: "test-client", client_secret: "test-secret", redirect_uris: ["http://localhost"] },
});
const serviceAccountJson = JSON.stringify({
  type: "service_account",
  project_id: "test-project",
  client_email: "etl@test-project.iam.gserviceaccount.com",
  private_key: "test-private-key",
});
const tokenJson = JSON.stringify({ refresh_token: "test-refresh-token" });

function validEnv(): NodeJS.ProcessEnv {
  return {
    CLIENT_SECRET_JSON_B64: b64(clientSecretJson),
    SERVICE_ACCOUNT_JSON_B64: b64(serviceAccountJson),
    GOOGLE_TOKEN_B64: b64(tokenJson),
  };
}

describe("loadCredentials", () => {
  it("decodes all three credentials", () => {
    const credentials = loadCredentials(validEnv());

    expect(credentials.clientSecret.toString("utf8")).toBe(clientSecretJson);
    expect(credentials.tokenCache.toString("utf8")).toBe(tokenJson);
    expect(credentials.serviceAccountKey).toEqual({
      client_email: "etl@test-project.iam.gserviceaccount.com",
      private_key: "test-private-key",
      project_id: "test-project",
    });
  });

  it.each(["CLIENT_SECRET_JSON_B64", "SERVICE_ACCOUNT_JSON_B64", "GOOGLE_TOKEN_B64"])(
    "fails with CredentialMissing when %s is empty",
    (variable) => {
      const env = { ...validEnv(), [variable]: "   " };

      expect(() => loadCredentials(env)).toThrow(CredentialMissingError);
      expect(() => loadCredentials(env)).toThrow(`${variable} is not set or empty`);
    }
  );

  it("reports the first missing secret before decoding any", () => {
    const env = { ...validEnv(), SERVICE_ACCOUNT_JSON_B64: "not base64!", GOOGLE_TOKEN_B64: undefined };

    expect(() => loadCredentials(env)).toThrow("GOOGLE_TOKEN_B64 is not set or empty");
  });

  it("accepts the legacy token variable name", () => {
    const env = { ...validEnv(), GOOGLE_TOKEN_B64: undefined, GMAIL_TOKEN_PICKLE_B64: b64("legacy-token") };

    expect(loadCredentials(env).tokenCache.toString("utf8")).toBe("legacy-token");
  });

  it("fails with CredentialCorrupt when the service account is not JSON", () => {
    const env = { ...validEnv(), SERVICE_ACCOUNT_JSON_B64: b64("plain text") };

    expect(() => loadCredentials(env)).toThrow(CredentialCorruptError);
  });

  it("fails with CredentialCorrupt when the service account lacks a private key", () => {
    const env = { ...validEnv(), SERVICE_ACCOUNT_JSON_B64: b64(JSON.stringify({ client_email: "a@b" })) };

    expect(() => loadCredentials(env)).toThrow("service account key lacks client_email or private_key");
  });
});

describe("decodeCredential", () => {
  it("ignores line breaks in wrapped secrets", () => {
    const encoded = b64("hello world");
    const wrapped = `${encoded.slice(0, 4)}\n${encoded.slice(4)}`;

    expect(decodeCredential("X", wrapped).toString("utf8")).toBe("hello world");
  });

  it("rejects values that are not base64", () => {
    expect(() => decodeCredential("X", "%%%")).toThrow("X could not be decoded: value is not base64");
  });

  it("rejects payloads that decode to nothing", () => {
    expect(() => decodeCredential("X", "A")).toThrow("decoded payload is empty");
  });
});

describe("writeCredentialFiles", () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it("writes the three files readable by the owner only", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "invoice-etl-creds-"));
    const target = path.join(dir, "credentials");

    const written = await writeCredentialFiles(loadCredentials(validEnv()), target);

    expect(written.map((file) => path.basename(file))).toEqual([
      "client_secret.json",
      "service_account.json",
      "token.json",
    ]);
    expect(await readFile(path.join(target, "token.json"), "utf8")).toBe(tokenJson);
    const mode = (await stat(path.join(target, "service_account.json"))).mode & 0o777;
    expect(mode).toBe(0o600);
  });
});
