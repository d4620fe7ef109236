/**
 * Google API auth clients built from the decoded credentials.
 */

import { google } from "googleapis";
import type { CredentialArtifacts, ServiceAccountKey } from "@/lib/credentials/loadCredentials";
import { CREDENTIAL_VARIABLES } from "@/lib/credentials/loadCredentials";
import { CredentialCorruptError } from "@/lib/errors";

export const DRIVE_READONLY_SCOPE = "https://www.googleapis.com/auth/drive.readonly";
export const CLOUD_PLATFORM_SCOPE = "https://www.googleapis.com/auth/cloud-platform";
export const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets";

/**
 * Create a service-account (JWT) client for the given scopes.
 */
export function createServiceAccountAuth(key: ServiceAccountKey, scopes: string[]) {
  return new google.auth.JWT({
    email: key.client_email,
    key: key.private_key,
    scopes,
  });
}

type OAuthClientSecret = {
  client_id: string;
  client_secret: string;
  redirect_uri?: string;
};

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" && value ? value : undefined;
}

/**
 * Client secret files downloaded from the Cloud console nest the values
 * under "installed" (desktop apps) or "web".
 */
export function parseClientSecret(payload: Buffer): OAuthClientSecret {
  const variable = CREDENTIAL_VARIABLES.clientSecret;
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString("utf8"));
  } catch {
    throw new CredentialCorruptError(variable, "client secret is not JSON");
  }
  if (typeof parsed !== "object" || parsed === null) {
    throw new CredentialCorruptError(variable, "client secret is not a JSON object");
  }

  const nested: unknown = Reflect.get(parsed, "installed") ?? Reflect.get(parsed, "web");
  const source = typeof nested === "object" && nested !== null ? nested : parsed;

  const clientId = readString(source, "client_id");
  const clientSecret = readString(source, "client_secret");
  if (!clientId || !clientSecret) {
    throw new CredentialCorruptError(variable, "client secret lacks client_id or client_secret");
  }

  const redirectUris: unknown = Reflect.get(source, "redirect_uris");
  const firstRedirect: unknown = Array.isArray(redirectUris) ? redirectUris[0] : undefined;
  const redirectUri = typeof firstRedirect === "string" ? firstRedirect : undefined;

  return { client_id: clientId, client_secret: clientSecret, redirect_uri: redirectUri };
}

type CachedToken = {
  access_token?: string;
  refresh_token?: string;
  expiry_date?: number;
  token_type?: string;
  scope?: string;
};

export function parseTokenCache(payload: Buffer): CachedToken {
  const variable = CREDENTIAL_VARIABLES.tokenCache;
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString("utf8"));
  } catch {
    throw new CredentialCorruptError(variable, "token cache is not JSON (re-export it with the OAuth helper)");
  }
  if (typeof parsed !== "object" || parsed === null) {
    throw new CredentialCorruptError(variable, "token cache is not a JSON object");
  }

  const token: CachedToken = {
    access_token: readString(parsed, "access_token") ?? readString(parsed, "token"),
    refresh_token: readString(parsed, "refresh_token"),
    token_type: readString(parsed, "token_type"),
    scope: readString(parsed, "scope"),
  };
  const expiry: unknown = Reflect.get(parsed, "expiry_date");
  if (typeof expiry === "number") token.expiry_date = expiry;

  if (!token.access_token && !token.refresh_token) {
    throw new CredentialCorruptError(variable, "token cache has neither access_token nor refresh_token");
  }
  return token;
}

/**
 * Create an OAuth2 client from the client secret and the cached user token.
 * The library refreshes the access token on demand from the refresh token.
 */
export function createOAuthClient(credentials: Pick<CredentialArtifacts, "clientSecret" | "tokenCache">) {
  const secret = parseClientSecret(credentials.clientSecret);
  const auth = new google.auth.OAuth2(secret.client_id, secret.client_secret, secret.redirect_uri);
  auth.setCredentials(parseTokenCache(credentials.tokenCache));
  return auth;
}

export type GoogleAuthClient = ReturnType<typeof createServiceAccountAuth> | ReturnType<typeof createOAuthClient>;
