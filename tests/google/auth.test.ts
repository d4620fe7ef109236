import { describe, it, expect } from "vitest";
import { createOAuthClient, parseClientSecret, parseTokenCache } from "@/lib/google/auth";
import { CredentialCorruptError } from "@/lib/errors";

const json = (value: unknown) => Buffer.from(JSON.stringify(value), "utf8");

describe("parseClientSecret", () => {
  it("reads the installed-app layout", () => {
    expect(
      parseClientSecret(
        json({ installed: { client_id: "test-client", client_secret: "test-secret", redirect_uris: ["http://localhost"] } })
      )
    ).toEqual({ client_id: "test-client", client_secret: "test-secret", redirect_uri: "http://localhost" });
  });

  it("reads the web layout and a flat object", () => {
    expect(parseClientSecret(json({ web: { client_id: "a", client_secret: "b" } }))).toEqual({
      client_id: "a",
      client_secret: "b",
      redirect_uri: undefined,
    });
    expect(parseClientSecret(json({ client_id: "a", client_secret: "b" })).client_id).toBe("a");
  });

  it("rejects a secret without a client id", () => {
    expect(() => parseClientSecret(json({ installed: { client_secret: "b" } }))).toThrow(
      "CLIENT_SECRET_JSON_B64 could not be decoded: client secret lacks client_id or client_secret"
    );
  });
});

describe("parseTokenCache", () => {
  it("accepts the short `token` key for the access token", () => {
    expect(parseTokenCache(json({ token: "test-access", refresh_token: "test-refresh", expiry_date: 1 }))).toEqual({
      access_token: "test-access",
      refresh_token: "test-refresh",
      token_type: undefined,
      scope: undefined,
      expiry_date: 1,
    });
  });

  it("rejects a cache with no usable token", () => {
    expect(() => parseTokenCache(json({ scope: "drive" }))).toThrow(CredentialCorruptError);
    expect(() => parseTokenCache(Buffer.from("not json"))).toThrow(
      "GOOGLE_TOKEN_B64 could not be decoded: token cache is not JSON (re-export it with the OAuth helper)"
    );
  });
});

describe("createOAuthClient", () => {
  it("carries the cached refresh token", () => {
    const client = createOAuthClient({
      clientSecret: json({ installed: { client_id: "test-client", client_secret: "test-secret" } }),
      tokenCache: json({ refresh_token: "test-refresh" }),
    });

    expect(client.credentials.refresh_token).toBe("test-refresh");
  });
});
