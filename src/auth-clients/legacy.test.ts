/**
 * Tests for the legacy username/password client
 */

import { beforeAll, beforeEach, describe, expect, it } from "vitest";
import { LegacyAuthApiError } from "../shared/errors.js";
import {
  createSigningKey,
  FakeAuthServer,
  jsonResponse,
  TEST_ISSUER,
  type SigningKey,
} from "../testing/fake-auth-server.js";
import { ScriptedPrompter } from "../testing/interaction.js";
import { MemoryJsonStorage } from "../testing/memory-storage.js";
import { LegacyAuthClient } from "./legacy.js";

const ENDPOINT = `${TEST_ISSUER}/v0/auth/login`;
const KEY_PATH = "/profiles/legacy/token.json";

/** Tokens from this endpoint are only unpacked, never verified */
function legacyToken(claims: Record<string, unknown>): string {
  const part = (value: unknown): string => Buffer.from(JSON.stringify(value)).toString("base64url");
  return `${part({ alg: "HS512", typ: "JWT" })}.${part(claims)}.c2ln`;
}

async function legacyError(promise: Promise<unknown>): Promise<LegacyAuthApiError> {
  const error = await promise.then(
    () => undefined,
    (reason: unknown) => reason
  );
  if (!(error instanceof LegacyAuthApiError)) {
    throw new Error(`Expected LegacyAuthApiError, got ${String(error)}`);
  }
  return error;
}

describe("LegacyAuthClient", () => {
  let signingKey: SigningKey;
  let server: FakeAuthServer;

  beforeAll(() => {
    signingKey = createSigningKey("key-1");
  });

  beforeEach(() => {
    server = new FakeAuthServer(signingKey).install();
    server.route("/v0/auth/login", () =>
      jsonResponse({ token: legacyToken({ api_key: "test-api-key", user_id: 42 }) })
    );
  });

  it("should exchange a username and password for an API key", async () => {
    const client = new LegacyAuthClient({ clientType: "legacy", legacyAuthEndpoint: ENDPOINT });

    const credential = await client.login({ username: "user@test.example", password: "test-password" });

    expect(credential.apiKey()).toBe("test-api-key");
    const [request] = server.requestsTo("/v0/auth/login");
    expect(request?.method).toBe("POST");
    expect(request?.headers.get("Content-Type")).toBe("application/json");
    expect(JSON.parse(request?.body ?? "")).toEqual({
      email: "user@test.example",
      password: "test-password",
    });
  });

  it("should prompt for missing credentials without echoing the password", async () => {
    const prompter = new ScriptedPrompter("user@test.example", "test-password");
    const client = new LegacyAuthClient({ clientType: "legacy", legacyAuthEndpoint: ENDPOINT }, { prompter });

    await client.login();

    expect(prompter.asked).toEqual(["Email: "]);
    expect(prompter.askedSecret).toEqual(["Password: "]);
    expect(JSON.parse(server.requestsTo("/v0/auth/login")[0]?.body ?? "")).toEqual({
      email: "user@test.example",
      password: "test-password",
    });
  });

  it("should present the key from its default authenticator", async () => {
    const storage = new MemoryJsonStorage();
    const client = new LegacyAuthClient({ clientType: "legacy", legacyAuthEndpoint: ENDPOINT }, { storage });
    const credential = await client.login({ username: "user@test.example", password: "test-password" });
    credential.setPath(KEY_PATH);
    credential.save();

    const headers = await client.defaultRequestAuthenticator(KEY_PATH).authenticate();

    expect(headers.get("Authorization")).toBe("api-key test-api-key");
    expect(storage.peek(KEY_PATH)).toEqual({ key: "test-api-key" });
  });

  it("should report a rejected login", async () => {
    server.route("/v0/auth/login", () =>
      new Response('{"message":"bad credentials"}', {
        status: 401,
        statusText: "Unauthorized",
        headers: { "Content-Type": "application/json" },
      })
    );
    const client = new LegacyAuthClient({ clientType: "legacy", legacyAuthEndpoint: ENDPOINT });

    const error = await legacyError(client.login({ username: "user@test.example", password: "wrong" }));

    expect(error.message).toBe(`HTTP error from endpoint at ${ENDPOINT}: 401: Unauthorized`);
    expect(error.rawResponse?.body).toBe('{"message":"bad credentials"}');
  });

  it("should require a token in the response", async () => {
    server.route("/v0/auth/login", () => jsonResponse({ status: "ok" }));
    const client = new LegacyAuthClient({ clientType: "legacy", legacyAuthEndpoint: ENDPOINT });

    const error = await legacyError(client.login({ username: "user@test.example", password: "test-password" }));

    expect(error.message).toBe('Authorization response did not include expected field "token"');
  });

  it("should require an API key inside the token", async () => {
    server.route("/v0/auth/login", () => jsonResponse({ token: legacyToken({ user_id: 42 }) }));
    const client = new LegacyAuthClient({ clientType: "legacy", legacyAuthEndpoint: ENDPOINT });

    const error = await legacyError(client.login({ username: "user@test.example", password: "test-password" }));

    expect(error.message).toBe(
      'Authorization response did not include expected field "api_key" in the returned token'
    );
  });

  it("should reject a non-JSON response", async () => {
    server.route("/v0/auth/login", () =>
      new Response("<html></html>", { status: 200, headers: { "Content-Type": "text/html" } })
    );
    const client = new LegacyAuthClient({ clientType: "legacy", legacyAuthEndpoint: ENDPOINT });

    const error = await legacyError(client.login({ username: "user@test.example", password: "test-password" }));

    expect(error.message).toBe("Expected json content-type, but got text/html");
  });
});
