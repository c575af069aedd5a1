/**
 * Tests for auth client config parsing
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../shared/errors.js";
import {
  DEFAULT_LEGACY_AUTH_ENDPOINT,
  defaultAuthClientConfig,
  isOidcClientConfig,
  loadAuthClientConfig,
  parseAuthClientConfig,
} from "./config.js";

const oidcFields = {
  auth_server: "https://auth.test.example",
  client_id: "test-client",
};

describe("parseAuthClientConfig", () => {
  it("should convert file keys to a typed config", () => {
    const config = parseAuthClientConfig({
      client_type: "oidc_client_credentials_secret",
      ...oidcFields,
      client_secret: "test-secret",
      default_request_scopes: ["imagery"],
      default_request_audiences: ["https://api.test.example/"],
      token_endpoint: "https://auth.test.example/custom/token",
    });

    expect(config).toEqual({
      clientType: "oidc_client_credentials_secret",
      authServer: "https://auth.test.example",
      clientId: "test-client",
      clientSecret: "test-secret",
      defaultRequestScopes: ["imagery"],
      defaultRequestAudiences: ["https://api.test.example/"],
      tokenEndpoint: "https://auth.test.example/custom/token",
    });
  });

  it("should accept space separated lists and the short aliases", () => {
    const config = parseAuthClientConfig({
      client_type: "oidc_device_code",
      ...oidcFields,
      scopes: "imagery  offline_access",
      audiences: ["https://api.test.example/"],
    });

    expect(isOidcClientConfig(config)).toBe(true);
    expect(config).toMatchObject({
      defaultRequestScopes: ["imagery", "offline_access"],
      defaultRequestAudiences: ["https://api.test.example/"],
    });
  });

  it("should prefer the full key names over the aliases", () => {
    const config = parseAuthClientConfig({
      client_type: "oidc_device_code",
      ...oidcFields,
      default_request_scopes: "imagery",
      scopes: "other",
    });

    expect(config).toMatchObject({ defaultRequestScopes: ["imagery"], defaultRequestAudiences: [] });
  });

  it.each([
    [{ redirect_uri: "https://app.test.example/cb" }, "https://app.test.example/cb", "https://app.test.example/cb"],
    [{ local_redirect_uri: "http://localhost:8080/cb" }, "http://localhost:8080/cb", "http://localhost:8080/cb"],
    [
      { redirect_uri: "https://app.test.example/cb", local_redirect_uri: "http://localhost:8080/cb" },
      "https://app.test.example/cb",
      "http://localhost:8080/cb",
    ],
  ])("should let either redirect URI stand in for the other (%o)", (redirects, redirectUri, localRedirectUri) => {
    const config = parseAuthClientConfig({ client_type: "oidc_auth_code", ...oidcFields, ...redirects });

    expect(config).toMatchObject({ redirectUri, localRedirectUri });
  });

  it("should require a redirect URI for the auth code flow", () => {
    expect(() => parseAuthClientConfig({ client_type: "oidc_auth_code", ...oidcFields })).toThrow(
      new ConfigurationError("Auth code client config requires redirect_uri or local_redirect_uri")
    );
  });

  it("should require a private key source for public key clients", () => {
    expect(() =>
      parseAuthClientConfig({ client_type: "oidc_client_credentials_pubkey", ...oidcFields })
    ).toThrow("Public key client credentials config requires client_privkey or client_privkey_file");
  });

  it("should default the legacy endpoint", () => {
    expect(parseAuthClientConfig({ client_type: "legacy" })).toEqual({
      clientType: "legacy",
      legacyAuthEndpoint: DEFAULT_LEGACY_AUTH_ENDPOINT,
    });
  });

  it("should name the offending field", () => {
    expect(() =>
      parseAuthClientConfig({ client_type: "oidc_device_code", auth_server: "not a url", client_id: "c" })
    ).toThrow("Invalid auth client config: auth_server: Invalid url");
  });

  it("should reject an unknown client type", () => {
    let error: unknown;
    try {
      parseAuthClientConfig({ client_type: "kerberos" });
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: "CONFIGURATION_ERROR" });
  });
});

describe("defaultAuthClientConfig", () => {
  it("should return a fresh value each time", () => {
    const first = defaultAuthClientConfig();
    const second = defaultAuthClientConfig();

    expect(first).toEqual(second);
    expect(first).not.toBe(second);
    expect(first.clientType).toBe("oidc_device_code");
  });
});

describe("loadAuthClientConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "auth-config-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should read a config file", () => {
    const path = join(dir, "auth_client.json");
    writeFileSync(path, JSON.stringify({ client_type: "static_apikey" }));

    expect(loadAuthClientConfig(path)).toEqual({ clientType: "static_apikey" });
  });

  it("should name the file when its content is invalid", () => {
    const path = join(dir, "auth_client.json");
    writeFileSync(path, JSON.stringify({ client_type: "oidc_auth_code", ...oidcFields }));

    expect(() => loadAuthClientConfig(path)).toThrow(
      `Auth code client config requires redirect_uri or local_redirect_uri (in ${path})`
    );
  });

  it("should report a file that is not JSON", () => {
    const path = join(dir, "auth_client.json");
    writeFileSync(path, "client_type = none");

    expect(() => loadAuthClientConfig(path)).toThrow(`Unable to read auth client config file "${path}"`);
  });
});
