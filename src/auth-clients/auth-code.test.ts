/**
 * Tests for the authorization code client
 */

import { get } from "node:http";
import { beforeAll, beforeEach, describe, expect, it } from "vitest";
import { createChallenge } from "../oidc/pkce.js";
import { CallbackStateMismatchError, TokenValidationError } from "../shared/errors.js";
import {
  createSigningKey,
  FakeAuthServer,
  jsonResponse,
  TEST_AUDIENCE,
  TEST_CLIENT_ID,
  TEST_ISSUER,
  type SigningKey,
} from "../testing/fake-auth-server.js";
import { FailingBrowser, RecordingBrowser, ScriptedPrompter } from "../testing/interaction.js";
import { AuthCodeAuthClient } from "./auth-code.js";
import type { AuthCodeClientConfig } from "./config.js";

const REDIRECT_URI = "https://app.test.example/callback";

const config: AuthCodeClientConfig = {
  clientType: "oidc_auth_code",
  authServer: TEST_ISSUER,
  clientId: TEST_CLIENT_ID,
  defaultRequestScopes: ["openid", "imagery"],
  defaultRequestAudiences: [TEST_AUDIENCE],
  redirectUri: REDIRECT_URI,
  localRedirectUri: "http://127.0.0.1:0/callback",
};

/** The last URL shown to the user */
function shownUrl(shown: readonly string[]): URL {
  const message = shown[shown.length - 1] ?? "";
  const match = /https?:\/\/\S+/.exec(message);
  if (!match) {
    throw new Error(`No URL in message: ${message}`);
  }
  return new URL(match[0]);
}

/** Follow the redirect the authorization server would send, without waiting on the response */
function redirectBack(authorizationUrl: string): void {
  const authorization = new URL(authorizationUrl);
  const callback = new URL(authorization.searchParams.get("redirect_uri") ?? "");
  callback.searchParams.set("code", "test-code");
  callback.searchParams.set("state", authorization.searchParams.get("state") ?? "");
  get(callback, (res) => res.resume()).on("error", () => undefined);
}

describe("AuthCodeAuthClient", () => {
  let signingKey: SigningKey;
  let server: FakeAuthServer;

  beforeAll(() => {
    signingKey = createSigningKey("key-1");
  });

  beforeEach(() => {
    server = new FakeAuthServer(signingKey).install();
    server.route("/token", () =>
      jsonResponse({
        access_token: "test-access-token",
        refresh_token: "test-refresh-token",
        token_type: "Bearer",
        expires_in: 3600,
      })
    );
  });

  describe("beginManualLogin", () => {
    it("should build a PKCE authorization request", async () => {
      const client = new AuthCodeAuthClient(config);

      const pending = await client.beginManualLogin();

      const url = new URL(pending.authorizationUrl);
      expect(`${url.origin}${url.pathname}`).toBe(`${TEST_ISSUER}/authorize`);
      expect(url.searchParams.get("client_id")).toBe(TEST_CLIENT_ID);
      expect(url.searchParams.get("response_type")).toBe("code");
      expect(url.searchParams.get("redirect_uri")).toBe(REDIRECT_URI);
      expect(url.searchParams.get("state")).toBe(pending.state);
      expect(url.searchParams.get("nonce")).toBe(pending.nonce);
      expect(url.searchParams.get("code_challenge")).toBe(createChallenge(pending.codeVerifier));
      expect(url.searchParams.get("code_challenge_method")).toBe("S256");
      expect(url.searchParams.get("scope")).toBe("openid imagery");
      expect(url.searchParams.get("audience")).toBe(TEST_AUDIENCE);
      expect(pending.redirectUri).toBe(REDIRECT_URI);
    });

    it("should use a configured authorization endpoint without discovery", async () => {
      const client = new AuthCodeAuthClient({
        ...config,
        authorizationEndpoint: "https://sso.test.example/oauth2/authorize",
      });

      const pending = await client.beginManualLogin();

      expect(pending.authorizationUrl.startsWith("https://sso.test.example/oauth2/authorize?")).toBe(true);
      expect(server.requestsTo("/.well-known/openid-configuration")).toHaveLength(0);
    });
  });

  describe("completeManualLogin", () => {
    it("should exchange a pasted redirect URL for tokens", async () => {
      const client = new AuthCodeAuthClient(config);
      const pending = await client.beginManualLogin();

      const credential = await client.completeManualLogin(
        pending,
        `${REDIRECT_URI}?code=test-code&state=${pending.state}`
      );

      expect(credential.accessToken()).toBe("test-access-token");
      expect(credential.refreshToken()).toBe("test-refresh-token");
      const [request] = server.requestsTo("/token");
      expect(request?.form.get("grant_type")).toBe("authorization_code");
      expect(request?.form.get("code")).toBe("test-code");
      expect(request?.form.get("code_verifier")).toBe(pending.codeVerifier);
      expect(request?.form.get("redirect_uri")).toBe(REDIRECT_URI);
      expect(request?.form.get("client_id")).toBe(TEST_CLIENT_ID);
    });

    it("should accept a bare authorization code", async () => {
      const client = new AuthCodeAuthClient(config);
      const pending = await client.beginManualLogin();

      await client.completeManualLogin(pending, "  test-code\n");

      expect(server.requestsTo("/token")[0]?.form.get("code")).toBe("test-code");
    });

    it("should reject a redirect for another request", async () => {
      const client = new AuthCodeAuthClient(config);
      const pending = await client.beginManualLogin();

      await expect(
        client.completeManualLogin(pending, `?code=test-code&state=not-${pending.state}`)
      ).rejects.toBeInstanceOf(CallbackStateMismatchError);
      expect(server.requestsTo("/token")).toHaveLength(0);
    });

    it("should validate the ID token against the request nonce", async () => {
      const client = new AuthCodeAuthClient(config);
      const pending = await client.beginManualLogin();
      const idToken = server.signToken({ sub: "user-1", aud: TEST_CLIENT_ID, nonce: pending.nonce });
      server.route("/token", () =>
        jsonResponse({ access_token: "test-access-token", id_token: idToken, expires_in: 3600 })
      );

      const credential = await client.completeManualLogin(pending, "test-code");

      expect(credential.idToken()).toBe(idToken);
      expect(server.requestsTo("/jwks")).toHaveLength(1);
    });

    it("should reject an ID token issued for another login", async () => {
      const client = new AuthCodeAuthClient(config);
      const pending = await client.beginManualLogin();
      const idToken = server.signToken({ sub: "user-1", aud: TEST_CLIENT_ID, nonce: "12345678" });
      server.route("/token", () =>
        jsonResponse({ access_token: "test-access-token", id_token: idToken, expires_in: 3600 })
      );

      await expect(client.completeManualLogin(pending, "test-code")).rejects.toBeInstanceOf(
        TokenValidationError
      );
    });
  });

  describe("login", () => {
    it("should prompt for the code when the browser may not be opened", async () => {
      const prompter = new ScriptedPrompter((shown) => {
        const url = shownUrl(shown);
        return `${REDIRECT_URI}?code=test-code&state=${url.searchParams.get("state") ?? ""}`;
      });
      const browser = new RecordingBrowser();
      const client = new AuthCodeAuthClient(config, { prompter, browser });

      const credential = await client.login({ allowOpenBrowser: false });

      expect(credential.accessToken()).toBe("test-access-token");
      expect(prompter.asked).toEqual([]);
      expect(prompter.askedSecret).toEqual(["Enter the authorization code: "]);
      expect(prompter.shown[0]?.startsWith("Please open the following URL in your browser to login:\n\n")).toBe(
        true
      );
      expect(browser.opened).toHaveLength(0);
    });

    it("should catch the redirect on the loopback listener", async () => {
      const browser = new RecordingBrowser(redirectBack);
      const client = new AuthCodeAuthClient(config, { browser, prompter: new ScriptedPrompter() });

      const credential = await client.login();

      expect(credential.accessToken()).toBe("test-access-token");
      expect(browser.opened).toHaveLength(1);
      const redirectUri = new URL(browser.opened[0] ?? "").searchParams.get("redirect_uri") ?? "";
      const bound = new URL(redirectUri);
      expect(bound.hostname).toBe("127.0.0.1");
      expect(bound.port).not.toBe("0");
      expect(bound.pathname).toBe("/callback");
      expect(server.requestsTo("/token")[0]?.form.get("redirect_uri")).toBe(redirectUri);
    });

    it("should show the URL when no browser can be opened", async () => {
      const prompter = new ScriptedPrompter();
      const client = new AuthCodeAuthClient(
        { ...config, localRedirectUri: "http://127.0.0.1:0/cb" },
        { browser: new FailingBrowser(), prompter }
      );
      const login = client.login();

      await expect.poll(() => prompter.shown.length).toBe(1);
      redirectBack(shownUrl(prompter.shown).toString());
      const credential = await login;

      expect(credential.accessToken()).toBe("test-access-token");
      expect(prompter.shown[0]?.startsWith("Please open the following URL in your browser to login:\n\n")).toBe(
        true
      );
    });
  });
});
