/**
 * Tests for the device authorization flow
 */

import { beforeAll, beforeEach, describe, expect, it } from "vitest";
import { DEVICE_CODE_GRANT_TYPE } from "../oidc/token-api.js";
import { DeviceAuthorizationError, OidcApiError } from "../shared/errors.js";
import {
  createSigningKey,
  FakeAuthServer,
  jsonResponse,
  oauthErrorResponse,
  TEST_AUDIENCE,
  TEST_CLIENT_ID,
  TEST_ISSUER,
  type SigningKey,
} from "../testing/fake-auth-server.js";
import { FailingBrowser, RecordingBrowser, ScriptedPrompter } from "../testing/interaction.js";
import type { DeviceCodeClientConfig } from "./config.js";
import { DeviceCodeAuthClient } from "./device-code.js";
import type { DeviceLoginInitiation } from "./types.js";

const config: DeviceCodeClientConfig = {
  clientType: "oidc_device_code",
  authServer: TEST_ISSUER,
  clientId: TEST_CLIENT_ID,
  defaultRequestScopes: ["imagery", "offline_access"],
  defaultRequestAudiences: [TEST_AUDIENCE],
};

const FAST_POLLING = { defaultIntervalMs: 0, slowDownIncrementMs: 1 };

const TOKENS = {
  access_token: "test-access-token",
  refresh_token: "test-refresh-token",
  token_type: "Bearer",
  expires_in: 3600,
};

const initiation: DeviceLoginInitiation = {
  deviceCode: "test-device-code",
  userCode: "ABCD-EFGH",
  verificationUri: `${TEST_ISSUER}/device`,
  expiresIn: 600,
  interval: 0,
};

async function deviceError(promise: Promise<unknown>): Promise<DeviceAuthorizationError> {
  const error = await promise.then(
    () => undefined,
    (reason: unknown) => reason
  );
  if (!(error instanceof DeviceAuthorizationError)) {
    throw new Error(`Expected DeviceAuthorizationError, got ${String(error)}`);
  }
  return error;
}

describe("DeviceCodeAuthClient", () => {
  let signingKey: SigningKey;
  let server: FakeAuthServer;

  beforeAll(() => {
    signingKey = createSigningKey("key-1");
  });

  beforeEach(() => {
    server = new FakeAuthServer(signingKey).install();
    server.route("/device/authorize", () =>
      jsonResponse({
        device_code: "test-device-code",
        user_code: "ABCD-EFGH",
        verification_uri: `${TEST_ISSUER}/device`,
        verification_uri_complete: `${TEST_ISSUER}/device?user_code=ABCD-EFGH`,
        expires_in: 600,
        interval: 0,
      })
    );
  });

  /** Answer successive token polls with the given responses, repeating the last */
  function tokenAnswers(...answers: Array<() => Response>): void {
    let call = 0;
    server.route("/token", () => {
      const answer = answers[Math.min(call, answers.length - 1)];
      call++;
      return answer ? answer() : jsonResponse(TOKENS);
    });
  }

  describe("deviceUserLoginInitiate", () => {
    it("should request a device code for the configured scopes", async () => {
      const client = new DeviceCodeAuthClient(config, {}, FAST_POLLING);

      const result = await client.deviceUserLoginInitiate();

      expect(result).toEqual({
        deviceCode: "test-device-code",
        userCode: "ABCD-EFGH",
        verificationUri: `${TEST_ISSUER}/device`,
        verificationUriComplete: `${TEST_ISSUER}/device?user_code=ABCD-EFGH`,
        expiresIn: 600,
        interval: 0,
      });
      const [request] = server.requestsTo("/device/authorize");
      expect(request?.form.get("client_id")).toBe(TEST_CLIENT_ID);
      expect(request?.form.get("scope")).toBe("imagery offline_access");
      expect(request?.form.get("audience")).toBe(TEST_AUDIENCE);
    });

    it("should fall back to the default interval", async () => {
      server.route("/device/authorize", () =>
        jsonResponse({
          device_code: "test-device-code",
          user_code: "ABCD-EFGH",
          verification_uri: `${TEST_ISSUER}/device`,
          expires_in: 600,
        })
      );
      const client = new DeviceCodeAuthClient(config);

      const result = await client.deviceUserLoginInitiate();

      expect(result.interval).toBe(5);
    });
  });

  describe("deviceUserLoginComplete", () => {
    it("should keep polling while authorization is pending", async () => {
      tokenAnswers(
        () => oauthErrorResponse("authorization_pending"),
        () => oauthErrorResponse("authorization_pending"),
        () => jsonResponse(TOKENS)
      );
      const client = new DeviceCodeAuthClient(config, {}, FAST_POLLING);

      const credential = await client.deviceUserLoginComplete(initiation);

      expect(credential.accessToken()).toBe("test-access-token");
      const polls = server.requestsTo("/token");
      expect(polls).toHaveLength(3);
      expect(polls[0]?.form.get("grant_type")).toBe(DEVICE_CODE_GRANT_TYPE);
      expect(polls[0]?.form.get("device_code")).toBe("test-device-code");
      expect(polls[0]?.form.get("client_id")).toBe(TEST_CLIENT_ID);
    });

    it("should slow down when asked to", async () => {
      tokenAnswers(
        () => oauthErrorResponse("slow_down"),
        () => jsonResponse(TOKENS)
      );
      const client = new DeviceCodeAuthClient(config, {}, FAST_POLLING);

      const credential = await client.deviceUserLoginComplete(initiation);

      expect(credential.refreshToken()).toBe("test-refresh-token");
      expect(server.requestsTo("/token")).toHaveLength(2);
    });

    it("should stop when the user denies the request", async () => {
      tokenAnswers(() => oauthErrorResponse("access_denied"));
      const client = new DeviceCodeAuthClient(config, {}, FAST_POLLING);

      const error = await deviceError(client.deviceUserLoginComplete(initiation));

      expect(error.reason).toBe("access_denied");
      expect(error.message).toBe("The user denied the login request");
    });

    it("should stop when the device code expires", async () => {
      tokenAnswers(
        () => oauthErrorResponse("authorization_pending"),
        () => oauthErrorResponse("expired_token")
      );
      const client = new DeviceCodeAuthClient(config, {}, FAST_POLLING);

      const error = await deviceError(client.deviceUserLoginComplete(initiation));

      expect(error.reason).toBe("expired_token");
      expect(server.requestsTo("/token")).toHaveLength(2);
    });

    it("should give up once the timeout has passed", async () => {
      tokenAnswers(() => oauthErrorResponse("authorization_pending"));
      const client = new DeviceCodeAuthClient(config, {}, FAST_POLLING);

      const error = await deviceError(client.deviceUserLoginComplete(initiation, { timeoutMs: 0 }));

      expect(error.reason).toBe("timeout");
      expect(error.message).toBe("Timed out waiting for device authorization");
      expect(server.requestsTo("/token")).toHaveLength(0);
    });

    it("should stop at the timeout when it falls inside a poll interval", async () => {
      tokenAnswers(() => oauthErrorResponse("authorization_pending"));
      const client = new DeviceCodeAuthClient(config, {}, FAST_POLLING);
      const started = Date.now();

      const error = await deviceError(
        client.deviceUserLoginComplete({ ...initiation, interval: 2 }, { timeoutMs: 100 })
      );

      expect(error.reason).toBe("timeout");
      expect(Date.now() - started).toBeLessThan(1_000);
      expect(server.requestsTo("/token")).toHaveLength(0);
    });

    it("should surface any other error from the token endpoint", async () => {
      tokenAnswers(() => oauthErrorResponse("invalid_client", "unknown client", 401));
      const client = new DeviceCodeAuthClient(config, {}, FAST_POLLING);

      const error: unknown = await client.deviceUserLoginComplete(initiation).then(
        () => undefined,
        (reason: unknown) => reason
      );

      expect(error).toBeInstanceOf(OidcApiError);
      expect(error).toMatchObject({ oauthError: "invalid_client" });
    });
  });

  describe("login", () => {
    it("should show the code, open the complete link and poll", async () => {
      tokenAnswers(() => jsonResponse(TOKENS));
      const prompter = new ScriptedPrompter();
      const browser = new RecordingBrowser();
      const client = new DeviceCodeAuthClient(config, { prompter, browser }, FAST_POLLING);

      const credential = await client.login();

      expect(credential.accessToken()).toBe("test-access-token");
      expect(prompter.shown).toEqual([
        `To login, visit ${TEST_ISSUER}/device and enter the code ABCD-EFGH\nor open ${TEST_ISSUER}/device?user_code=ABCD-EFGH`,
      ]);
      expect(browser.opened).toEqual([`${TEST_ISSUER}/device?user_code=ABCD-EFGH`]);
    });

    it("should carry on when no browser can be opened", async () => {
      tokenAnswers(() => jsonResponse(TOKENS));
      const client = new DeviceCodeAuthClient(
        config,
        { prompter: new ScriptedPrompter(), browser: new FailingBrowser() },
        FAST_POLLING
      );

      const credential = await client.login();

      expect(credential.accessToken()).toBe("test-access-token");
    });

    it("should not open a browser when told not to", async () => {
      tokenAnswers(() => jsonResponse(TOKENS));
      const browser = new RecordingBrowser();
      const client = new DeviceCodeAuthClient(
        config,
        { prompter: new ScriptedPrompter(), browser },
        FAST_POLLING
      );

      await client.login({ allowOpenBrowser: false });

      expect(browser.opened).toHaveLength(0);
    });
  });
});
