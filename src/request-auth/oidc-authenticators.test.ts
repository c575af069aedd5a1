/**
 * Tests for the refreshing OIDC request authenticators
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { LoginOptions, OidcTokenSource } from "../auth-clients/types.js";
import { OidcCredential } from "../credentials/credential.js";
import { MemoryJsonStorage } from "../testing/memory-storage.js";
import {
  computeRefreshAt,
  RefreshingOidcTokenRequestAuthenticator,
  RefreshOrReloginOidcTokenRequestAuthenticator,
} from "./oidc-authenticators.js";

const T0 = Date.parse("2030-01-01T00:00:00.000Z") / 1000;
const LIFETIME = 1000;
const TOKEN_PATH = "/profiles/default/token.json";

/** Unsigned JWT; nothing here checks signatures */
function accessToken(iat: number, exp: number, sub = "user-1"): string {
  const part = (value: unknown): string => Buffer.from(JSON.stringify(value)).toString("base64url");
  return `${part({ alg: "RS256", kid: "key-1" })}.${part({ sub, iat, exp })}.c2ln`;
}

function tokensIssuedAt(iat: number, refreshToken = "test-refresh-token") {
  return {
    token_type: "Bearer",
    expires_in: LIFETIME,
    access_token: accessToken(iat, iat + LIFETIME),
    refresh_token: refreshToken,
  };
}

function setClock(sec: number): void {
  vi.setSystemTime(new Date(sec * 1000));
}

class FakeTokenSource implements OidcTokenSource {
  readonly refresh = vi.fn<(refreshToken: string, scopes?: readonly string[]) => Promise<OidcCredential>>();
  readonly login = vi.fn<(options?: LoginOptions) => Promise<OidcCredential>>();

  constructor(private readonly storage?: MemoryJsonStorage) {
    this.refresh.mockImplementation(() =>
      Promise.resolve(
        new OidcCredential({
          data: tokensIssuedAt(Math.floor(Date.now() / 1000), "test-refresh-token-2"),
          storage: this.storage,
        })
      )
    );
  }
}

async function authorizationHeader(
  authenticator: RefreshingOidcTokenRequestAuthenticator
): Promise<string | null> {
  return (await authenticator.authenticate()).get("Authorization");
}

describe("computeRefreshAt", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    setClock(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should refresh three quarters into a JWT's lifetime", () => {
    const credential = new OidcCredential({ data: { access_token: accessToken(T0 - 100, T0 + 900) } });

    expect(computeRefreshAt(credential)).toBe(T0 - 100 + 750);
  });

  it("should time an opaque token from when it was set", () => {
    const credential = new OidcCredential({ data: { access_token: "opaque-token", expires_in: 600 } });

    expect(computeRefreshAt(credential)).toBe(T0 + 450);
  });

  it("should time a loaded opaque token from when its file was written", () => {
    const storage = new MemoryJsonStorage();
    new OidcCredential({
      data: { access_token: "opaque-token", expires_in: 600 },
      filePath: TOKEN_PATH,
      storage,
    }).save();
    setClock(T0 + 400);

    const reloaded = new OidcCredential({ filePath: TOKEN_PATH, storage });
    reloaded.load();

    expect(reloaded.loadTime()).toBe((T0 + 400) * 1000);
    expect(computeRefreshAt(reloaded)).toBe(T0 + 450);
  });

  it("should be due immediately without an access token", () => {
    const credential = new OidcCredential({ data: { refresh_token: "test-refresh-token" } });

    expect(computeRefreshAt(credential)).toBe(0);
  });
});

describe("RefreshingOidcTokenRequestAuthenticator", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    setClock(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should refresh once after three quarters of the lifetime", async () => {
    const source = new FakeTokenSource();
    const credential = new OidcCredential({ data: tokensIssuedAt(T0) });
    const authenticator = new RefreshingOidcTokenRequestAuthenticator({ credential, authClient: source });

    expect(await authorizationHeader(authenticator)).toBe(`Bearer ${accessToken(T0, T0 + LIFETIME)}`);
    expect(authenticator.refreshAt()).toBe(T0 + 750);

    setClock(T0 + 740);
    await authorizationHeader(authenticator);
    expect(source.refresh).not.toHaveBeenCalled();

    setClock(T0 + 760);
    expect(await authorizationHeader(authenticator)).toBe(
      `Bearer ${accessToken(T0 + 760, T0 + 760 + LIFETIME)}`
    );
    await authorizationHeader(authenticator);

    expect(source.refresh).toHaveBeenCalledTimes(1);
    expect(source.refresh).toHaveBeenCalledWith("test-refresh-token");
    expect(authenticator.credential().refreshToken()).toBe("test-refresh-token-2");
    expect(authenticator.refreshAt()).toBe(T0 + 760 + 750);
  });

  it("should keep presenting the old token when refresh fails", async () => {
    const source = new FakeTokenSource();
    source.refresh.mockRejectedValue(new Error("server unavailable"));
    const credential = new OidcCredential({ data: tokensIssuedAt(T0) });
    const authenticator = new RefreshingOidcTokenRequestAuthenticator({ credential, authClient: source });

    setClock(T0 + 900);
    const header = await authorizationHeader(authenticator);

    expect(header).toBe(`Bearer ${accessToken(T0, T0 + LIFETIME)}`);
    expect(source.refresh).toHaveBeenCalledTimes(1);
  });

  it("should never refresh without an auth client", async () => {
    const storage = new MemoryJsonStorage();
    storage.write(TOKEN_PATH, tokensIssuedAt(T0));
    const credential = new OidcCredential({ filePath: TOKEN_PATH, storage });
    const authenticator = new RefreshingOidcTokenRequestAuthenticator({ credential });

    setClock(T0 + 2000);
    const header = await authorizationHeader(authenticator);

    expect(header).toBe(`Bearer ${accessToken(T0, T0 + LIFETIME)}`);
  });

  it("should save the refreshed credential to the same file", async () => {
    const storage = new MemoryJsonStorage();
    storage.write(TOKEN_PATH, tokensIssuedAt(T0));
    const source = new FakeTokenSource(storage);
    const authenticator = new RefreshingOidcTokenRequestAuthenticator({
      credential: new OidcCredential({ filePath: TOKEN_PATH, storage }),
      authClient: source,
    });

    setClock(T0 + 800);
    await authorizationHeader(authenticator);

    expect(storage.peek(TOKEN_PATH)).toEqual(tokensIssuedAt(T0 + 800, "test-refresh-token-2"));
    expect(authenticator.credential().path()).toBe(TOKEN_PATH);
  });

  it("should pick up a refresh made by another process instead of refreshing again", async () => {
    const storage = new MemoryJsonStorage();
    storage.write(TOKEN_PATH, tokensIssuedAt(T0));
    const sourceA = new FakeTokenSource(storage);
    const sourceB = new FakeTokenSource(storage);
    const first = new RefreshingOidcTokenRequestAuthenticator({
      credential: new OidcCredential({ filePath: TOKEN_PATH, storage }),
      authClient: sourceA,
    });
    const second = new RefreshingOidcTokenRequestAuthenticator({
      credential: new OidcCredential({ filePath: TOKEN_PATH, storage }),
      authClient: sourceB,
    });
    await authorizationHeader(first);
    await authorizationHeader(second);

    setClock(T0 + 760);
    const refreshedHeader = await authorizationHeader(first);
    const reloadedHeader = await authorizationHeader(second);

    expect(reloadedHeader).toBe(refreshedHeader);
    expect(reloadedHeader).toBe(`Bearer ${accessToken(T0 + 760, T0 + 760 + LIFETIME)}`);
    expect(sourceA.refresh).toHaveBeenCalledTimes(1);
    expect(sourceB.refresh).not.toHaveBeenCalled();
  });

  it("should send no header when the credential file is missing", async () => {
    const credential = new OidcCredential({ filePath: TOKEN_PATH, storage: new MemoryJsonStorage() });
    const authenticator = new RefreshingOidcTokenRequestAuthenticator({ credential });

    const headers = await authenticator.authenticate({ Accept: "application/json" });

    expect(headers.get("Authorization")).toBeNull();
    expect(headers.get("Accept")).toBe("application/json");
  });
});

describe("RefreshOrReloginOidcTokenRequestAuthenticator", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    setClock(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should log in again when there is no refresh token", async () => {
    const source = new FakeTokenSource();
    source.login.mockResolvedValue(
      new OidcCredential({ data: { access_token: accessToken(T0 + 800, T0 + 1800), expires_in: LIFETIME } })
    );
    const credential = new OidcCredential({
      data: { access_token: accessToken(T0, T0 + LIFETIME), expires_in: LIFETIME },
    });
    const authenticator = new RefreshOrReloginOidcTokenRequestAuthenticator({ credential, authClient: source });

    setClock(T0 + 800);
    const header = await authorizationHeader(authenticator);

    expect(header).toBe(`Bearer ${accessToken(T0 + 800, T0 + 1800)}`);
    expect(source.login).toHaveBeenCalledTimes(1);
    expect(source.refresh).not.toHaveBeenCalled();
  });

  it("should log in when no credential has been stored yet", async () => {
    const storage = new MemoryJsonStorage();
    const source = new FakeTokenSource(storage);
    source.login.mockResolvedValue(
      new OidcCredential({
        data: { access_token: accessToken(T0, T0 + LIFETIME), expires_in: LIFETIME },
        storage,
      })
    );
    const authenticator = new RefreshOrReloginOidcTokenRequestAuthenticator({
      credential: new OidcCredential({ filePath: TOKEN_PATH, storage }),
      authClient: source,
    });

    const header = await authorizationHeader(authenticator);

    expect(header).toBe(`Bearer ${accessToken(T0, T0 + LIFETIME)}`);
    expect(source.login).toHaveBeenCalledTimes(1);
    expect(storage.peek(TOKEN_PATH)).toEqual({
      access_token: accessToken(T0, T0 + LIFETIME),
      expires_in: LIFETIME,
    });
  });

  it("should prefer refresh when a refresh token exists", async () => {
    const source = new FakeTokenSource();
    const credential = new OidcCredential({ data: tokensIssuedAt(T0) });
    const authenticator = new RefreshOrReloginOidcTokenRequestAuthenticator({ credential, authClient: source });

    setClock(T0 + 800);
    await authorizationHeader(authenticator);

    expect(source.refresh).toHaveBeenCalledTimes(1);
    expect(source.login).not.toHaveBeenCalled();
  });
});
