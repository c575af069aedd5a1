/**
 * Tests for the loopback callback listener. These bind real sockets on
 * 127.0.0.1 with an ephemeral port.
 */

import { describe, expect, it } from "vitest";
import {
  AuthorizationTimeoutError,
  UnsupportedRedirectHostError,
} from "../shared/errors.js";
import { awaitAuthorizationCallback, loopbackAddressOf } from "./callback-listener.js";

function listen(redirectUri: string, timeoutMs = 5_000) {
  let resolvePort: (port: number) => void = () => undefined;
  const port = new Promise<number>((resolve) => {
    resolvePort = resolve;
  });
  const callback = awaitAuthorizationCallback({
    redirectUri,
    timeoutMs,
    onListening: (address) => resolvePort(address.port),
  });
  return { port, callback };
}

/** Send a request and drain it; the listener may close the socket right after answering */
async function request(url: string, method = "GET"): Promise<number> {
  try {
    const response = await fetch(url, { method });
    await response.text();
    return response.status;
  } catch {
    return 0;
  }
}

describe("loopbackAddressOf", () => {
  it("should accept loopback hosts", () => {
    expect(loopbackAddressOf("http://LOCALHOST:8080/callback")).toEqual({ hostname: "localhost", port: 8080 });
    expect(loopbackAddressOf("http://127.0.0.1/callback")).toEqual({ hostname: "127.0.0.1", port: 80 });
  });

  it.each(["https://app.test.example/callback", "http://0.0.0.0:8080/callback", "not a url"])(
    "should refuse %s",
    (redirectUri) => {
      expect(() => loopbackAddressOf(redirectUri)).toThrow(UnsupportedRedirectHostError);
    }
  );
});

describe("awaitAuthorizationCallback", () => {
  it("should return the path and query of the redirect", async () => {
    const { port, callback } = listen("http://127.0.0.1:0/callback");

    const sent = request(`http://127.0.0.1:${await port}/callback?code=test-code&state=12345678`);

    await expect(callback).resolves.toBe("/callback?code=test-code&state=12345678");
    await sent;
  });

  it("should answer other methods with 405 and keep waiting", async () => {
    const { port, callback } = listen("http://127.0.0.1:0/callback");
    const base = `http://127.0.0.1:${await port}/callback`;

    const status = await request(`${base}?code=forged`, "POST");
    const sent = request(`${base}?code=test-code`);

    expect(status).toBe(405);
    await expect(callback).resolves.toBe("/callback?code=test-code");
    await sent;
  });

  it("should ignore requests for other paths", async () => {
    const { port, callback } = listen("http://127.0.0.1:0/callback");
    const origin = `http://127.0.0.1:${await port}`;

    const faviconStatus = await request(`${origin}/favicon.ico`);
    const sent = request(`${origin}/callback?code=test-code`);

    expect(faviconStatus).toBe(404);
    await expect(callback).resolves.toBe("/callback?code=test-code");
    await sent;
  });

  it("should refuse a non-loopback redirect before binding", async () => {
    await expect(
      awaitAuthorizationCallback({ redirectUri: "https://app.test.example/callback" })
    ).rejects.toBeInstanceOf(UnsupportedRedirectHostError);
  });

  it("should give up when no redirect arrives", async () => {
    const { callback } = listen("http://127.0.0.1:0/callback", 50);

    await expect(callback).rejects.toThrow(
      new AuthorizationTimeoutError(50)
    );
  });

  it("should fail when the listening hook fails", async () => {
    const failure = new Error("browser exploded");

    await expect(
      awaitAuthorizationCallback({
        redirectUri: "http://127.0.0.1:0/callback",
        timeoutMs: 5_000,
        onListening: () => Promise.reject(failure),
      })
    ).rejects.toBe(failure);
  });
});
