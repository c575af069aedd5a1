/**
 * Loopback Callback Listener
 *
 * Catches the authorization server's redirect in the browser-driven
 * authorization-code flow (RFC 8252 section 7.3). Binds only to a loopback
 * host, serves exactly one GET to the redirect path, then stops.
 */

import { createServer, type Server } from "node:http";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { getConfig } from "../config/index.js";
import { DEFAULT_REDIRECT_LISTEN_PORT, LOOPBACK_HOSTS } from "../shared/constants.js";
import { AuthorizationTimeoutError, UnsupportedRedirectHostError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { TimeoutError, withTimeout } from "../shared/timeout.js";

const logger = createLogger("CallbackListener");

const CALLBACK_PAGE_PATH = fileURLToPath(new URL("../../resources/callback.html", import.meta.url));

export interface LoopbackAddress {
  readonly hostname: string;
  readonly port: number;
}

/**
 * Check that a redirect URI points at this machine and work out where to
 * listen for it.
 *
 * @throws UnsupportedRedirectHostError for any non-loopback host
 */
export function loopbackAddressOf(redirectUri: string): LoopbackAddress {
  let url: URL;
  try {
    url = new URL(redirectUri);
  } catch {
    throw new UnsupportedRedirectHostError(redirectUri);
  }

  const hostname = url.hostname.toLowerCase();
  if (!LOOPBACK_HOSTS.includes(hostname)) {
    throw new UnsupportedRedirectHostError(redirectUri);
  }

  return {
    hostname,
    port: url.port ? Number(url.port) : DEFAULT_REDIRECT_LISTEN_PORT,
  };
}

export interface CallbackListenerOptions {
  readonly redirectUri: string;
  /** How long to wait for the redirect (default: configured callback timeout) */
  readonly timeoutMs?: number;
  /**
   * Called once the listener is accepting connections, with the bound
   * address. This is where the browser gets opened.
   */
  readonly onListening?: (address: LoopbackAddress) => Promise<void> | void;
}

/**
 * Listen for one authorization redirect and return its request path and
 * query, unparsed.
 *
 * @throws UnsupportedRedirectHostError before anything is bound
 * @throws AuthorizationTimeoutError when no redirect arrives in time
 */
export async function awaitAuthorizationCallback(options: CallbackListenerOptions): Promise<string> {
  const address = loopbackAddressOf(options.redirectUri);
  const redirectPath = new URL(options.redirectUri).pathname;
  const timeoutMs = options.timeoutMs ?? getConfig().callbackTimeoutMs;
  const page = readFileSync(CALLBACK_PAGE_PATH, "utf8");

  let server: Server | undefined;
  try {
    return await withTimeout(
      "authorization callback",
      (signal) =>
        new Promise<string>((resolve, reject) => {
          const httpServer = createServer((req, res) => {
            if (req.method !== "GET" || req.url === undefined) {
              res.writeHead(405).end();
              return;
            }
            // Browsers also ask for /favicon.ico and the like
            if (new URL(req.url, "http://localhost").pathname !== redirectPath) {
              res.writeHead(404).end();
              return;
            }
            res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
            res.end(page);
            resolve(req.url);
          });
          server = httpServer;

          signal.addEventListener("abort", () => reject(signal.reason), { once: true });
          httpServer.once("error", reject);
          httpServer.listen(address.port, address.hostname, () => {
            const bound = httpServer.address();
            const port = typeof bound === "object" && bound !== null ? bound.port : address.port;
            logger.debug("Listening for authorization callback", { host: address.hostname, port });
            Promise.resolve(options.onListening?.({ hostname: address.hostname, port })).catch(reject);
          });
        }),
      timeoutMs
    );
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw new AuthorizationTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    await closeServer(server);
  }
}

function closeServer(server: Server | undefined): Promise<void> {
  if (!server?.listening) {
    return Promise.resolve();
  }
  const listening = server;
  return new Promise((resolve) => {
    listening.close(() => resolve());
    listening.closeAllConnections();
  });
}
