/**
 * Authorization Endpoint Helpers
 *
 * The authorization endpoint is never called directly: the user's browser
 * goes there, and the result comes back through the redirect URI. These
 * helpers build the request URL and read the redirect.
 */

import {
  AuthorizationError,
  CallbackStateMismatchError,
} from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { NONCE_LENGTH, STATE_LENGTH } from "../shared/constants.js";
import { generateNonce } from "./pkce.js";

const logger = createLogger("AuthorizationApi");

export interface AuthorizationRequestParams {
  readonly authorizationEndpoint: string;
  readonly clientId: string;
  readonly redirectUri: string;
  readonly codeChallenge: string;
  readonly requestedScopes?: readonly string[];
  readonly requestedAudiences?: readonly string[];
}

/** A prepared authorization request and the values its callback is checked against */
export interface AuthorizationRequest {
  readonly url: string;
  readonly state: string;
  readonly nonce: string;
}

/**
 * Build an authorization-code + PKCE (S256) request URL with a fresh
 * state and nonce.
 */
export function buildAuthorizationRequest(params: AuthorizationRequestParams): AuthorizationRequest {
  const state = generateNonce(STATE_LENGTH);
  const nonce = generateNonce(NONCE_LENGTH);

  const url = new URL(params.authorizationEndpoint);
  url.searchParams.set("client_id", params.clientId);
  url.searchParams.set("response_type", "code");
  url.searchParams.set("redirect_uri", params.redirectUri);
  url.searchParams.set("state", state);
  url.searchParams.set("nonce", nonce);
  url.searchParams.set("code_challenge", params.codeChallenge);
  url.searchParams.set("code_challenge_method", "S256");
  if (params.requestedScopes && params.requestedScopes.length > 0) {
    url.searchParams.set("scope", params.requestedScopes.join(" "));
  }
  if (params.requestedAudiences && params.requestedAudiences.length > 0) {
    url.searchParams.set("audience", params.requestedAudiences.join(" "));
  }

  return { url: url.toString(), state, nonce };
}

/**
 * Extract the authorization code from a redirect.
 *
 * @param callback - Full callback URL, or the request path and query the listener saw
 * @throws AuthorizationError when the server reported an error or sent no code
 * @throws CallbackStateMismatchError when `state` does not match the request
 */
export function parseAuthorizationCallback(callback: string, expectedState: string): string {
  if (callback.trim().length === 0) {
    throw new AuthorizationError("Authorization callback was empty", "EMPTY_CALLBACK");
  }

  logger.debug("Parsing callback request from authorization server");

  // Resolve bare paths against a placeholder origin; only the query matters
  const query = new URL(callback.trim(), "http://localhost").searchParams;

  const error = query.get("error");
  if (error) {
    throw new AuthorizationError(
      `Authorization error: ${error}: ${query.get("error_description") ?? "no error description"}`,
      "AUTHORIZATION_DENIED",
      { error }
    );
  }

  const state = query.get("state") ?? undefined;
  if (state !== expectedState) {
    throw new CallbackStateMismatchError(expectedState, state);
  }

  const code = query.get("code");
  if (!code) {
    throw new AuthorizationError(
      "Failed to understand authorization callback. Callback request did not include an authorization code or a recognized error.",
      "MISSING_AUTHORIZATION_CODE"
    );
  }

  return code;
}
