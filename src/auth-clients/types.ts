/**
 * Auth Client Capability Interface
 *
 * Every mechanism exposes the same capabilities. A mechanism implements
 * the ones it has; the rest default to NotImplementedForMechanismError.
 */

import type { Credential, OidcCredential } from "../credentials/credential.js";
import type { IntrospectionResponse, JwtClaims } from "../oidc/types.js";
import type { RequestAuthenticator } from "../request-auth/request-authenticator.js";
import { NotImplementedForMechanismError } from "../shared/errors.js";
import type { ClientType } from "./config.js";

export interface LoginOptions {
  /** Scopes to request (default: the client's configured scopes) */
  readonly requestedScopes?: readonly string[];
  /** Audiences to request (default: the client's configured audiences) */
  readonly requestedAudiences?: readonly string[];
  /** Interactive flows may open a browser (default: true) */
  readonly allowOpenBrowser?: boolean;
  /** Legacy mechanism only; prompted for when absent */
  readonly username?: string;
  /** Legacy mechanism only; prompted for when absent */
  readonly password?: string;
}

/** Result of starting a device authorization (RFC 8628 section 3.2) */
export interface DeviceLoginInitiation {
  readonly deviceCode: string;
  readonly userCode: string;
  readonly verificationUri: string;
  /** Verification URI with the user code embedded, for links and QR codes */
  readonly verificationUriComplete?: string;
  /** Seconds until the device code expires */
  readonly expiresIn: number;
  /** Seconds between polls */
  readonly interval: number;
}

export interface DeviceLoginCompleteOptions {
  /** Give up after this long, even if the device code is still valid */
  readonly timeoutMs?: number;
}

export interface AuthClient {
  readonly clientType: ClientType;

  /** Obtain a new credential */
  login(options?: LoginOptions): Promise<Credential>;

  /** Exchange a refresh token for a new credential */
  refresh(refreshToken: string, requestedScopes?: readonly string[]): Promise<Credential>;

  /**
   * The request authenticator suited to this mechanism, over the credential
   * stored at `credentialPath` (in memory only when absent).
   */
  defaultRequestAuthenticator(credentialPath?: string): RequestAuthenticator;

  /** Remote validation through the introspection endpoint */
  validateAccessToken(token: string): Promise<IntrospectionResponse>;
  validateIdToken(token: string): Promise<IntrospectionResponse>;
  validateRefreshToken(token: string): Promise<IntrospectionResponse>;

  /** Local validation against the published signing keys */
  validateAccessTokenLocal(
    token: string,
    requiredAudience?: string | readonly string[]
  ): Promise<JwtClaims>;
  validateIdTokenLocal(token: string, nonce?: string): Promise<JwtClaims>;

  revokeAccessToken(token: string): Promise<void>;
  revokeRefreshToken(token: string): Promise<void>;

  /** Scopes the authorization server advertises */
  getScopes(): Promise<readonly string[]>;

  deviceUserLoginInitiate(options?: LoginOptions): Promise<DeviceLoginInitiation>;
  deviceUserLoginComplete(
    initiation: DeviceLoginInitiation,
    options?: DeviceLoginCompleteOptions
  ): Promise<Credential>;
}

type CoreCapability = "clientType" | "defaultRequestAuthenticator";

/** What a mechanism must provide; everything else is optional */
export type AuthClientImplementation = Pick<AuthClient, CoreCapability> &
  Partial<Omit<AuthClient, CoreCapability>>;

/**
 * What the refreshing authenticators need from an OIDC client.
 */
export interface OidcTokenSource {
  login(options?: LoginOptions): Promise<OidcCredential>;
  refresh(refreshToken: string, requestedScopes?: readonly string[]): Promise<OidcCredential>;
}

function unsupported(
  mechanism: ClientType,
  capability: keyof AuthClient
): (...args: unknown[]) => Promise<never> {
  return () => Promise.reject(new NotImplementedForMechanismError(mechanism, capability));
}

/**
 * Fill in every capability a mechanism lacks with one that rejects with
 * NotImplementedForMechanismError.
 */
export function withCapabilityDefaults(impl: AuthClientImplementation): AuthClient {
  const type = impl.clientType;
  return {
    clientType: type,
    defaultRequestAuthenticator: (credentialPath) => impl.defaultRequestAuthenticator(credentialPath),
    login: impl.login?.bind(impl) ?? unsupported(type, "login"),
    refresh: impl.refresh?.bind(impl) ?? unsupported(type, "refresh"),
    validateAccessToken: impl.validateAccessToken?.bind(impl) ?? unsupported(type, "validateAccessToken"),
    validateIdToken: impl.validateIdToken?.bind(impl) ?? unsupported(type, "validateIdToken"),
    validateRefreshToken:
      impl.validateRefreshToken?.bind(impl) ?? unsupported(type, "validateRefreshToken"),
    validateAccessTokenLocal:
      impl.validateAccessTokenLocal?.bind(impl) ?? unsupported(type, "validateAccessTokenLocal"),
    validateIdTokenLocal:
      impl.validateIdTokenLocal?.bind(impl) ?? unsupported(type, "validateIdTokenLocal"),
    revokeAccessToken: impl.revokeAccessToken?.bind(impl) ?? unsupported(type, "revokeAccessToken"),
    revokeRefreshToken: impl.revokeRefreshToken?.bind(impl) ?? unsupported(type, "revokeRefreshToken"),
    getScopes: impl.getScopes?.bind(impl) ?? unsupported(type, "getScopes"),
    deviceUserLoginInitiate:
      impl.deviceUserLoginInitiate?.bind(impl) ?? unsupported(type, "deviceUserLoginInitiate"),
    deviceUserLoginComplete:
      impl.deviceUserLoginComplete?.bind(impl) ?? unsupported(type, "deviceUserLoginComplete"),
  };
}
