/**
 * OIDC Auth Client Base
 *
 * Shared plumbing for every OIDC mechanism: endpoint resolution, token
 * refresh, introspection, local validation and revocation. Subclasses
 * supply the login flow and the client authentication method.
 *
 * Explicitly configured endpoints win. Discovery runs at most once per
 * client, and only if some endpoint that is actually used was not
 * configured.
 */

import { OidcCredential } from "../credentials/credential.js";
import type { JsonObjectStorage } from "../credentials/storage.js";
import type { ClientAuthEnricher, OidcApiClientOptions } from "../oidc/api-client.js";
import { ConsolePrompter, SystemBrowserOpener, type BrowserOpener, type UserPrompter } from "../oidc/browser.js";
import { DeviceAuthorizationApiClient } from "../oidc/device-authorization-api.js";
import { DiscoveryApiClient } from "../oidc/discovery-api.js";
import { IntrospectionApiClient } from "../oidc/introspection-api.js";
import { JwksApiClient } from "../oidc/jwks-api.js";
import { RevocationApiClient } from "../oidc/revocation-api.js";
import { TokenApiClient } from "../oidc/token-api.js";
import { TokenValidator, type TokenValidatorOptions } from "../oidc/token-validator.js";
import type {
  DiscoveryDocument,
  IntrospectionResponse,
  JwtClaims,
  TokenResponse,
} from "../oidc/types.js";
import type { RequestAuthenticator } from "../request-auth/request-authenticator.js";
import { ConfigurationError, NotImplementedForMechanismError } from "../shared/errors.js";
import { Lazy } from "../shared/lazy.js";
import { createLogger } from "../shared/logger.js";
import type { OidcClientConfig } from "./config.js";
import type { AuthClient, AuthClientImplementation, LoginOptions } from "./types.js";

const logger = createLogger("OidcAuthClient");

/**
 * Collaborators an auth client can be given in place of the defaults.
 */
export interface AuthClientDependencies {
  /** Where credentials created by the client are persisted */
  readonly storage?: JsonObjectStorage;
  readonly browser?: BrowserOpener;
  readonly prompter?: UserPrompter;
  /** Timeouts and retries for calls to the authorization server */
  readonly http?: OidcApiClientOptions;
  readonly validator?: TokenValidatorOptions;
}

type OptionalEndpoint =
  | "introspection_endpoint"
  | "revocation_endpoint"
  | "device_authorization_endpoint";

export abstract class OidcAuthClient<C extends OidcClientConfig = OidcClientConfig>
  implements AuthClientImplementation
{
  readonly clientType: C["clientType"];
  protected readonly config: C;
  protected readonly storage: JsonObjectStorage | undefined;
  protected readonly browser: BrowserOpener;
  protected readonly prompter: UserPrompter;
  protected readonly httpOptions: OidcApiClientOptions;

  private readonly discoveryClient: DiscoveryApiClient;
  private readonly tokenClient: Lazy<TokenApiClient>;
  private readonly jwksClient: Lazy<JwksApiClient>;
  private readonly introspectionClient: Lazy<IntrospectionApiClient>;
  private readonly revocationClient: Lazy<RevocationApiClient>;
  private readonly deviceAuthorizationClient: Lazy<DeviceAuthorizationApiClient>;
  private readonly tokenValidator: Lazy<TokenValidator>;

  constructor(config: C, deps: AuthClientDependencies = {}) {
    this.clientType = config.clientType;
    this.config = config;
    this.storage = deps.storage;
    this.browser = deps.browser ?? new SystemBrowserOpener();
    this.prompter = deps.prompter ?? new ConsolePrompter();
    this.httpOptions = deps.http ?? {};

    this.discoveryClient = DiscoveryApiClient.forAuthServer(config.authServer, this.httpOptions);

    this.tokenClient = new Lazy(async () =>
      new TokenApiClient(
        config.tokenEndpoint ?? (await this.discovery()).token_endpoint,
        this.httpOptions
      )
    );
    this.jwksClient = new Lazy(async () =>
      new JwksApiClient(config.jwksEndpoint ?? (await this.discovery()).jwks_uri, this.httpOptions)
    );
    this.introspectionClient = new Lazy(async () =>
      new IntrospectionApiClient(
        await this.optionalEndpoint(config.introspectionEndpoint, "introspection_endpoint", "validateAccessToken"),
        this.httpOptions
      )
    );
    this.revocationClient = new Lazy(async () =>
      new RevocationApiClient(
        await this.optionalEndpoint(config.revocationEndpoint, "revocation_endpoint", "revokeAccessToken"),
        this.httpOptions
      )
    );
    this.deviceAuthorizationClient = new Lazy(async () =>
      new DeviceAuthorizationApiClient(
        await this.optionalEndpoint(
          config.deviceAuthorizationEndpoint,
          "device_authorization_endpoint",
          "deviceUserLoginInitiate"
        ),
        this.httpOptions
      )
    );
    this.tokenValidator = new Lazy(async () => new TokenValidator(await this.jwksClient.get(), deps.validator));
  }

  /** Client authentication for token, introspection and revocation requests */
  protected abstract clientAuthEnricher(): ClientAuthEnricher;

  abstract login(options?: LoginOptions): Promise<OidcCredential>;

  abstract defaultRequestAuthenticator(credentialPath?: string): RequestAuthenticator;

  /** The provider metadata document, fetched on first use */
  discovery(): Promise<DiscoveryDocument> {
    return this.discoveryClient.discovery();
  }

  async refresh(refreshToken: string, requestedScopes?: readonly string[]): Promise<OidcCredential> {
    const scopes = requestedScopes ?? this.config.defaultRequestScopes;
    logger.debug("Refreshing tokens", { refreshToken, scopes });
    const tokens = await (await this.tokenApi()).getTokenFromRefresh(
      refreshToken,
      scopes,
      this.clientAuthEnricher()
    );
    return this.credentialFrom(tokens);
  }

  async validateAccessToken(token: string): Promise<IntrospectionResponse> {
    return (await this.introspectionClient.get()).validateAccessToken(token, this.clientAuthEnricher());
  }

  async validateIdToken(token: string): Promise<IntrospectionResponse> {
    return (await this.introspectionClient.get()).validateIdToken(token, this.clientAuthEnricher());
  }

  async validateRefreshToken(token: string): Promise<IntrospectionResponse> {
    return (await this.introspectionClient.get()).validateRefreshToken(token, this.clientAuthEnricher());
  }

  /**
   * Validate an access token locally. With several audiences, matching any
   * one of them is enough.
   *
   * @param requiredAudience - Default: the configured request audiences
   */
  async validateAccessTokenLocal(
    token: string,
    requiredAudience?: string | readonly string[]
  ): Promise<JwtClaims> {
    const audience = requiredAudience ?? this.config.defaultRequestAudiences;
    if (audience.length === 0) {
      throw new ConfigurationError(
        "An audience is required to validate access tokens, and none is configured"
      );
    }
    const validator = await this.tokenValidator.get();
    return validator.validate(token, { issuer: await this.issuer(), audience });
  }

  async validateIdTokenLocal(token: string, nonce?: string): Promise<JwtClaims> {
    const validator = await this.tokenValidator.get();
    return validator.validateIdToken(token, {
      issuer: await this.issuer(),
      clientId: this.config.clientId,
      nonce,
    });
  }

  async revokeAccessToken(token: string): Promise<void> {
    await (await this.revocationClient.get()).revokeAccessToken(token, this.clientAuthEnricher());
  }

  async revokeRefreshToken(token: string): Promise<void> {
    await (await this.revocationClient.get()).revokeRefreshToken(token, this.clientAuthEnricher());
  }

  async getScopes(): Promise<readonly string[]> {
    return (await this.discovery()).scopes_supported ?? [];
  }

  /** Expected `iss` of tokens from this server */
  async issuer(): Promise<string> {
    return this.config.issuer ?? (await this.discovery()).issuer;
  }

  protected tokenApi(): Promise<TokenApiClient> {
    return this.tokenClient.get();
  }

  protected deviceAuthorizationApi(): Promise<DeviceAuthorizationApiClient> {
    return this.deviceAuthorizationClient.get();
  }

  protected credentialFrom(tokens: TokenResponse): OidcCredential {
    return new OidcCredential({ data: tokens, storage: this.storage });
  }

  /** Credential at `credentialPath` for a default request authenticator */
  protected credentialAt(credentialPath: string | undefined): OidcCredential {
    return new OidcCredential({ filePath: credentialPath, storage: this.storage });
  }

  private async optionalEndpoint(
    configured: string | undefined,
    key: OptionalEndpoint,
    capability: keyof AuthClient
  ): Promise<string> {
    if (configured) {
      return configured;
    }
    const discovered = (await this.discovery())[key];
    if (!discovered) {
      logger.debug("Authorization server does not advertise endpoint", { endpoint: key });
      throw new NotImplementedForMechanismError(this.clientType, capability);
    }
    return discovered;
  }
}
