/**
 * Request Authenticator
 *
 * Decorates outbound requests with an auth header. Subclasses decide in
 * preRequestHook() what token to present, reloading or refreshing it as
 * needed. Calls on one instance are expected to be sequential.
 */

import type { Credential } from "../credentials/credential.js";

export type FetchFunction = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/** Anything the Headers constructor accepts */
export type HeaderSource = ConstructorParameters<typeof Headers>[0];

export interface RequestAuthenticatorOptions {
  readonly tokenBody?: string;
  /** Placed before the token in the header; empty for a bare token (default: "Bearer") */
  readonly tokenPrefix?: string;
  /** Default: "Authorization" */
  readonly authHeaderName?: string;
}

export abstract class RequestAuthenticator {
  protected tokenBody: string | undefined;
  protected tokenPrefix: string;
  protected readonly authHeaderName: string;

  constructor(options: RequestAuthenticatorOptions = {}) {
    this.tokenBody = options.tokenBody;
    this.tokenPrefix = options.tokenPrefix ?? "Bearer";
    this.authHeaderName = options.authHeaderName ?? "Authorization";
  }

  /** Bring the token up to date before a request goes out */
  abstract preRequestHook(): Promise<void>;

  /** The credential behind the token */
  abstract credential(): Credential;

  headerName(): string {
    return this.authHeaderName;
  }

  /**
   * Header value for the current token, or undefined when there is none
   * and the request should go out unauthenticated.
   */
  headerValue(): string | undefined {
    if (!this.tokenBody) {
      return undefined;
    }
    return this.tokenPrefix ? `${this.tokenPrefix} ${this.tokenBody}` : this.tokenBody;
  }

  /**
   * Run the pre-request hook and return `headers` with the auth header set.
   */
  async authenticate(headers?: HeaderSource): Promise<Headers> {
    await this.preRequestHook();
    const result = new Headers(headers);
    const value = this.headerValue();
    if (value !== undefined) {
      result.set(this.authHeaderName, value);
    }
    return result;
  }

  /**
   * Wrap a fetch function so that every request it sends is authenticated.
   */
  wrapFetch(fetchFn: FetchFunction = fetch): FetchFunction {
    return async (input, init) => {
      const baseHeaders = init?.headers ?? (input instanceof Request ? input.headers : undefined);
      const headers = await this.authenticate(baseHeaders);
      return fetchFn(input, { ...init, headers });
    };
  }
}

export interface SimpleInMemoryRequestAuthenticatorOptions extends RequestAuthenticatorOptions {
  readonly credential: Credential;
}

/**
 * Presents a fixed token. Nothing is ever reloaded or refreshed.
 */
export class SimpleInMemoryRequestAuthenticator extends RequestAuthenticator {
  private readonly heldCredential: Credential;

  constructor(options: SimpleInMemoryRequestAuthenticatorOptions) {
    super(options);
    this.heldCredential = options.credential;
  }

  preRequestHook(): Promise<void> {
    return Promise.resolve();
  }

  credential(): Credential {
    return this.heldCredential;
  }
}
