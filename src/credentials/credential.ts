/**
 * Credential Types
 *
 * A credential is a validated, file-backed bag of secrets. Each kind of
 * credential brings its own schema; the canonical file keys are snake_case.
 */

import { z } from "zod";
import {
  FileBackedJsonObject,
  type FileBackedJsonObjectOptions,
  type JsonObject,
} from "./file-backed-json.js";

export type CredentialOptions<T extends JsonObject> = FileBackedJsonObjectOptions<T>;

/** Base for every credential kind */
export class Credential<T extends JsonObject = JsonObject> extends FileBackedJsonObject<T> {}

// ============================================================================
// OIDC tokens
// ============================================================================

export const oidcCredentialSchema = z
  .object({
    token_type: z.string().optional(),
    expires_in: z.number().nonnegative().optional(),
    access_token: z.string().min(1).optional(),
    scope: z.string().optional(),
    refresh_token: z.string().min(1).optional(),
    id_token: z.string().min(1).optional(),
  })
  .passthrough()
  .refine(
    (data) =>
      data.access_token !== undefined ||
      data.id_token !== undefined ||
      data.refresh_token !== undefined,
    { message: "'access_token', 'id_token', or 'refresh_token' is required" }
  );

export type OidcCredentialData = z.infer<typeof oidcCredentialSchema>;

/** Tokens issued by an OIDC token endpoint */
export class OidcCredential extends Credential<OidcCredentialData> {
  constructor(options: CredentialOptions<OidcCredentialData> = {}) {
    super(oidcCredentialSchema, options);
  }

  accessToken(): string | undefined {
    return this.lazyGet("access_token");
  }

  idToken(): string | undefined {
    return this.lazyGet("id_token");
  }

  refreshToken(): string | undefined {
    return this.lazyGet("refresh_token");
  }

  expiresIn(): number | undefined {
    return this.lazyGet("expires_in");
  }

  scope(): string | undefined {
    return this.lazyGet("scope");
  }
}

// ============================================================================
// API keys
// ============================================================================

export const legacyApiKeyCredentialSchema = z
  .object({
    key: z.string().min(1, "'key' is required"),
  })
  .passthrough();

export type LegacyApiKeyCredentialData = z.infer<typeof legacyApiKeyCredentialSchema>;

/** API key obtained from the legacy username/password login */
export class LegacyApiKeyCredential extends Credential<LegacyApiKeyCredentialData> {
  constructor(options: CredentialOptions<LegacyApiKeyCredentialData> = {}) {
    super(legacyApiKeyCredentialSchema, options);
  }

  apiKey(): string {
    return this.lazyGet("key");
  }
}

export const staticApiKeyCredentialSchema = z
  .object({
    api_key: z.string().min(1, "'api_key' is required"),
    bearer_token_prefix: z.string().min(1, "'bearer_token_prefix' is required"),
  })
  .passthrough();

export type StaticApiKeyCredentialData = z.infer<typeof staticApiKeyCredentialSchema>;

/** Pre-provisioned API key, presented with its own header prefix */
export class StaticApiKeyCredential extends Credential<StaticApiKeyCredentialData> {
  constructor(options: CredentialOptions<StaticApiKeyCredentialData> = {}) {
    super(staticApiKeyCredentialSchema, options);
  }

  apiKey(): string {
    return this.lazyGet("api_key");
  }

  bearerTokenPrefix(): string {
    return this.lazyGet("bearer_token_prefix");
  }
}

// ============================================================================
// No-op
// ============================================================================

const noOpCredentialSchema = z.object({}).passthrough();

/**
 * Credential of the "none" mechanism. It holds nothing and never touches
 * the filesystem.
 */
export class NoOpCredential extends Credential {
  constructor() {
    super(noOpCredentialSchema, { data: {} });
  }

  override load(): void {}

  override save(): void {}
}
