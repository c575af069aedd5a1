/**
 * Credentials Module
 */

export {
  Credential,
  OidcCredential,
  LegacyApiKeyCredential,
  StaticApiKeyCredential,
  NoOpCredential,
  oidcCredentialSchema,
  legacyApiKeyCredentialSchema,
  staticApiKeyCredentialSchema,
} from "./credential.js";
export type {
  CredentialOptions,
  OidcCredentialData,
  LegacyApiKeyCredentialData,
  StaticApiKeyCredentialData,
} from "./credential.js";
export { FileBackedJsonObject } from "./file-backed-json.js";
export type {
  FileBackedJsonObjectOptions,
  JsonObject,
  JsonObjectSchema,
} from "./file-backed-json.js";
export { FileSystemJsonStorage, defaultJsonStorage } from "./storage.js";
export type { JsonObjectStorage } from "./storage.js";
