/**
 * imagery-auth
 *
 * OAuth2/OIDC client flows, token validation and request authentication.
 *
 * @example
 * ```ts
 * import { Auth } from "imagery-auth";
 *
 * const auth = Auth.initialize({ profile: "default" });
 * const authedFetch = auth.requestAuthenticator().wrapFetch();
 * const res = await authedFetch("https://api.imagery.example/v1/items");
 * ```
 */

export { Auth, type AuthInitializeOptions } from "./auth.js";
export {
  BUILTIN_PROFILE_DEFAULT,
  BUILTIN_PROFILE_LEGACY,
  BUILTIN_PROFILE_NONE,
  isDefaultProfile,
  isLegacyProfile,
  isNoneProfile,
  profileFilePath,
} from "./profile.js";
export { getConfig, resetConfig, type Config, type LogLevel } from "./config/index.js";
export * from "./auth-clients/index.js";
export * from "./credentials/index.js";
export * from "./request-auth/index.js";
export * from "./oidc/index.js";
export * from "./shared/index.js";
