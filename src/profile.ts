/**
 * Auth Profiles
 *
 * A profile is a directory under the profile root holding an auth client
 * config and the credential it produced. Three names are built in and need
 * no directory of their own for the client config.
 */

import { join } from "node:path";
import { getConfig } from "./config/index.js";

export const BUILTIN_PROFILE_DEFAULT = "default";
export const BUILTIN_PROFILE_LEGACY = "legacy";
export const BUILTIN_PROFILE_NONE = "none";

/**
 * Path of `filename` in a profile's directory. An override path always wins.
 *
 * @param profile - Profile name, case-insensitive (default: "default")
 */
export function profileFilePath(
  filename: string,
  profile: string | undefined,
  overridePath?: string
): string {
  if (overridePath) {
    return overridePath;
  }
  const name = profile ? profile.toLowerCase() : BUILTIN_PROFILE_DEFAULT;
  return join(getConfig().profileRoot, name, filename);
}

export function isDefaultProfile(profile: string | undefined): boolean {
  return !profile || profile.toLowerCase() === BUILTIN_PROFILE_DEFAULT;
}

export function isLegacyProfile(profile: string | undefined): boolean {
  return profile?.toLowerCase() === BUILTIN_PROFILE_LEGACY;
}

export function isNoneProfile(profile: string | undefined): boolean {
  return profile?.toLowerCase() === BUILTIN_PROFILE_NONE;
}
