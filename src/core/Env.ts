/**
 * Env - Environment Fallbacks
 *
 * Settings the library reads from the environment when the caller leaves
 * them out.
 *
 * @module Env
 */

/** Path of the service account key file used when none is passed */
export const SERVICE_ACCOUNT_FILE_ENV = "GOOGLE_DOCUMENT_SERVICE_JSON";

/**
 * Returns `value` when the caller passed one, else the environment variable
 *
 * Only an omitted value falls back; an empty string is returned as is so the
 * caller's own validation can reject it. An empty environment variable counts
 * as unset.
 *
 * @throws Error with `errorMessage` when both are missing
 *
 * @example
 * envOr(keyFile, SERVICE_ACCOUNT_FILE_ENV, "No service account key file");
 */
export function envOr(
  value: string | undefined,
  envVarName: string,
  errorMessage: string
): string {
  if (value !== undefined) {
    return value;
  }
  const fromEnv = process.env[envVarName];
  if (!fromEnv) {
    throw new Error(errorMessage);
  }
  return fromEnv;
}
