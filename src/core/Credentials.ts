/**
 * Credentials - Service Account Resolution
 *
 * Loads a Google service account key file, either from an explicit path or
 * from the GOOGLE_DOCUMENT_SERVICE_JSON environment variable, and turns it
 * into JWT credentials for the Drive and Sheets clients.
 *
 * @module Credentials
 */

import { JWT } from "google-auth-library";
import { readFile, stat } from "node:fs/promises";
import { SERVICE_ACCOUNT_FILE_ENV, envOr } from "./Env";

/** Scopes requested when none are given (full Drive access) */
export const DEFAULT_SCOPES = ["https://www.googleapis.com/auth/drive"];

/**
 * The fields of a service account key file that the library relies on
 */
export interface ServiceAccountKey {
  type?: string;
  project_id?: string;
  client_email: string;
  private_key: string;
  [key: string]: unknown;
}

/**
 * Credentials resolved from a key file
 */
export interface ResolvedCredentials {
  /** Path of the key file the credentials were read from */
  keyFile: string;
  /** Parsed key file */
  key: ServiceAccountKey;
  /** JWT client authorizing API requests */
  auth: JWT;
}

export interface ResolveCredentialsOptions {
  /** Key file path; falls back to GOOGLE_DOCUMENT_SERVICE_JSON */
  keyFile?: string;
  /** OAuth scopes; defaults to DEFAULT_SCOPES */
  scopes?: string[];
}

/**
 * Returns the key file path to use, preferring the explicit one
 *
 * @throws Error if neither a path nor the environment variable is set
 */
export function resolveServiceAccountFile(keyFile?: string): string {
  return envOr(
    keyFile,
    SERVICE_ACCOUNT_FILE_ENV,
    "Google Documents service account file not found. " +
      "You should specify it explicitly or in the " +
      `$${SERVICE_ACCOUNT_FILE_ENV} environment variable.`
  );
}

/**
 * Ensures the path names a regular file
 */
export async function assertKeyFile(keyFile: string): Promise<void> {
  const isFile = await stat(keyFile).then(
    (stats) => stats.isFile(),
    () => false
  );
  if (!isFile) {
    throw new Error(`\`${keyFile}\` is not a file`);
  }
}

function isServiceAccountKey(value: unknown): value is ServiceAccountKey {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.client_email === "string" &&
    typeof record.private_key === "string"
  );
}

/**
 * Reads and validates a service account key file
 *
 * @throws Error if the file is not JSON or lacks client_email/private_key
 */
export async function loadServiceAccountKey(
  keyFile: string
): Promise<ServiceAccountKey> {
  const raw = await readFile(keyFile, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Service account file \`${keyFile}\` is not valid JSON: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }

  if (!isServiceAccountKey(parsed)) {
    throw new Error(
      `Service account file \`${keyFile}\` must contain client_email and private_key`
    );
  }
  return parsed;
}

/**
 * Creates JWT credentials from a parsed key file
 */
export function credentialsFromKey(
  key: ServiceAccountKey,
  scopes: string[] = DEFAULT_SCOPES
): JWT {
  return new JWT({
    email: key.client_email,
    key: key.private_key,
    scopes,
  });
}

/**
 * Resolves, validates and loads the service account credentials
 */
export async function resolveCredentials({
  keyFile,
  scopes,
}: ResolveCredentialsOptions = {}): Promise<ResolvedCredentials> {
  const path = resolveServiceAccountFile(keyFile);
  await assertKeyFile(path);
  const key = await loadServiceAccountKey(path);
  return { keyFile: path, key, auth: credentialsFromKey(key, scopes) };
}
