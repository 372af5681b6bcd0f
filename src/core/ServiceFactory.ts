/**
 * ServiceFactory - Typed API Clients
 *
 * Builds the googleapis clients the library talks to, bound to the
 * resolved credentials.
 *
 * @module ServiceFactory
 */

import { google, type drive_v3, type sheets_v4 } from "googleapis";
import type { JWT } from "google-auth-library";

/**
 * API resources the library knows how to build, with their client types
 */
export interface ServiceClients {
  drive: drive_v3.Drive;
  sheets: sheets_v4.Sheets;
}

export type ServiceResource = keyof ServiceClients;

/** API version used for each resource */
export const SERVICE_VERSIONS = {
  drive: "v3",
  sheets: "v4",
} as const;

export function buildService(resource: "drive", auth: JWT): drive_v3.Drive;
export function buildService(resource: "sheets", auth: JWT): sheets_v4.Sheets;
export function buildService(
  resource: ServiceResource,
  auth: JWT
): ServiceClients[ServiceResource] {
  switch (resource) {
    case "drive":
      return google.drive({ version: SERVICE_VERSIONS.drive, auth });
    case "sheets":
      return google.sheets({ version: SERVICE_VERSIONS.sheets, auth });
  }
}
