/**
 * Google Docs Module - Document Export and Upload
 *
 * @module GoogleDocs
 */

export * from "./DriveDocument";
