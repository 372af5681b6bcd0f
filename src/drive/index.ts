/**
 * Google Drive Module - Files, Folders and Queries
 *
 * This module provides the Drive side of the wrapper hierarchy:
 * - DriveFile: Base wrapper of every Drive item
 * - DriveFolder: Container with lazy child listing
 * - FileManager: get/filter/create bound to a wrapper class
 * - FileFactory: MIME type dispatch for raw items
 * - Query helpers translating keyword filters into Drive search queries
 *
 * @module GoogleDrive
 */

export * from "./MimeTypes";
export * from "./query";
export * from "./DriveFile";
export * from "./DriveFolder";
export * from "./FileManager";
export * from "./FileFactory";
