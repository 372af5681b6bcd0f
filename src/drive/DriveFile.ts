/**
 * DriveFile - Individual Google Drive File Operations
 *
 * The DriveFile class represents a single file in Google Drive. It is the
 * base of the wrapper hierarchy: folders, documents and spreadsheets extend
 * it with type-specific operations.
 *
 * Key Features:
 * - File metadata (id, name, MIME type)
 * - Parent folder lookup
 * - Copying, moving and deleting
 *
 * @class DriveFile
 */

import type { drive_v3 } from "googleapis";
import type { GoogleDocuments } from "../GoogleDocuments";
import type { DriveFolder } from "./DriveFolder";
import type { FolderRef } from "./query";

/**
 * Metadata a file wrapper is built from
 */
export interface DriveFileProps {
  id: string;
  name?: string | null;
  mimeType?: string | null;
}

/**
 * Reads wrapper properties from a raw Drive API item
 *
 * @throws Error if the item has no id
 */
export function fileProps(item: drive_v3.Schema$File): DriveFileProps {
  if (!item.id) {
    throw new Error("Drive item has no id");
  }
  return {
    id: item.id,
    name: item.name ?? null,
    mimeType: item.mimeType ?? null,
  };
}

export class DriveFile {
  /** MIME type every instance of the class has; null matches any file */
  static readonly mimeType: string | null = null;

  /** Google Drive file ID */
  public readonly id: string;
  public name: string | null;
  public mimeType: string | null;

  /**
   * Creates a new DriveFile instance
   *
   * @param docs - Session whose API clients the file uses
   * @param props - File metadata
   */
  constructor(protected readonly docs: GoogleDocuments, props: DriveFileProps) {
    this.id = props.id;
    this.name = props.name ?? null;
    this.mimeType = props.mimeType ?? null;
  }

  /**
   * Constructs a DriveFile from the item in which Google describes it
   */
  static fromItem(docs: GoogleDocuments, item: drive_v3.Schema$File): DriveFile {
    return new DriveFile(docs, fileProps(item));
  }

  get url(): string {
    return `https://docs.google.com/document/d/${this.id}`;
  }

  /**
   * Files are equal when they refer to the same remote file
   */
  equals(other: DriveFile | null | undefined): boolean {
    return other?.id === this.id;
  }

  toString(): string {
    return `<${this.constructor.name}: ${this.id} - ${this.name}>`;
  }

  /**
   * Fetches the folders containing this file
   *
   * Parents are not cached; every call asks the API again.
   *
   * @returns Promise<DriveFolder[]> - Folder references (id only)
   */
  async parents(): Promise<DriveFolder[]> {
    const { data } = await this.docs.drive.files.get({
      fileId: this.id,
      fields: "parents",
      supportsAllDrives: true,
    });
    return (data.parents ?? []).map((id) => this.docs.folder(id));
  }

  /**
   * Makes a copy of the file
   *
   * @param name - Name of the copy
   * @returns Promise<DriveFile> - The copy, wrapped according to its MIME type
   */
  async copy(name: string): Promise<DriveFile> {
    const { data } = await this.docs.drive.files.copy({
      fileId: this.id,
      supportsAllDrives: true,
      requestBody: { name },
    });
    return this.docs.fromItem(data);
  }

  /**
   * Deletes the file from Google Drive
   */
  async delete(): Promise<void> {
    await this.docs.drive.files.delete({
      fileId: this.id,
      supportsAllDrives: true,
    });
  }

  /**
   * Adds a folder to the parents of this file
   *
   * @returns Promise with the file's id and updated parents
   */
  async putToFolder(folder: FolderRef): Promise<drive_v3.Schema$File> {
    const { data } = await this.docs.drive.files.update({
      fileId: this.id,
      addParents: typeof folder === "string" ? folder : folder.id,
      fields: "id, parents",
      supportsAllDrives: true,
    });
    return data;
  }
}
