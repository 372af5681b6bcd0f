/**
 * FileManager - Lookup and Creation of Drive Files
 *
 * A FileManager is bound to one wrapper class (DriveFile, DriveFolder,
 * DriveDocument, DriveSpreadsheet). It runs get/filter/create requests
 * against the Drive API and converts the raw items into instances of that
 * class. Filters are restricted to the class's MIME type, so
 * `docs.folders.filter({ name: "Reports" })` only finds folders.
 *
 * @class FileManager
 */

import { GaxiosError } from "gaxios";
import type { drive_v3 } from "googleapis";
import type { GoogleDocuments } from "../GoogleDocuments";
import { extractFileId } from "../utils";
import type { DriveFile } from "./DriveFile";
import { buildFileQuery, type FileFilter, type FolderRef } from "./query";

/**
 * The static side of a wrapper class
 */
export interface DriveFileClass<T extends DriveFile> {
  readonly mimeType: string | null;
  fromItem(docs: GoogleDocuments, item: drive_v3.Schema$File): T;
}

/**
 * Parameters for creating a file
 */
export interface CreateFileParams {
  /** Name of the new file */
  name: string;
  /** Folder to create the file in; Drive root when omitted */
  folder?: FolderRef;
}

/** Fields requested for every listed file */
export const FILE_LIST_FIELDS = "files(id, name, mimeType, parents)";

export class FileManager<T extends DriveFile> {
  /**
   * Creates a new FileManager instance
   *
   * @param docs - Session whose credentials and clients are used
   * @param fileClass - Wrapper class results are converted to
   */
  constructor(
    protected readonly docs: GoogleDocuments,
    public readonly fileClass: DriveFileClass<T>
  ) {}

  /**
   * Returns the same manager bound to another service account key file
   *
   * @throws Error if the path is not a file
   */
  async using(keyFile: string): Promise<FileManager<T>> {
    return new FileManager(await this.docs.using(keyFile), this.fileClass);
  }

  /**
   * Fetches a file by id or URL
   *
   * @param idOrUrl - Drive file id, or any Drive/Docs/Sheets URL of the file
   * @returns Promise<T | null> - The file, or null if the API answers with an
   *   HTTP error; transport failures are rethrown
   */
  async get(idOrUrl: string): Promise<T | null> {
    const fileId = extractFileId(idOrUrl);
    try {
      const { data } = await this.docs.drive.files.get({
        fileId,
        supportsAllDrives: true,
      });
      return this.fileClass.fromItem(this.docs, data);
    } catch (error) {
      if (error instanceof GaxiosError && error.response !== undefined) {
        console.warn(`Drive file ${fileId} could not be fetched: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  /**
   * Searches files matching keyword filters
   *
   * @param filter - Keyword filters, see buildFileQuery
   * @returns Promise<T[]> - Matching files of this manager's class
   *
   * @example
   * await docs.documents.filter({ name: "Invoice", trashed: false });
   */
  async filter(filter: FileFilter = {}): Promise<T[]> {
    const { data } = await this.docs.drive.files.list({
      q: buildFileQuery(filter, this.fileClass.mimeType),
      spaces: "drive",
      fields: FILE_LIST_FIELDS,
    });
    return (data.files ?? []).map((item) =>
      this.fileClass.fromItem(this.docs, item)
    );
  }

  /**
   * Creates an empty file of this manager's class
   */
  async create({ name, folder }: CreateFileParams): Promise<T> {
    const requestBody: drive_v3.Schema$File = { name };
    if (this.fileClass.mimeType) {
      requestBody.mimeType = this.fileClass.mimeType;
    }
    if (folder) {
      requestBody.parents = [typeof folder === "string" ? folder : folder.id];
    }

    const { data } = await this.docs.drive.files.create({
      requestBody,
      fields: "id, name, mimeType",
      supportsAllDrives: true,
    });
    return this.fileClass.fromItem(this.docs, data);
  }
}
