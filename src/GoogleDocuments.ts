/**
 * GoogleDocuments - Drive and Sheets Session
 *
 * The GoogleDocuments class is the entry point of the library. It holds the
 * service account credentials and the Drive v3 and Sheets v4 clients, and
 * hands out managers bound to the wrapper classes:
 *
 * ```ts
 * const docs = await GoogleDocuments.fromKeyFile();
 * const reports = await docs.folders.filter({ name: "Reports" });
 * const sheet = await docs.spreadsheets.get(spreadsheetUrl);
 * ```
 *
 * Without an explicit key file, the path is read from the
 * GOOGLE_DOCUMENT_SERVICE_JSON environment variable.
 *
 * @class GoogleDocuments
 */

import type { drive_v3, sheets_v4 } from "googleapis";
import type { JWT } from "google-auth-library";
import {
  assertKeyFile,
  resolveCredentials,
  type ResolvedCredentials,
  type ServiceAccountKey,
} from "./core/Credentials";
import { buildService } from "./core/ServiceFactory";
import { DriveDocument } from "./documents/DriveDocument";
import { DriveFile } from "./drive/DriveFile";
import { DriveFolder } from "./drive/DriveFolder";
import { FileFactory } from "./drive/FileFactory";
import { FileManager, type DriveFileClass } from "./drive/FileManager";
import { DriveSpreadsheet } from "./spreadsheets/DriveSpreadsheet";
import { SpreadsheetManager } from "./spreadsheets/SpreadsheetManager";

export class GoogleDocuments {
  /** Google Drive API v3 client instance */
  public readonly drive: drive_v3.Drive;
  /** Google Sheets API v4 client instance */
  public readonly sheets: sheets_v4.Sheets;

  /**
   * Creates a new GoogleDocuments instance
   *
   * @param credentials - Resolved service account credentials
   * @param scopes - Scopes the credentials were created with, reused by using()
   */
  constructor(
    private readonly credentials: ResolvedCredentials,
    private readonly scopes?: string[]
  ) {
    this.drive = buildService("drive", credentials.auth);
    this.sheets = buildService("sheets", credentials.auth);
  }

  /**
   * Constructs a session from a service account key file
   *
   * @param keyFile - Key file path; GOOGLE_DOCUMENT_SERVICE_JSON when omitted
   * @param scopes - OAuth scopes; full Drive access when omitted
   * @throws Error if no key file is configured or it cannot be loaded
   */
  static async fromKeyFile(
    keyFile?: string,
    scopes?: string[]
  ): Promise<GoogleDocuments> {
    const credentials = await resolveCredentials({ keyFile, scopes });
    return new GoogleDocuments(credentials, scopes);
  }

  /**
   * Returns a session bound to another service account key file
   *
   * @throws Error if the path is not a file
   */
  async using(keyFile: string): Promise<GoogleDocuments> {
    await assertKeyFile(keyFile);
    return GoogleDocuments.fromKeyFile(keyFile, this.scopes);
  }

  get auth(): JWT {
    return this.credentials.auth;
  }

  /** Path of the key file in use */
  get keyFile(): string {
    return this.credentials.keyFile;
  }

  /** Contents of the key file in use */
  get serviceAccountCredentials(): ServiceAccountKey {
    return this.credentials.key;
  }

  /**
   * Returns a manager producing instances of the given wrapper class
   *
   * Spreadsheets get a SpreadsheetManager, which creates them through the
   * Sheets API.
   */
  objects(fileClass: typeof DriveSpreadsheet): SpreadsheetManager;
  objects<T extends DriveFile>(fileClass: DriveFileClass<T>): FileManager<T>;
  objects(fileClass: DriveFileClass<DriveFile>): FileManager<DriveFile> {
    if (fileClass === DriveSpreadsheet) {
      return new SpreadsheetManager(this);
    }
    return new FileManager(this, fileClass);
  }

  /** Any file, whatever its MIME type */
  get files(): FileManager<DriveFile> {
    return this.objects(DriveFile);
  }

  get folders(): FileManager<DriveFolder> {
    return this.objects(DriveFolder);
  }

  get documents(): FileManager<DriveDocument> {
    return this.objects(DriveDocument);
  }

  get spreadsheets(): SpreadsheetManager {
    return this.objects(DriveSpreadsheet);
  }

  /**
   * Wraps a raw Drive item in the class matching its MIME type
   */
  fromItem(item: drive_v3.Schema$File): DriveFile {
    return FileFactory.fromItem(this, item);
  }

  /**
   * Returns a reference to a folder by id, without fetching it
   */
  folder(id: string): DriveFolder {
    return new DriveFolder(this, { id });
  }
}
