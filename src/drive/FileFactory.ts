/**
 * FileFactory - Wrapper Dispatch by MIME Type
 *
 * Picks the wrapper class matching a raw Drive item's MIME type. Items of
 * any other type become plain DriveFile instances.
 *
 * @class FileFactory
 */

import type { drive_v3 } from "googleapis";
import type { GoogleDocuments } from "../GoogleDocuments";
import { DriveDocument } from "../documents/DriveDocument";
import { DriveSpreadsheet } from "../spreadsheets/DriveSpreadsheet";
import { DriveFile } from "./DriveFile";
import type { DriveFileClass } from "./FileManager";
import { DriveFolder } from "./DriveFolder";
import { MIME_TYPES } from "./MimeTypes";

export class FileFactory {
  static readonly fileClasses: ReadonlyMap<string, DriveFileClass<DriveFile>> =
    new Map<string, DriveFileClass<DriveFile>>([
      [MIME_TYPES.folder, DriveFolder],
      [MIME_TYPES.document, DriveDocument],
      [MIME_TYPES.spreadsheet, DriveSpreadsheet],
    ]);

  static readonly defaultClass: DriveFileClass<DriveFile> = DriveFile;

  static getFileClass(mimeType?: string | null): DriveFileClass<DriveFile> {
    return (
      (mimeType ? FileFactory.fileClasses.get(mimeType) : undefined) ??
      FileFactory.defaultClass
    );
  }

  /**
   * Wraps a raw Drive item in the class matching its MIME type
   */
  static fromItem(docs: GoogleDocuments, item: drive_v3.Schema$File): DriveFile {
    return FileFactory.getFileClass(item.mimeType).fromItem(docs, item);
  }
}
