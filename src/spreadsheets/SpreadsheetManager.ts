/**
 * SpreadsheetManager - Lookup and Creation of Spreadsheets
 *
 * Looks spreadsheets up through Drive like any other file, but creates them
 * through the Sheets API so initial sheets can be given.
 *
 * @class SpreadsheetManager
 */

import type { GoogleDocuments } from "../GoogleDocuments";
import { FileManager, type CreateFileParams } from "../drive/FileManager";
import { MIME_TYPES } from "../drive/MimeTypes";
import { DriveSpreadsheet } from "./DriveSpreadsheet";
import { Sheet, type SheetProps } from "./Sheet";

/**
 * Parameters for creating a spreadsheet
 */
export interface CreateSpreadsheetParams extends CreateFileParams {
  /** Initial sheets; the API adds a single "Sheet1" when omitted */
  sheets?: (Sheet | SheetProps)[];
}

export class SpreadsheetManager extends FileManager<DriveSpreadsheet> {
  constructor(docs: GoogleDocuments) {
    super(docs, DriveSpreadsheet);
  }

  async using(keyFile: string): Promise<SpreadsheetManager> {
    return new SpreadsheetManager(await this.docs.using(keyFile));
  }

  /**
   * Creates a spreadsheet, optionally with initial sheets and inside a folder
   *
   * @returns Promise<DriveSpreadsheet> - The new spreadsheet
   * @throws Error if the API reply carries no spreadsheet id
   */
  async create({
    name,
    folder,
    sheets,
  }: CreateSpreadsheetParams): Promise<DriveSpreadsheet> {
    const { data } = await this.docs.sheets.spreadsheets.create({
      requestBody: {
        properties: { title: name },
        sheets: sheets?.map((sheet) => ({
          properties: (sheet instanceof Sheet ? sheet : new Sheet(sheet)).toItem(),
        })),
      },
    });

    if (!data.spreadsheetId) {
      throw new Error(`Spreadsheet "${name}" was not created`);
    }

    const spreadsheet = new DriveSpreadsheet(this.docs, {
      id: data.spreadsheetId,
      name: data.properties?.title ?? name,
      mimeType: MIME_TYPES.spreadsheet,
    });

    if (folder) {
      await spreadsheet.putToFolder(folder);
    }
    return spreadsheet;
  }
}
