/**
 * SheetsManager - Sheets of a Spreadsheet
 *
 * Lists, looks up and adds the sheets (tabs) of one spreadsheet. Every
 * sheet it returns already has the spreadsheet assigned.
 *
 * @class SheetsManager
 */

import { Sheet, type SheetProps } from "./Sheet";
import type { DriveSpreadsheet } from "./DriveSpreadsheet";

/**
 * Lookup criteria for SheetsManager.get; every given field must match
 */
export interface SheetLookup {
  id?: number;
  title?: string;
  index?: number;
}

export class SheetsManager {
  constructor(private readonly spreadsheet: DriveSpreadsheet) {}

  /**
   * Fetches all sheets of the spreadsheet, in tab order
   */
  async all(): Promise<Sheet[]> {
    const { data } = await this.spreadsheet.sheetsApi.spreadsheets.get({
      spreadsheetId: this.spreadsheet.id,
      fields: "sheets.properties",
    });
    return (data.sheets ?? []).map((item) =>
      Sheet.fromItem(item).assignSpreadsheet(this.spreadsheet)
    );
  }

  /**
   * Finds a sheet by id, title and/or index
   *
   * @returns Promise<Sheet | null> - The first matching sheet, or null
   */
  async get(lookup: SheetLookup): Promise<Sheet | null> {
    const sheets = await this.all();
    return (
      sheets.find(
        (sheet) =>
          (lookup.id === undefined || sheet.id === lookup.id) &&
          (lookup.title === undefined || sheet.title === lookup.title) &&
          (lookup.index === undefined || sheet.index === lookup.index)
      ) ?? null
    );
  }

  /**
   * Adds a new sheet to the spreadsheet
   *
   * @param props - Properties of the new sheet; id and index are assigned by
   *   the API when omitted
   * @returns Promise<Sheet> - The sheet as created by the API
   * @throws Error if the API reply does not describe the new sheet
   */
  async create(props: SheetProps): Promise<Sheet> {
    const { data } = await this.spreadsheet.sheetsApi.spreadsheets.batchUpdate(
      {
        spreadsheetId: this.spreadsheet.id,
        requestBody: {
          requests: [{ addSheet: { properties: new Sheet(props).toItem() } }],
        },
      }
    );

    const properties = data.replies?.[0]?.addSheet?.properties;
    if (!properties) {
      throw new Error(`Sheet "${props.title}" was not created`);
    }
    return Sheet.fromItem({ properties }).assignSpreadsheet(this.spreadsheet);
  }
}
