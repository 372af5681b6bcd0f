/**
 * DriveSpreadsheet - Google Sheets File
 *
 * The DriveSpreadsheet class represents a Google Sheets spreadsheet stored
 * in Drive. Besides the document operations it inherits, it reads, writes
 * and clears A1 ranges through the Sheets API v4 and gives access to its
 * individual sheets.
 *
 * @class DriveSpreadsheet
 */

import type { drive_v3, sheets_v4 } from "googleapis";
import type { GoogleDocuments } from "../GoogleDocuments";
import { DriveDocument } from "../documents/DriveDocument";
import { type DriveFileProps, fileProps } from "../drive/DriveFile";
import { MIME_TYPES } from "../drive/MimeTypes";
import { SheetsManager } from "./SheetsManager";

/**
 * A single cell value as sent to or received from the Sheets API
 */
export type CellValue = string | number | boolean | null;

/**
 * How the Sheets API interprets written values
 *
 * - RAW: values are stored as given
 * - USER_ENTERED: values are parsed as if typed into the UI
 */
export type ValueInputOption = "RAW" | "USER_ENTERED";

export class DriveSpreadsheet extends DriveDocument {
  static readonly mimeType: string | null = MIME_TYPES.spreadsheet;

  /** Value input option used by write() when none is passed */
  public defaultValueInputOption: ValueInputOption = "RAW";

  constructor(docs: GoogleDocuments, props: DriveFileProps) {
    super(docs, {
      ...props,
      mimeType: props.mimeType ?? MIME_TYPES.spreadsheet,
    });
  }

  static fromItem(
    docs: GoogleDocuments,
    item: drive_v3.Schema$File
  ): DriveSpreadsheet {
    return new DriveSpreadsheet(docs, fileProps(item));
  }

  /** Google Sheets API v4 client of the session */
  get sheetsApi(): sheets_v4.Sheets {
    return this.docs.sheets;
  }

  get url(): string {
    return `https://docs.google.com/spreadsheets/d/${this.id}`;
  }

  /**
   * The sheets (tabs) of this spreadsheet
   */
  get sheets(): SheetsManager {
    return new SheetsManager(this);
  }

  /**
   * Returns data from a range of the spreadsheet
   *
   * @param range - A1 notation range (e.g., "Sheet1!A1:B2")
   * @returns Promise<CellValue[][]> - Rows of values; empty when the range is empty
   */
  async read(range: string): Promise<CellValue[][]> {
    const { data } = await this.sheetsApi.spreadsheets.values.get({
      spreadsheetId: this.id,
      range,
    });
    return data.values ?? [];
  }

  /**
   * @deprecated Renamed to read()
   */
  async getRange(range: string): Promise<CellValue[][]> {
    console.warn("`getRange()` has been renamed to `read()`");
    return this.read(range);
  }

  /**
   * Clears the values of a range
   */
  async clear(range: string): Promise<sheets_v4.Schema$ClearValuesResponse> {
    const { data } = await this.sheetsApi.spreadsheets.values.clear({
      spreadsheetId: this.id,
      range,
      requestBody: { range },
    });
    return data;
  }

  /**
   * Writes data into a range of the spreadsheet
   *
   * @param range - A1 notation range to write in
   * @param data - Rows of values
   * @param valueInputOption - How the input data is interpreted
   */
  async write(
    range: string,
    data: CellValue[][],
    valueInputOption: ValueInputOption = this.defaultValueInputOption
  ): Promise<sheets_v4.Schema$UpdateValuesResponse> {
    const response = await this.sheetsApi.spreadsheets.values.update({
      spreadsheetId: this.id,
      range,
      valueInputOption,
      requestBody: { values: data },
    });
    return response.data;
  }
}
