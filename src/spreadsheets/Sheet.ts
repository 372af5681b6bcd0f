/**
 * Sheet - Individual Sheet Operations
 *
 * The Sheet class represents a single sheet (tab) within a Google Sheets
 * spreadsheet. Ranges passed to its read/write methods are relative to the
 * sheet and get prefixed with the sheet title before they reach the owning
 * spreadsheet.
 *
 * A sheet only refers to its spreadsheet; reading, writing, clearing and
 * deleting fail until one is assigned.
 *
 * @class Sheet
 */

import type { sheets_v4 } from "googleapis";
import { Color } from "./Color";
import { GridProperties } from "./GridProperties";
import type {
  CellValue,
  DriveSpreadsheet,
  ValueInputOption,
} from "./DriveSpreadsheet";

/**
 * Properties a sheet is built from
 */
export interface SheetProps {
  id?: number | null;
  index?: number | null;
  title: string;
  tabColor?: Color | null;
  gridProperties?: GridProperties | null;
}

const PLAIN_SHEET_TITLE = /^[A-Za-z_][A-Za-z0-9_]*$/;
// A1 ("AB12", up to column XFD) or R1C1 ("R3C4")
const CELL_REFERENCE = /^(?:[A-Za-z]{1,3}\d+|R\d+C\d+)$/i;

/**
 * Quotes a sheet title for use in A1 notation unless it is a plain
 * identifier that cannot be read as a cell reference
 *
 * @example
 * quoteSheetTitle("Sheet1"); // "Sheet1"
 * quoteSheetTitle("Q1 2024"); // "'Q1 2024'"
 * quoteSheetTitle("A1"); // "'A1'"
 */
export function quoteSheetTitle(title: string): string {
  if (PLAIN_SHEET_TITLE.test(title) && !CELL_REFERENCE.test(title)) {
    return title;
  }
  return `'${title.replace(/'/g, "''")}'`;
}

export class Sheet {
  public id: number | null;
  public index: number | null;
  public title: string;
  public tabColor: Color | null;
  public gridProperties: GridProperties | null;
  /** Owning spreadsheet; required by read/write/clear/delete */
  public spreadsheet: DriveSpreadsheet | null = null;
  /** Value input option used by write() when none is passed */
  public defaultValueInputOption: ValueInputOption = "RAW";

  constructor(props: SheetProps) {
    this.id = props.id ?? null;
    this.index = props.index ?? null;
    this.title = props.title;
    this.tabColor = props.tabColor ?? null;
    this.gridProperties = props.gridProperties ?? null;
  }

  /**
   * Constructs a Sheet from the API representation
   *
   * @throws Error if the item has no properties
   */
  static fromItem(item: sheets_v4.Schema$Sheet): Sheet {
    const properties = item.properties;
    if (!properties) {
      throw new Error("Sheet item has no properties");
    }

    return new Sheet({
      id: properties.sheetId ?? null,
      index: properties.index ?? null,
      title: properties.title ?? "",
      tabColor: properties.tabColor ? Color.fromItem(properties.tabColor) : null,
      gridProperties: properties.gridProperties
        ? GridProperties.fromItem(properties.gridProperties)
        : null,
    });
  }

  /**
   * Serializes the sheet to the API's SheetProperties, leaving out unset fields
   */
  toItem(): sheets_v4.Schema$SheetProperties {
    const item: sheets_v4.Schema$SheetProperties = { title: this.title };
    if (this.id !== null) {
      item.sheetId = this.id;
    }
    if (this.index !== null) {
      item.index = this.index;
    }
    if (this.gridProperties) {
      item.gridProperties = this.gridProperties.toItem();
    }
    if (this.tabColor) {
      item.tabColor = this.tabColor.toItem();
    }
    return item;
  }

  assignSpreadsheet(spreadsheet: DriveSpreadsheet | null): this {
    this.spreadsheet = spreadsheet;
    return this;
  }

  private requireSpreadsheet(): DriveSpreadsheet {
    if (!this.spreadsheet) {
      throw new Error("Spreadsheet for the sheet is unknown.");
    }
    return this.spreadsheet;
  }

  /**
   * Returns the spreadsheet-wide range name for a range in this sheet
   */
  rangeName(range: string): string {
    return `${quoteSheetTitle(this.title)}!${range}`;
  }

  /**
   * Reads values from a range of the sheet
   *
   * @param range - A1 notation range within the sheet (e.g., "A1:B10")
   */
  async read(range: string): Promise<CellValue[][]> {
    return this.requireSpreadsheet().read(this.rangeName(range));
  }

  /**
   * Writes values into a range of the sheet
   *
   * @param range - A1 notation range within the sheet
   * @param data - Rows of values
   * @param valueInputOption - How the input data is interpreted
   */
  async write(
    range: string,
    data: CellValue[][],
    valueInputOption: ValueInputOption = this.defaultValueInputOption
  ): Promise<sheets_v4.Schema$UpdateValuesResponse> {
    return this.requireSpreadsheet().write(
      this.rangeName(range),
      data,
      valueInputOption
    );
  }

  async clear(range: string): Promise<sheets_v4.Schema$ClearValuesResponse> {
    return this.requireSpreadsheet().clear(this.rangeName(range));
  }

  /**
   * Deletes the sheet from its spreadsheet and detaches it
   */
  async delete(): Promise<sheets_v4.Schema$BatchUpdateSpreadsheetResponse> {
    const spreadsheet = this.requireSpreadsheet();
    const { data } = await spreadsheet.sheetsApi.spreadsheets.batchUpdate({
      spreadsheetId: spreadsheet.id,
      requestBody: {
        requests: [{ deleteSheet: { sheetId: this.id } }],
      },
    });

    this.spreadsheet = null;
    return data;
  }

  /**
   * Sheets are equal when they belong to the same spreadsheet and share an id
   *
   * @throws Error if either sheet has no spreadsheet
   */
  equals(other: Sheet): boolean {
    const spreadsheet = this.requireSpreadsheet();
    const otherSpreadsheet = other.requireSpreadsheet();
    return spreadsheet.equals(otherSpreadsheet) && this.id === other.id;
  }

  toString(): string {
    return `<Sheet title="${this.title}" index="${this.index}">`;
  }
}
