/**
 * Google Sheets Module - Spreadsheet Management and Operations
 *
 * This module provides Google Sheets integration including:
 * - DriveSpreadsheet: Range reads, writes and clears
 * - SpreadsheetManager: Spreadsheet lookup and creation
 * - SheetsManager: Listing and adding the sheets of a spreadsheet
 * - Sheet: Individual sheet operations
 * - Color, GridProperties: Sheet property values
 *
 * @module GoogleSheets
 */

export * from "./Color";
export * from "./GridProperties";
export * from "./Sheet";
export * from "./SheetsManager";
export * from "./DriveSpreadsheet";
export * from "./SpreadsheetManager";
