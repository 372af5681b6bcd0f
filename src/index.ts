/**
 * google-documents - Object Wrappers for Google Drive and Google Sheets
 *
 * Maps Drive files, folders, documents and spreadsheets, and the sheets of
 * a spreadsheet, to classes whose methods forward to the official
 * googleapis clients.
 *
 * @module google-documents
 */

export * from "./core";
export * from "./drive";
export * from "./documents";
export * from "./spreadsheets";
export * from "./GoogleDocuments";
export * from "./utils";
