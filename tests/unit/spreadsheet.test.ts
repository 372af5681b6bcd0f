/**
 * Unit tests for DriveSpreadsheet range operations and SpreadsheetManager.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import {
  Color,
  DriveSpreadsheet,
  GoogleDocuments,
  MIME_TYPES,
  Sheet,
  SheetsManager,
} from "../../src";
import { mockDriveFiles, mockSpreadsheets } from "../mocks/googleapis";
import { createSession, makeTempDir, removeTempDir } from "../helpers/session";

let dir: string;
let docs: GoogleDocuments;

beforeAll(async () => {
  dir = await makeTempDir();
  docs = await createSession(dir);
});

afterAll(async () => {
  await removeTempDir(dir);
});

describe("DriveSpreadsheet", () => {
  it("reads a range", async () => {
    mockSpreadsheets.values.get.mockResolvedValue({
      data: { range: "Sheet1!A1:B2", values: [["a", "b"], ["1", "2"]] },
    });

    const values = await new DriveSpreadsheet(docs, { id: "s1" }).read("Sheet1!A1:B2");

    expect(mockSpreadsheets.values.get).toHaveBeenCalledWith({
      spreadsheetId: "s1",
      range: "Sheet1!A1:B2",
    });
    expect(values).toEqual([["a", "b"], ["1", "2"]]);
  });

  it("reads an empty range as no rows", async () => {
    mockSpreadsheets.values.get.mockResolvedValue({ data: { range: "Sheet1!Z9" } });

    await expect(
      new DriveSpreadsheet(docs, { id: "s1" }).read("Sheet1!Z9")
    ).resolves.toEqual([]);
  });

  it("warns that getRange() was renamed and still reads", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    mockSpreadsheets.values.get.mockResolvedValue({ data: { values: [["x"]] } });

    const values = await new DriveSpreadsheet(docs, { id: "s1" }).getRange("A1");

    expect(warn).toHaveBeenCalledWith("`getRange()` has been renamed to `read()`");
    expect(values).toEqual([["x"]]);
    warn.mockRestore();
  });

  it("clears a range", async () => {
    mockSpreadsheets.values.clear.mockResolvedValue({
      data: { spreadsheetId: "s1", clearedRange: "Sheet1!A1:C3" },
    });

    const result = await new DriveSpreadsheet(docs, { id: "s1" }).clear("Sheet1!A1:C3");

    expect(mockSpreadsheets.values.clear).toHaveBeenCalledWith({
      spreadsheetId: "s1",
      range: "Sheet1!A1:C3",
      requestBody: { range: "Sheet1!A1:C3" },
    });
    expect(result).toEqual({ spreadsheetId: "s1", clearedRange: "Sheet1!A1:C3" });
  });

  it("writes raw values by default", async () => {
    mockSpreadsheets.values.update.mockResolvedValue({ data: { updatedCells: 4 } });

    const result = await new DriveSpreadsheet(docs, { id: "s1" }).write("Sheet1!A1:B2", [
      ["l", "o"],
      ["l", "!"],
    ]);

    expect(mockSpreadsheets.values.update).toHaveBeenCalledWith({
      spreadsheetId: "s1",
      range: "Sheet1!A1:B2",
      valueInputOption: "RAW",
      requestBody: { values: [["l", "o"], ["l", "!"]] },
    });
    expect(result).toEqual({ updatedCells: 4 });
  });

  it("uses the spreadsheet's default value input option", async () => {
    mockSpreadsheets.values.update.mockResolvedValue({ data: {} });
    const spreadsheet = new DriveSpreadsheet(docs, { id: "s1" });
    spreadsheet.defaultValueInputOption = "USER_ENTERED";

    await spreadsheet.write("A1", [["=SUM(B1:B3)"]]);

    expect(mockSpreadsheets.values.update).toHaveBeenCalledWith({
      spreadsheetId: "s1",
      range: "A1",
      valueInputOption: "USER_ENTERED",
      requestBody: { values: [["=SUM(B1:B3)"]] },
    });
  });

  it("exposes its sheets", () => {
    expect(new DriveSpreadsheet(docs, { id: "s1" }).sheets).toBeInstanceOf(SheetsManager);
  });
});

describe("SpreadsheetManager.create", () => {
  it("creates a spreadsheet with initial sheets through the Sheets API", async () => {
    mockSpreadsheets.create.mockResolvedValue({
      data: { spreadsheetId: "new-s", properties: { title: "Budget" } },
    });

    const spreadsheet = await docs.spreadsheets.create({
      name: "Budget",
      sheets: [
        { title: "Income" },
        new Sheet({ title: "Costs", index: 1, tabColor: new Color(1, 0, 0) }),
      ],
    });

    expect(mockSpreadsheets.create).toHaveBeenCalledWith({
      requestBody: {
        properties: { title: "Budget" },
        sheets: [
          { properties: { title: "Income" } },
          {
            properties: {
              title: "Costs",
              index: 1,
              tabColor: { red: 1, green: 0, blue: 0 },
            },
          },
        ],
      },
    });
    expect(spreadsheet).toBeInstanceOf(DriveSpreadsheet);
    expect(spreadsheet.id).toBe("new-s");
    expect(spreadsheet.name).toBe("Budget");
    expect(spreadsheet.mimeType).toBe(MIME_TYPES.spreadsheet);
    expect(mockDriveFiles.update).not.toHaveBeenCalled();
  });

  it("moves the new spreadsheet into a folder", async () => {
    mockSpreadsheets.create.mockResolvedValue({
      data: { spreadsheetId: "new-s", properties: { title: "Empty" } },
    });
    mockDriveFiles.update.mockResolvedValue({ data: { id: "new-s", parents: ["f1"] } });

    await docs.spreadsheets.create({ name: "Empty", folder: "f1" });

    expect(mockSpreadsheets.create).toHaveBeenCalledWith({
      requestBody: { properties: { title: "Empty" } },
    });
    expect(mockDriveFiles.update).toHaveBeenCalledWith({
      fileId: "new-s",
      addParents: "f1",
      fields: "id, parents",
      supportsAllDrives: true,
    });
  });

  it("fails when the API returns no spreadsheet id", async () => {
    mockSpreadsheets.create.mockResolvedValue({ data: {} });

    await expect(docs.spreadsheets.create({ name: "Broken" })).rejects.toThrow(
      'Spreadsheet "Broken" was not created'
    );
  });
});
