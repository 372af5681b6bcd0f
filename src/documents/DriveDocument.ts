/**
 * DriveDocument - Google Docs File
 *
 * The DriveDocument class represents a Google Docs document stored in
 * Drive. Its content can be exported to a local file in another format
 * (DOCX by default), read as HTML, plain text or Markdown, and replaced by
 * uploading a local file.
 *
 * @class DriveDocument
 */

import type { drive_v3 } from "googleapis";
import { createReadStream } from "node:fs";
import { writeFile } from "node:fs/promises";
import TurndownService from "turndown";
import type { GoogleDocuments } from "../GoogleDocuments";
import { DriveFile, type DriveFileProps, fileProps } from "../drive/DriveFile";
import { MIME_TYPES } from "../drive/MimeTypes";

/**
 * Converts the body of an `arraybuffer` response to a Buffer
 */
export function responseToBuffer(data: unknown): Buffer {
  if (typeof data === "string") {
    return Buffer.from(data, "utf-8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  throw new Error("Unexpected export response body");
}

export class DriveDocument extends DriveFile {
  static readonly mimeType: string | null = MIME_TYPES.document;

  constructor(docs: GoogleDocuments, props: DriveFileProps) {
    super(docs, { ...props, mimeType: props.mimeType ?? MIME_TYPES.document });
  }

  static fromItem(
    docs: GoogleDocuments,
    item: drive_v3.Schema$File
  ): DriveDocument {
    return new DriveDocument(docs, fileProps(item));
  }

  /**
   * Exports the document in the specified format
   *
   * @param mimeType - MIME type for export (e.g., "application/pdf", "text/plain")
   * @returns Promise<Buffer> - Document content as exported by the API
   */
  async exportBuffer(mimeType: string = MIME_TYPES.docx): Promise<Buffer> {
    const response = await this.docs.drive.files.export(
      {
        fileId: this.id,
        mimeType,
      },
      { responseType: "arraybuffer" }
    );
    return responseToBuffer(response.data);
  }

  /**
   * Exports the document and writes it to a local file
   *
   * @param fileName - Path of the file to write
   * @param mimeType - Export format, DOCX by default
   */
  async export(
    fileName: string,
    mimeType: string = MIME_TYPES.docx
  ): Promise<void> {
    await writeFile(fileName, await this.exportBuffer(mimeType));
  }

  async toHTML(): Promise<string> {
    return (await this.exportBuffer(MIME_TYPES.html)).toString("utf-8");
  }

  async toPlainText(): Promise<string> {
    return (await this.exportBuffer(MIME_TYPES.plainText)).toString("utf-8");
  }

  /**
   * Exports the document as HTML and converts it to Markdown
   */
  async toMarkdown(): Promise<string> {
    const html = await this.toHTML();
    const turndownService = new TurndownService();
    turndownService.remove(["script", "style"]);
    return turndownService.turndown(html).trim();
  }

  /**
   * Replaces the document content with a local file
   *
   * Drive converts the upload into the document's own format.
   *
   * @param fileName - Path of the file to upload
   * @param mimeType - MIME type of the local file, DOCX by default
   */
  async update(
    fileName: string,
    mimeType: string = MIME_TYPES.docx
  ): Promise<drive_v3.Schema$File> {
    const { data } = await this.docs.drive.files.update({
      fileId: this.id,
      supportsAllDrives: true,
      media: {
        mimeType,
        body: createReadStream(fileName),
      },
    });
    return data;
  }
}
