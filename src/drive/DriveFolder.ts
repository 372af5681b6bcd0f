/**
 * DriveFolder - Google Drive Folder
 *
 * A file whose MIME type marks it as a container. Children are listed
 * lazily through a Drive query.
 *
 * @class DriveFolder
 */

import type { drive_v3 } from "googleapis";
import type { GoogleDocuments } from "../GoogleDocuments";
import { DriveFile, type DriveFileProps, fileProps } from "./DriveFile";
import { MIME_TYPES } from "./MimeTypes";
import { folderQuery } from "./query";

export class DriveFolder extends DriveFile {
  static readonly mimeType: string | null = MIME_TYPES.folder;

  constructor(docs: GoogleDocuments, props: DriveFileProps) {
    super(docs, { ...props, mimeType: props.mimeType ?? MIME_TYPES.folder });
  }

  static fromItem(
    docs: GoogleDocuments,
    item: drive_v3.Schema$File
  ): DriveFolder {
    return new DriveFolder(docs, fileProps(item));
  }

  get url(): string {
    return `https://drive.google.com/drive/folders/${this.id}`;
  }

  /**
   * Lists the files directly inside this folder
   *
   * Each item is wrapped in the class matching its MIME type.
   */
  async children(): Promise<DriveFile[]> {
    const { data } = await this.docs.drive.files.list({
      q: folderQuery(this),
    });
    return (data.files ?? []).map((item) => this.docs.fromItem(item));
  }

  /**
   * Checks whether the file is placed in this folder
   */
  async contains(file: DriveFile): Promise<boolean> {
    const parents = await file.parents();
    return parents.some((parent) => parent.equals(this));
  }

  toString(): string {
    return this.name ?? "";
  }
}
