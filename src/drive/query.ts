/**
 * Drive query builder
 *
 * Translates keyword filters into the Drive `q` search grammar.
 *
 * @module DriveQuery
 */

/** Anything carrying a Drive folder id */
export type FolderRef = { readonly id: string } | string;

export type FilterValue = string | number | boolean | undefined;

/**
 * Keyword filters for `FileManager.filter`
 *
 * Keys may be given in snake_case (`full_text`) or camelCase (`fullText`).
 * `folder` restricts the search to the direct children of a folder.
 */
export interface FileFilter {
  folder?: FolderRef;
  [key: string]: FilterValue | FolderRef;
}

/**
 * Converts `some_cool_parameter` to `someCoolParameter`
 */
export function toCamelCase(key: string): string {
  return key.replace(/_[a-z]/g, (match) => match.charAt(1).toUpperCase());
}

function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

/**
 * Query matching the direct children of a folder
 */
export function folderQuery(folder: FolderRef): string {
  const id = typeof folder === "string" ? folder : folder.id;
  return `'${escapeQueryValue(id)}' in parents`;
}

function clauseFor(key: string, value: FilterValue | FolderRef): string | null {
  if (value === undefined) {
    return null;
  }
  if (key === "folder") {
    return folderQuery(typeof value === "object" ? value : String(value));
  }
  if (typeof value === "boolean") {
    return `${key} = ${value}`;
  }
  const text = typeof value === "object" ? value.id : String(value);
  return `${key} contains '${escapeQueryValue(text)}'`;
}

/**
 * Builds a Drive search query from keyword filters
 *
 * @param filter - Keyword filters
 * @param mimeType - MIME type of the wrapper class, if any; it replaces any
 *   `mimeType` filter given by the caller
 * @returns The clauses joined with ` and `
 *
 * @example
 * buildFileQuery({ name: "Report", trashed: false });
 * // "name contains 'Report' and trashed = false"
 */
export function buildFileQuery(
  filter: FileFilter,
  mimeType?: string | null
): string {
  const params = new Map<string, FilterValue | FolderRef>();
  for (const [key, value] of Object.entries(filter)) {
    params.set(toCamelCase(key), value);
  }

  if (mimeType) {
    params.set("mimeType", mimeType);
  }

  const clauses: string[] = [];
  for (const [key, value] of params) {
    const clause = clauseFor(key, value);
    if (clause) {
      clauses.push(clause);
    }
  }
  return clauses.join(" and ");
}
