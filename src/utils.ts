/**
 * Utilities
 *
 * @module Utils
 */

/**
 * Where the id sits in the links Drive, Docs and Sheets hand out, most
 * specific first
 */
const FILE_ID_PATTERNS: readonly RegExp[] = [
  /\/folders\/([\w-]+)/,
  /\/(?:document|spreadsheets|file)\/d\/([\w-]+)/,
  /[?&]id=([\w-]+)/,
  /\/d\/([\w-]+)/,
];

/**
 * Reduces a Drive, Docs or Sheets link to the file id it points at
 *
 * Anything without `/`, `?` or `&` is taken to be an id already. Links the
 * patterns do not recognize are returned unchanged and left to the API to
 * reject.
 *
 * @example
 * extractFileId("https://docs.google.com/spreadsheets/d/abc123/edit#gid=0"); // "abc123"
 * extractFileId("abc123"); // "abc123"
 */
export function extractFileId(urlOrId: string): string {
  if (!/[/?&]/.test(urlOrId)) {
    return urlOrId;
  }
  for (const pattern of FILE_ID_PATTERNS) {
    const id = urlOrId.match(pattern)?.[1];
    if (id) {
      return id;
    }
  }
  return urlOrId;
}
