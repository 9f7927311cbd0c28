import path from "node:path";
import mime from "mime-types";

export const FALLBACK_CONTENT_TYPE = "application/octet-stream";

/** Content-Type from the file extension (never from a .br/.gz sibling). */
export function contentTypeOf(filePath: string): string {
  return mime.contentType(path.extname(filePath).toLowerCase()) || FALLBACK_CONTENT_TYPE;
}
