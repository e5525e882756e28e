import { extname } from "path";
import contentTypes from "./content-types.json";

export const DEFAULT_CONTENT_TYPE = "application/octet-stream";

/** Content types of the document, image and archive formats the assistant ingests */
const CONTENT_TYPES: Record<string, string> = contentTypes;

/**
 * Content type for an upload, from the file name's extension.
 */
export function getContentType(filename: string): string {
  const extension = extname(filename).toLowerCase();
  return CONTENT_TYPES[extension] ?? DEFAULT_CONTENT_TYPE;
}
