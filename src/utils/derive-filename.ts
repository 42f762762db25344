import type { RecordId } from "../types";

/**
 * Last segment of the URL's path component, query and fragment excluded.
 * A path ending in "/" has an empty basename.
 */
export function urlBasename(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  return pathname.slice(pathname.lastIndexOf("/") + 1);
}

/**
 * Local and upload filename for a record's image
 *
 * @example
 * deriveFilename("http://x/a.png", 1, 9); // "1_9_a.png"
 */
export function deriveFilename(
  url: string,
  productId: RecordId,
  mediaId: RecordId,
): string {
  return `${productId}_${mediaId}_${urlBasename(url)}`;
}
