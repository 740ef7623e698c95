import type { UriRecord } from "./uriRecord.js";

/**
 * Generate the authority (`userinfo@host:port`) for a record.
 * Values are emitted exactly as stored; nothing is encoded.
 */
export function authority(uri: UriRecord): string {
  let result = "";

  if (uri.userinfo !== undefined) {
    result += `${uri.userinfo}@`;
  }

  result += uri.host;

  if (uri.port !== undefined) {
    result += `:${uri.port}`;
  }

  return result;
}

/**
 * Assemble full URI text from a record.
 *
 * Paths are stored without their leading separator, so a `/` is written
 * whenever a path, query or fragment follows the authority. Text produced
 * from a decomposed record decomposes back to an equal record.
 *
 * Without a scheme, text that would begin with `//` (an empty host followed
 * by a path starting with `/`, or userinfo starting with `//`) gets an
 * explicit empty `//` authority marker so it is not re-read as a
 * network-path reference.
 */
export function composeUri(uri: UriRecord): string {
  let result = authority(uri);

  if (uri.path !== undefined || uri.query !== undefined || uri.fragment !== undefined) {
    result += `/${uri.path ?? ""}`;
  }
  if (uri.query !== undefined) {
    result += `?${uri.query}`;
  }
  if (uri.fragment !== undefined) {
    result += `#${uri.fragment}`;
  }

  if (uri.scheme !== undefined) {
    return `${uri.scheme}://${result}`;
  }
  return result.startsWith("//") ? `//${result}` : result;
}
