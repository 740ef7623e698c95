/**
 * Scheme validation.
 *
 * RFC 3986 allows `ALPHA *( ALPHA / DIGIT / "+" / "-" / "." )`; the charset
 * check here accepts letters only, so `svn+ssh` and `h0tps` both fail it.
 * Both checks pass a record without a scheme and hand back the same record,
 * so they can be chained.
 */

import { config } from "../config.js";
import { ALPHA } from "./abnf.js";
import { UriError, toResult, type UriResult } from "./errors.js";
import type { UriRecord } from "./uriRecord.js";

/**
 * @throws UriError with code INVALID_SCHEME_CHARACTER naming the first
 *   non-letter in the scheme
 */
export function validateScheme(uri: UriRecord): UriRecord {
  if (uri.scheme === undefined) return uri;

  for (const ch of uri.scheme) {
    if (!ALPHA.has(ch)) {
      throw new UriError(
        "INVALID_SCHEME_CHARACTER",
        `'${ch}' is not valid in a URI scheme`,
        [{ path: "scheme", message: `Invalid character '${ch}'` }]
      );
    }
  }
  return uri;
}

/**
 * Check the scheme against an allow-list. Matching is exact and
 * case-sensitive. Without `allowed`, the configured default list is used.
 *
 * @throws UriError with code DISALLOWED_SCHEME
 */
export function validateSchemeOneOf(
  uri: UriRecord,
  allowed: Iterable<string> = config.allowedSchemes
): UriRecord {
  if (uri.scheme === undefined) return uri;

  const allowedSet = new Set(allowed);
  if (!allowedSet.has(uri.scheme)) {
    throw new UriError(
      "DISALLOWED_SCHEME",
      `'${uri.scheme}' is not in the set of allowed schemes (${[...allowedSet].join(", ")})`,
      [{ path: "scheme", message: "Scheme not allowed" }]
    );
  }
  return uri;
}

export function safeValidateScheme(uri: UriRecord): UriResult {
  return toResult("validateScheme", () => validateScheme(uri));
}

export function safeValidateSchemeOneOf(uri: UriRecord, allowed?: Iterable<string>): UriResult {
  return toResult("validateSchemeOneOf", () => validateSchemeOneOf(uri, allowed));
}
