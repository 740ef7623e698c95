/**
 * URI decomposition by ordered delimiter search.
 *
 * Scheme, userinfo and host/port are split on the left-most delimiter;
 * fragment and query are then split off the tail right-to-left, so a stray
 * `?` or `#` inside a path does not end it early.
 *
 * Examples:
 *   https://github.com/sigmavirus24        → scheme, host, path
 *   //github.com/sigmavirus24              → network-path reference, no scheme
 *   user:pass@example.com:444/             → userinfo, host, port
 */

import { isDigits } from "./abnf.js";
import { UriError, toResult, type UriResult } from "./errors.js";
import { MAX_PORT, toRecord, type UriRecord } from "./uriRecord.js";

const SCHEME_DELIMITER = "://";
const NETWORK_PATH_PREFIX = "//";

// ============= Parser =============

/**
 * Decompose URI text into a record.
 *
 * A `:` in the authority with no `/` after it is read as `host:port` with no
 * path, so `example.com:8080` gives host `example.com` and port 8080.
 *
 * @throws UriError with code MALFORMED_PORT if the port text is not a
 *   decimal number in 0..65535
 */
export function decompose(text: string): UriRecord {
  let scheme: string | undefined;
  let userinfo: string | undefined;
  let host: string;
  let port: number | undefined;
  let rest = text;

  const schemeSplit = splitFirst(rest, SCHEME_DELIMITER);
  if (schemeSplit) {
    [scheme, rest] = schemeSplit;
  }

  if (scheme === undefined && rest.startsWith(NETWORK_PATH_PREFIX)) {
    rest = rest.slice(NETWORK_PATH_PREFIX.length);
  }

  const userinfoSplit = splitFirst(rest, "@");
  if (userinfoSplit) {
    [userinfo, rest] = userinfoSplit;
  }

  const hostPortSplit = splitFirst(rest, ":");
  if (hostPortSplit) {
    const [hostText, afterColon] = hostPortSplit;
    host = hostText;
    const portPathSplit = splitFirst(afterColon, "/");
    const portText = portPathSplit ? portPathSplit[0] : afterColon;
    port = parsePort(portText);
    rest = portPathSplit ? portPathSplit[1] : "";
  } else {
    const hostPathSplit = splitFirst(rest, "/");
    if (hostPathSplit) {
      [host, rest] = hostPathSplit;
    } else {
      host = rest;
      rest = "";
    }
  }

  let fragment: string | undefined;
  let query: string | undefined;
  if (rest.length > 0) {
    [rest, fragment] = extractFragment(rest);
    [rest, query] = extractQuery(rest);
  }

  return toRecord({
    scheme,
    userinfo,
    host,
    port,
    path: rest.length > 0 ? rest : undefined,
    query,
    fragment,
  });
}

/**
 * Non-throwing form of `decompose`.
 */
export function safeDecompose(text: string): UriResult {
  return toResult("decompose", () => decompose(text));
}

// ============= Tail passes =============

/**
 * Split the fragment off at the last `#`.
 * Returns [rest, undefined] if there is none.
 */
export function extractFragment(rest: string): [string, string | undefined] {
  const split = splitLast(rest, "#");
  return split ?? [rest, undefined];
}

/**
 * Split the query off at the last `?`. Run after `extractFragment`.
 * Returns [rest, undefined] if there is none.
 */
export function extractQuery(rest: string): [string, string | undefined] {
  const split = splitLast(rest, "?");
  return split ?? [rest, undefined];
}

// ============= Internal Helpers =============

/** Port text must be canonical decimal: digits, no leading zero, at most 65535. */
function parsePort(portText: string): number {
  if (portText.length > 1 && portText.startsWith("0")) {
    throw new UriError(
      "MALFORMED_PORT",
      `Port "${portText}" has leading zeros`,
      [{ path: "port", message: "Malformed port" }]
    );
  }
  const port = isDigits(portText) ? Number.parseInt(portText, 10) : Number.NaN;
  if (!Number.isInteger(port) || port > MAX_PORT) {
    throw new UriError(
      "MALFORMED_PORT",
      `Port "${portText}" is not a decimal number between 0 and ${MAX_PORT}`,
      [{ path: "port", message: "Malformed port" }]
    );
  }
  return port;
}

function splitFirst(str: string, delimiter: string): [string, string] | undefined {
  const idx = str.indexOf(delimiter);
  if (idx === -1) return undefined;
  return [str.slice(0, idx), str.slice(idx + delimiter.length)];
}

function splitLast(str: string, delimiter: string): [string, string] | undefined {
  const idx = str.lastIndexOf(delimiter);
  if (idx === -1) return undefined;
  return [str.slice(0, idx), str.slice(idx + delimiter.length)];
}
