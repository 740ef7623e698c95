/**
 * URI error taxonomy.
 *
 * Every failure raised by the decomposer, the scheme validators, the builder
 * and record construction is a `UriError` carrying one of these codes.
 */

import { logger } from "../logging.js";
import type { UriRecord } from "./uriRecord.js";

export type UriErrorCode =
  | "MALFORMED_PORT"
  | "INVALID_SCHEME_CHARACTER"
  | "DISALLOWED_SCHEME"
  | "INVALID_PORT"
  | "INVALID_RECORD";

export interface UriErrorDetail {
  path: string;
  message: string;
}

export class UriError extends Error {
  code: UriErrorCode;
  details: UriErrorDetail[];

  constructor(code: UriErrorCode, message: string, details: UriErrorDetail[] = []) {
    super(message);
    this.name = "UriError";
    this.code = code;
    this.details = details;
  }
}

/** Outcome of the non-throwing `safe*` variants. */
export type UriResult =
  | { valid: true; uri: UriRecord }
  | { valid: false; error: UriError };

/**
 * Run a throwing URI operation and fold a `UriError` into a `UriResult`.
 * Errors of any other type propagate.
 */
export function toResult(operation: string, run: () => UriRecord): UriResult {
  try {
    return { valid: true, uri: run() };
  } catch (error) {
    if (error instanceof UriError) {
      logger.debug(`${operation} rejected URI`, { code: error.code, reason: error.message });
      return { valid: false, error };
    }
    throw error;
  }
}
