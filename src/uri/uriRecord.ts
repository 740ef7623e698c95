/**
 * The decomposed URI record.
 *
 * Per RFC 3986 a URI has five parts: scheme, authority, path, query and
 * fragment. The authority (userinfo@host:port) is kept here as its three
 * components; `authority()` re-generates it.
 *
 * An absent component is an absent key, never an empty string. `host` is the
 * only component always present.
 */

import { z } from "zod";
import { UriError } from "./errors.js";

// ============= Types =============

export interface UriRecord {
  readonly scheme?: string;
  readonly userinfo?: string;
  readonly host: string;
  readonly port?: number;
  readonly path?: string;
  readonly query?: string;
  readonly fragment?: string;
}

/** Plain field values accepted when building a record. */
export interface UriFields {
  scheme?: string;
  userinfo?: string;
  host?: string;
  port?: number;
  path?: string;
  query?: string;
  fragment?: string;
}

// ============= Constants =============

export const MAX_PORT = 65535;

/** Record fields in their order of appearance in URI text. */
export const URI_COMPONENTS = [
  "scheme",
  "userinfo",
  "host",
  "port",
  "path",
  "query",
  "fragment",
] as const;

// ============= Schemas =============

export const portSchema = z
  .number()
  .int("Port must be an integer")
  .min(0, "Port must not be negative")
  .max(MAX_PORT, `Port must not exceed ${MAX_PORT}`);

const uriFieldsSchema = z
  .object({
    scheme: z.string().optional(),
    userinfo: z.string().optional(),
    host: z.string().optional(),
    port: portSchema.optional(),
    path: z.string().optional(),
    query: z.string().optional(),
    fragment: z.string().optional(),
  })
  .strict();

// ============= Construction =============

/**
 * Freeze already-typed fields into a record. Undefined fields are left out
 * and a missing host becomes the empty string.
 */
export function toRecord(fields: UriFields): UriRecord {
  const record: {
    scheme?: string;
    userinfo?: string;
    host: string;
    port?: number;
    path?: string;
    query?: string;
    fragment?: string;
  } = { host: fields.host ?? "" };

  if (fields.scheme !== undefined) record.scheme = fields.scheme;
  if (fields.userinfo !== undefined) record.userinfo = fields.userinfo;
  if (fields.port !== undefined) record.port = fields.port;
  if (fields.path !== undefined) record.path = fields.path;
  if (fields.query !== undefined) record.query = fields.query;
  if (fields.fragment !== undefined) record.fragment = fields.fragment;

  return Object.freeze(record);
}

/**
 * Build a record from plain values, e.g. fields read back from JSON.
 *
 * @throws UriError with code INVALID_RECORD listing every rejected field
 */
export function createUri(fields: UriFields): UriRecord {
  const parsed = uriFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    throw new UriError(
      "INVALID_RECORD",
      "Invalid URI record fields",
      parsed.error.errors.map((e) => ({
        path: e.path.join("."),
        message: e.message,
      }))
    );
  }
  return toRecord(parsed.data);
}

// ============= Equality =============

/** Field-wise structural equality. */
export function uriEquals(a: UriRecord, b: UriRecord): boolean {
  return URI_COMPONENTS.every((component) => a[component] === b[component]);
}
