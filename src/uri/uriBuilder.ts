/**
 * Incremental URI construction.
 *
 * Each setter stores its value and returns the builder so calls chain:
 *
 *   new UriBuilder()
 *     .addScheme("https")
 *     .addHost("example.com")
 *     .addPath("/search")
 *     .addQueryList([["q", "uri"], ["page", "2"]])
 *     .finalize();
 *
 * No percent-encoding is applied anywhere; values land in the record as given.
 */

import { UriError } from "./errors.js";
import { portSchema, toRecord, type UriFields, type UriRecord } from "./uriRecord.js";

export type QueryPair = readonly [key: string, value: string];

export class UriBuilder {
  private fields: UriFields = {};

  addScheme(scheme: string): this {
    this.fields.scheme = scheme;
    return this;
  }

  /** Stores `username`, or `username:password` when a password is given. */
  addUserinfo(username: string, password?: string): this {
    this.fields.userinfo = password !== undefined ? `${username}:${password}` : username;
    return this;
  }

  /** Not validated. */
  addHost(host: string): this {
    this.fields.host = host;
    return this;
  }

  /**
   * @throws UriError with code INVALID_PORT unless the port is an integer
   *   in 0..65535
   */
  addPort(port: number): this {
    const parsed = portSchema.safeParse(port);
    if (!parsed.success) {
      throw new UriError(
        "INVALID_PORT",
        `Invalid port ${port}`,
        parsed.error.errors.map((e) => ({ path: "port", message: e.message }))
      );
    }
    this.fields.port = parsed.data;
    return this;
  }

  /** Strips one leading `/`; the record keeps paths separator-free. */
  addPath(path: string): this {
    this.fields.path = path.startsWith("/") ? path.slice(1) : path;
    return this;
  }

  /** Raw query text, without the leading `?`. */
  addQueryString(query: string): this {
    this.fields.query = query;
    return this;
  }

  /**
   * Build the query from a mapping as `key=value` pairs joined by `&`.
   *
   * Pair order is whatever order the mapping iterates in and is not part of
   * this contract. Use `addQueryList` when the order matters.
   */
  addQueryMap(params: Record<string, string> | Map<string, string>): this {
    const entries = params instanceof Map ? [...params.entries()] : Object.entries(params);
    return this.addQueryList(entries);
  }

  /** Build the query from pairs, keeping their order. */
  addQueryList(pairs: Iterable<QueryPair>): this {
    this.fields.query = Array.from(pairs, ([key, value]) => `${key}=${value}`).join("&");
    return this;
  }

  addFragment(fragment: string): this {
    this.fields.fragment = fragment;
    return this;
  }

  /**
   * Produce a frozen record from the fields set so far. The builder can keep
   * being used; later calls do not touch records already returned.
   */
  finalize(): UriRecord {
    return toRecord(this.fields);
  }
}
