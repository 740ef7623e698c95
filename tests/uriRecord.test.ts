import { describe, it, expect } from "vitest";
import { decompose } from "../src/uri/decompose.js";
import { createUri, uriEquals, URI_COMPONENTS } from "../src/uri/uriRecord.js";
import { captureUriError } from "./helpers.js";

describe("createUri", () => {
  it("builds a frozen record from plain fields", () => {
    const uri = createUri({ scheme: "https", host: "example.com", port: 80 });
    expect(uri).toEqual({ scheme: "https", host: "example.com", port: 80 });
    expect(Object.isFrozen(uri)).toBe(true);
  });

  it("defaults the host to an empty string", () => {
    expect(createUri({ path: "a" })).toEqual({ host: "", path: "a" });
  });

  it("drops fields set to undefined", () => {
    expect(Object.keys(createUri({ host: "h", query: undefined }))).toEqual(["host"]);
  });

  it("rejects a port outside the 16-bit range", () => {
    const error = captureUriError(() => createUri({ host: "h", port: 70000 }));
    expect(error.code).toBe("INVALID_RECORD");
    expect(error.details).toEqual([{ path: "port", message: "Port must not exceed 65535" }]);
  });

  it("rejects unknown fields", () => {
    const fields = JSON.parse('{"hots":"example.com"}');
    const error = captureUriError(() => createUri(fields));
    expect(error.code).toBe("INVALID_RECORD");
    expect(error.details).toHaveLength(1);
  });

  it("rejects non-string text fields", () => {
    const fields = JSON.parse('{"host":"h","path":42}');
    const error = captureUriError(() => createUri(fields));
    expect(error.details.map((d) => d.path)).toEqual(["path"]);
  });
});

describe("uriEquals", () => {
  it("compares records field by field", () => {
    const a = decompose("https://user@example.com:444/a?b#c");
    const b = createUri({
      scheme: "https",
      userinfo: "user",
      host: "example.com",
      port: 444,
      path: "a",
      query: "b",
      fragment: "c",
    });
    expect(a).not.toBe(b);
    expect(uriEquals(a, b)).toBe(true);
  });

  it("distinguishes a differing port", () => {
    expect(uriEquals(createUri({ host: "h", port: 80 }), createUri({ host: "h", port: 81 }))).toBe(false);
  });

  it("distinguishes an empty component from an absent one", () => {
    expect(uriEquals(createUri({ host: "h", path: "" }), createUri({ host: "h" }))).toBe(false);
  });

  it("lists the components in URI order", () => {
    expect(URI_COMPONENTS).toEqual(["scheme", "userinfo", "host", "port", "path", "query", "fragment"]);
  });
});
