import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../src/logging.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { logger } from "../src/logging.js";
import { decompose, safeDecompose } from "../src/uri/decompose.js";
import { UriError, toResult } from "../src/uri/errors.js";
import { safeValidateScheme, safeValidateSchemeOneOf } from "../src/uri/schemeValidator.js";

describe("safe variants", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("wraps a decomposed record", () => {
    expect(safeDecompose("https://example.com/a")).toEqual({
      valid: true,
      uri: { scheme: "https", host: "example.com", path: "a" },
    });
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it("returns and logs a malformed port instead of throwing", () => {
    const result = safeDecompose("https://example.com:abc/");

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBeInstanceOf(UriError);
      expect(result.error.code).toBe("MALFORMED_PORT");
    }
    expect(logger.debug).toHaveBeenCalledWith("decompose rejected URI", {
      code: "MALFORMED_PORT",
      reason: 'Port "abc" is not a decimal number between 0 and 65535',
    });
  });

  it("reports an invalid scheme character", () => {
    const result = safeValidateScheme(decompose("h0tps://github.com"));

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.code).toBe("INVALID_SCHEME_CHARACTER");
    }
    expect(logger.debug).toHaveBeenCalledWith("validateScheme rejected URI", {
      code: "INVALID_SCHEME_CHARACTER",
      reason: "'0' is not valid in a URI scheme",
    });
  });

  it("reports a disallowed scheme", () => {
    const result = safeValidateSchemeOneOf(decompose("https+git://github.com/rust-lang/rust"), [
      "https",
      "http",
      "git",
    ]);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.code).toBe("DISALLOWED_SCHEME");
    }
  });

  it("passes an allowed scheme through unchanged", () => {
    const uri = decompose("https://example.com");
    const result = safeValidateSchemeOneOf(uri);

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.uri).toBe(uri);
    }
  });

  it("lets errors other than UriError propagate", () => {
    expect(() =>
      toResult("explode", () => {
        throw new TypeError("boom");
      })
    ).toThrow(TypeError);
    expect(logger.debug).not.toHaveBeenCalled();
  });
});
