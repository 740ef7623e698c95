import { UriError } from "../src/uri/errors.js";

/**
 * Run `fn` and return the UriError it throws. Fails the test if it returns
 * normally or throws anything else.
 */
export function captureUriError(fn: () => unknown): UriError {
  try {
    fn();
  } catch (error) {
    if (error instanceof UriError) return error;
    throw error;
  }
  throw new Error("Expected a UriError to be thrown");
}
