/**
 * Core character classes from RFC 2234 §6.1, as referenced by RFC 3986
 * Appendix A.
 */

function charRange(first: string, last: string): string[] {
  const chars: string[] = [];
  for (let code = first.charCodeAt(0); code <= last.charCodeAt(0); code++) {
    chars.push(String.fromCharCode(code));
  }
  return chars;
}

/** ALPHA = %x41-5A / %x61-7A */
export const ALPHA: ReadonlySet<string> = new Set([
  ...charRange("A", "Z"),
  ...charRange("a", "z"),
]);

/** DIGIT = %x30-39 */
export const DIGIT: ReadonlySet<string> = new Set(charRange("0", "9"));

/** unreserved = ALPHA / DIGIT / "-" / "." / "_" / "~" (RFC 3986 §2.3) */
export const UNRESERVED: ReadonlySet<string> = new Set([...ALPHA, ...DIGIT, "-", ".", "_", "~"]);

export function isUnreserved(text: string): boolean {
  return [...text].every((ch) => UNRESERVED.has(ch));
}

export function isDigits(text: string): boolean {
  return text.length > 0 && [...text].every((ch) => DIGIT.has(ch));
}
