import { ValidationError } from "../errors";

/**
 * Serializes a value for a `<script type="application/json">` element.
 * `<`, `>` and `&` become \u escapes so the text can never close the element
 * or open a comment; U+2028/U+2029 are escaped for older JS parsers.
 */
export function toScriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/&/g, "\\u0026")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

export function safeParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Invalid JSON input");
  }
}
