import { ValidationError } from "../errors";
import { isBytes } from "./typedArray";

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export function bytesToBase64(bytes: ArrayBuffer | Uint8Array): string {
  const u8 = isBytes(bytes) ? bytes : new Uint8Array(bytes);
  if (u8.byteLength === 0) return "";
  let binary = "";
  for (let i = 0; i < u8.length; i++) binary += String.fromCharCode(u8[i]);
  return btoa(binary);
}

/**
 * Decodes standard, padded base64. Only the canonical encoding of a byte
 * string is accepted: whitespace, the URL-safe alphabet, missing padding and
 * non-zero trailing bits are all rejected, so every token segment has exactly
 * one spelling.
 */
export function base64ToBytes(b64: string): Uint8Array {
  if (typeof b64 !== "string" || b64.length === 0) {
    throw new ValidationError("Base64 input must be a non-empty string");
  }
  if (b64.length % 4 !== 0 || !BASE64_RE.test(b64)) {
    throw new ValidationError("Invalid base64 input");
  }

  let binary: string;
  try {
    binary = atob(b64);
  } catch {
    throw new ValidationError("Invalid base64 input");
  }

  const out = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) out[i] = binary.charCodeAt(i);

  if (btoa(binary) !== b64) {
    throw new ValidationError("Non-canonical base64 input");
  }
  return out;
}
