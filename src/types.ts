import type { SP_CONSTANTS } from "./constants";

export type FormatVersion = (typeof SP_CONSTANTS.SUPPORTED_VERSIONS)[number];

export interface Payload {
  version: FormatVersion;
  salt: Uint8Array;       // SALT_LEN bytes
  nonce: Uint8Array;      // AES.IV_LENGTH bytes
  ciphertext: Uint8Array; // ciphertext || 16-byte tag
}

export type PasswordRule =
  | "too-short"
  | "missing-lowercase"
  | "missing-uppercase"
  | "missing-digit"
  | "missing-special";

export interface PasswordViolation {
  rule: PasswordRule;
  message: string;
}

export type PasswordCheck =
  | { ok: true }
  | { ok: false; reasons: PasswordViolation[] };

export type InputKind = "markdown" | "html";

export interface ProtectedDocument {
  html: string;   // the static page
  token: string;  // serialized payload embedded in `html`
  title: string;
}
