import { SP_CONSTANTS } from "../constants";
import { MalformedTokenError, ValidationError } from "../errors";
import type { FormatVersion, Payload } from "../types";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { getFormat, isSupportedVersion } from "./FormatRegistry";

const VERSION_RE = /^[1-9][0-9]{0,8}$/;

const base64Length = (bytes: number): number => 4 * Math.ceil(bytes / 3);

/** Characters in the token of a `ciphertextBytes`-long ciphertext, tag included. */
export function encodedTokenLength(version: FormatVersion, ciphertextBytes: number): number {
  const format = getFormat(version);
  return (
    String(version).length +
    3 * SP_CONSTANTS.TOKEN_SEPARATOR.length +
    base64Length(format.saltLength) +
    base64Length(format.nonceLength) +
    base64Length(ciphertextBytes)
  );
}

/**
 * Serializes a payload as `<version>.<salt>.<nonce>.<ciphertext>`, each binary
 * field in standard padded base64. The alphabet contains neither `.` nor any
 * character that needs escaping in HTML attributes or JS strings.
 */
export function encodePayload(payload: Payload, maxChars: number = SP_CONSTANTS.MAX_TOKEN_CHARS): string {
  const format = getFormat(payload.version);
  if (payload.salt.byteLength !== format.saltLength) {
    throw new ValidationError(`Salt must be ${format.saltLength} bytes for format v${format.version}`);
  }
  if (payload.nonce.byteLength !== format.nonceLength) {
    throw new ValidationError(`Nonce must be ${format.nonceLength} bytes for format v${format.version}`);
  }
  if (payload.ciphertext.byteLength < format.tagLength) {
    throw new ValidationError("Ciphertext is shorter than the authentication tag");
  }
  if (encodedTokenLength(format.version, payload.ciphertext.byteLength) > maxChars) {
    throw new ValidationError(`Token would exceed ${maxChars} characters`);
  }
  return [
    String(payload.version),
    bytesToBase64(payload.salt),
    bytesToBase64(payload.nonce),
    bytesToBase64(payload.ciphertext)
  ].join(SP_CONSTANTS.TOKEN_SEPARATOR);
}

/**
 * Parses a token back into its four fields.
 *
 * @throws {@link MalformedTokenError} for anything that is not exactly four
 * well-formed fields of a known version. Never throws for a wrong password;
 * that is only detectable when the ciphertext is opened.
 */
export function decodePayload(token: string, maxChars: number = SP_CONSTANTS.MAX_TOKEN_CHARS): Payload {
  if (typeof token !== "string") {
    throw new MalformedTokenError("Token must be a string");
  }
  const trimmed = token.trim();
  if (trimmed.length === 0) {
    throw new MalformedTokenError("Token is empty");
  }
  if (trimmed.length > maxChars) {
    throw new MalformedTokenError("Token too large");
  }

  const parts = trimmed.split(SP_CONSTANTS.TOKEN_SEPARATOR);
  if (parts.length !== 4) {
    throw new MalformedTokenError(`Token must have 4 fields, found ${parts.length}`);
  }
  const [versionText, saltB64, nonceB64, ciphertextB64] = parts;

  if (!VERSION_RE.test(versionText)) {
    throw new MalformedTokenError("Token version is not a number");
  }
  const version = Number(versionText);
  if (!isSupportedVersion(version)) {
    throw new MalformedTokenError(`Unsupported token version ${version}`);
  }
  const format = getFormat(version);

  const salt = decodeField(saltB64, "salt");
  const nonce = decodeField(nonceB64, "nonce");
  const ciphertext = decodeField(ciphertextB64, "ciphertext");

  if (salt.byteLength !== format.saltLength) {
    throw new MalformedTokenError(`Salt must be ${format.saltLength} bytes`);
  }
  if (nonce.byteLength !== format.nonceLength) {
    throw new MalformedTokenError(`Nonce must be ${format.nonceLength} bytes`);
  }
  if (ciphertext.byteLength < format.tagLength) {
    throw new MalformedTokenError("Ciphertext is shorter than the authentication tag");
  }

  return { version, salt, nonce, ciphertext };
}

function decodeField(b64: string, field: string): Uint8Array {
  try {
    return base64ToBytes(b64);
  } catch (e) {
    if (e instanceof ValidationError) {
      throw new MalformedTokenError(`Invalid ${field} field: ${e.message}`);
    }
    throw e;
  }
}
