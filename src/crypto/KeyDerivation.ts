import { SP_CONSTANTS } from "../constants";
import { CryptoError, ValidationError, describeError } from "../errors";
import { isBytes, toBufferSource } from "../utils/typedArray";

function assertInputs(password: string, salt: Uint8Array, iterations: number): void {
  if (typeof password !== "string" || password.length === 0) {
    throw new ValidationError("Password must be a non-empty string");
  }

  if (!isBytes(salt) || salt.byteLength !== SP_CONSTANTS.SALT_LEN) {
    throw new ValidationError(`Salt must be Uint8Array of length ${SP_CONSTANTS.SALT_LEN}`);
  }

  if (!Number.isInteger(iterations) || iterations < 1 || iterations > SP_CONSTANTS.PBKDF2.MAX_ITERATIONS) {
    throw new ValidationError(`iterations must be an integer in [1, ${SP_CONSTANTS.PBKDF2.MAX_ITERATIONS}]`);
  }
}

async function importPassword(password: string): Promise<CryptoKey> {
  try {
    return await crypto.subtle.importKey(
      "raw",
      toBufferSource(new TextEncoder().encode(password)),
      { name: SP_CONSTANTS.PBKDF2.NAME },
      false,
      ["deriveKey", "deriveBits"]
    );
  } catch (e) {
    throw new CryptoError(`Failed to import password: ${describeError(e)}`);
  }
}

function pbkdf2Params(salt: Uint8Array, iterations: number): Pbkdf2Params {
  return {
    name: SP_CONSTANTS.PBKDF2.NAME,
    hash: SP_CONSTANTS.PBKDF2.HASH,
    salt: toBufferSource(salt),
    iterations
  };
}

/**
 * PBKDF2-HMAC-SHA-256 → non-extractable AES-256-GCM key.
 * The key is never cached: every call runs the full iteration count.
 */
export async function deriveKeyFromPassword(
  password: string,
  salt: Uint8Array,
  iterations: number
): Promise<CryptoKey> {
  assertInputs(password, salt, iterations);
  const material = await importPassword(password);

  try {
    return await crypto.subtle.deriveKey(
      pbkdf2Params(salt, iterations),
      material,
      { name: SP_CONSTANTS.AES.NAME, length: SP_CONSTANTS.AES.LENGTH },
      false,
      ["encrypt", "decrypt"]
    );
  } catch (e) {
    throw new CryptoError(`PBKDF2 derivation failed: ${describeError(e)}`);
  }
}

/** Raw key bytes for the same derivation; lets two implementations compare keys. */
export async function deriveKeyBytes(
  password: string,
  salt: Uint8Array,
  iterations: number
): Promise<Uint8Array> {
  assertInputs(password, salt, iterations);
  const material = await importPassword(password);

  let bits: ArrayBuffer;
  try {
    bits = await crypto.subtle.deriveBits(pbkdf2Params(salt, iterations), material, SP_CONSTANTS.AES.LENGTH);
  } catch (e) {
    throw new CryptoError(`PBKDF2 derivation failed: ${describeError(e)}`);
  }
  return new Uint8Array(bits);
}
