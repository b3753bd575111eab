import { SP_CONSTANTS } from "../constants";
import { AuthFailureError, CryptoError, ValidationError, describeError } from "../errors";
import { isBytes, toBufferSource } from "../utils/typedArray";

export class AuthenticatedCipher {
  generateSalt(): Uint8Array {
    const salt = new Uint8Array(SP_CONSTANTS.SALT_LEN);
    crypto.getRandomValues(salt);
    return salt;
  }

  generateNonce(): Uint8Array {
    const nonce = new Uint8Array(SP_CONSTANTS.AES.IV_LENGTH);
    crypto.getRandomValues(nonce);
    return nonce;
  }

  /** AES-256-GCM; the returned bytes are ciphertext followed by the 16-byte tag. */
  async seal(key: CryptoKey, nonce: Uint8Array, plaintext: Uint8Array, aad?: Uint8Array): Promise<Uint8Array> {
    this.assertNonce(nonce);
    this.assertKey(key, ["encrypt"], "seal()");
    try {
      const ct = await crypto.subtle.encrypt(this.params(nonce, aad), key, toBufferSource(plaintext));
      return new Uint8Array(ct);
    } catch (e) {
      throw new CryptoError(`Encryption failed: ${describeError(e)}`);
    }
  }

  /**
   * @throws {@link AuthFailureError} when the tag does not verify: wrong key,
   * altered ciphertext, nonce or associated data. No plaintext is returned.
   */
  async open(key: CryptoKey, nonce: Uint8Array, ciphertext: Uint8Array, aad?: Uint8Array): Promise<Uint8Array> {
    this.assertNonce(nonce);
    if (!isBytes(ciphertext) || ciphertext.byteLength < SP_CONSTANTS.AES.TAG_LENGTH) {
      throw new ValidationError(`Ciphertext must be at least ${SP_CONSTANTS.AES.TAG_LENGTH} bytes`);
    }
    this.assertKey(key, ["decrypt"], "open()");

    let pt: ArrayBuffer;
    try {
      pt = await crypto.subtle.decrypt(this.params(nonce, aad), key, toBufferSource(ciphertext));
    } catch {
      throw new AuthFailureError();
    }
    return new Uint8Array(pt);
  }

  private params(nonce: Uint8Array, aad?: Uint8Array): AesGcmParams {
    return aad
      ? { name: SP_CONSTANTS.AES.NAME, iv: toBufferSource(nonce), tagLength: SP_CONSTANTS.AES.TAG_LENGTH * 8, additionalData: toBufferSource(aad) }
      : { name: SP_CONSTANTS.AES.NAME, iv: toBufferSource(nonce), tagLength: SP_CONSTANTS.AES.TAG_LENGTH * 8 };
  }

  private assertNonce(nonce: Uint8Array): void {
    if (!isBytes(nonce) || nonce.byteLength !== SP_CONSTANTS.AES.IV_LENGTH) {
      throw new ValidationError(`Nonce must be ${SP_CONSTANTS.AES.IV_LENGTH} bytes`);
    }
  }

  private assertKey(key: CryptoKey, required: KeyUsage[], where: string): void {
    if (!key) {
      throw new ValidationError(`A key is required for ${where}`);
    }
    const alg: Partial<AesKeyAlgorithm> = key.algorithm;

    if (alg.name !== SP_CONSTANTS.AES.NAME) {
      throw new ValidationError(`Invalid key algorithm for ${where}; expected ${SP_CONSTANTS.AES.NAME}`);
    }

    if (typeof alg.length === "number" && alg.length !== SP_CONSTANTS.AES.LENGTH) {
      throw new ValidationError(`Invalid key length for ${where}; expected ${SP_CONSTANTS.AES.LENGTH} bits`);
    }

    for (const u of required) {
      if (!key.usages.includes(u)) {
        throw new ValidationError(`Key missing "${u}" usage for ${where}`);
      }
    }
  }
}
