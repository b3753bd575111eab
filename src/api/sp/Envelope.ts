// Envelope.ts
import { SP_CONSTANTS } from "../../constants";
import { MalformedTokenError } from "../../errors";
import type { FormatVersion } from "../../types";
import { AuthenticatedCipher } from "../../crypto/AuthenticatedCipher";
import { deriveKeyFromPassword } from "../../crypto/KeyDerivation";
import { aadFor, getFormat } from "../../payload/FormatRegistry";
import { decodePayload, encodePayload } from "../../payload/PayloadCodec";

export type SealSpec = {
  version?: FormatVersion;     // defaults to CURRENT_FORMAT_VERSION
  salt?: Uint8Array;           // fixed salt, tests only; fresh random otherwise
  nonce?: Uint8Array;          // fixed nonce, tests only; fresh random otherwise
};

export const Envelope = {
  seal: async (
    cipher: AuthenticatedCipher,
    plaintext: string,
    password: string,
    spec: SealSpec = {}
  ): Promise<string> => {
    const format = getFormat(spec.version ?? SP_CONSTANTS.CURRENT_FORMAT_VERSION);
    const salt = spec.salt ?? cipher.generateSalt();
    const nonce = spec.nonce ?? cipher.generateNonce();

    const key = await deriveKeyFromPassword(password, salt, format.iterations);
    const ciphertext = await cipher.seal(key, nonce, new TextEncoder().encode(plaintext), aadFor(format));

    return encodePayload({ version: format.version, salt, nonce, ciphertext });
  },

  /**
   * @throws {@link MalformedTokenError} if the token does not parse.
   * @throws {@link AuthFailureError} on a wrong password or altered token.
   */
  open: async (cipher: AuthenticatedCipher, token: string, password: string): Promise<string> => {
    const payload = decodePayload(token);
    const format = getFormat(payload.version);

    const key = await deriveKeyFromPassword(password, payload.salt, format.iterations);
    const plain = await cipher.open(key, payload.nonce, payload.ciphertext, aadFor(format));

    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(plain);
    } catch {
      throw new MalformedTokenError("Decrypted payload is not UTF-8 text");
    }
  }
};
