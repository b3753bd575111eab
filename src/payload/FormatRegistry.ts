import { SP_CONSTANTS } from "../constants";
import { ValidationError } from "../errors";
import type { FormatVersion } from "../types";

/**
 * Fixed parameters of one token format. A published version is never edited:
 * changing any value here would break every page already generated with it.
 * New defaults get a new version number.
 */
export interface FormatParams {
  version: FormatVersion;
  kdf: typeof SP_CONSTANTS.PBKDF2.NAME;
  hash: typeof SP_CONSTANTS.PBKDF2.HASH;
  iterations: number;
  saltLength: number;
  cipher: typeof SP_CONSTANTS.AES.NAME;
  keyBits: typeof SP_CONSTANTS.AES.LENGTH;
  nonceLength: number;
  tagLength: number;
  /** Associated data bound into the tag, or `null` when the version binds none. */
  aad: string | null;
}

/** Shape of a format as embedded into the generated page. */
export type PublishedFormat = Omit<FormatParams, "version" | "kdf" | "cipher">;

const V1: Readonly<FormatParams> = Object.freeze({
  version: 1,
  kdf: SP_CONSTANTS.PBKDF2.NAME,
  hash: SP_CONSTANTS.PBKDF2.HASH,
  iterations: 100_000,
  saltLength: 16,
  cipher: SP_CONSTANTS.AES.NAME,
  keyBits: SP_CONSTANTS.AES.LENGTH,
  nonceLength: 12,
  tagLength: 16,
  aad: null
});

const V2: Readonly<FormatParams> = Object.freeze({
  version: 2,
  kdf: SP_CONSTANTS.PBKDF2.NAME,
  hash: SP_CONSTANTS.PBKDF2.HASH,
  iterations: 600_000,
  saltLength: 16,
  cipher: SP_CONSTANTS.AES.NAME,
  keyBits: SP_CONSTANTS.AES.LENGTH,
  nonceLength: 12,
  tagLength: 16,
  aad: "sealed-page|v2"
});

export const FORMATS: Readonly<Record<FormatVersion, Readonly<FormatParams>>> = Object.freeze({
  1: V1,
  2: V2
});

export function isSupportedVersion(version: number): version is FormatVersion {
  return SP_CONSTANTS.SUPPORTED_VERSIONS.some((v) => v === version);
}

export function getFormat(version: number): Readonly<FormatParams> {
  if (!isSupportedVersion(version)) {
    throw new ValidationError(
      `Unsupported format version ${version}; expected one of ${SP_CONSTANTS.SUPPORTED_VERSIONS.join(", ")}`
    );
  }
  return FORMATS[version];
}

export function aadFor(format: Readonly<FormatParams>): Uint8Array | undefined {
  return format.aad === null ? undefined : new TextEncoder().encode(format.aad);
}

/** Format table embedded into every generated page, keyed by version discriminator. */
export function publishedFormats(): Record<string, PublishedFormat> {
  const table: Record<string, PublishedFormat> = {};
  for (const version of SP_CONSTANTS.SUPPORTED_VERSIONS) {
    const { version: _v, kdf: _k, cipher: _c, ...published } = FORMATS[version];
    table[String(version)] = published;
  }
  return table;
}
