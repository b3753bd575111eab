import "./../setup";
import { deriveKeyBytes, deriveKeyFromPassword } from "../../src/crypto/KeyDerivation";
import { CryptoError, ValidationError } from "../../src/errors";
import { fixedBytes } from "../helpers/fixtures";
import { rawPbkdf2 } from "../helpers/independentSeal";

describe("KeyDerivation", () => {
  it("validates password and salt inputs", async () => {
    await expect(deriveKeyFromPassword("", new Uint8Array(16), 1000)).rejects.toBeInstanceOf(ValidationError);
    await expect(deriveKeyFromPassword("pw", new Uint8Array(4), 1000)).rejects.toBeInstanceOf(ValidationError);
    await expect(
      deriveKeyFromPassword("pw", undefined as unknown as Uint8Array, 1000)
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("wraps WebCrypto failures as CryptoError", async () => {
    const spy = jest.spyOn(crypto.subtle, "deriveKey").mockRejectedValueOnce(new Error("boom"));
    await expect(deriveKeyFromPassword("pw", new Uint8Array(16), 1000)).rejects.toBeInstanceOf(CryptoError);
    spy.mockRestore();
  });

  it("returns a non-extractable AES-256-GCM key for encrypt and decrypt", async () => {
    const key = await deriveKeyFromPassword("pw", new Uint8Array(16), 1000);
    expect(key.extractable).toBe(false);
    expect(key.algorithm).toEqual({ name: "AES-GCM", length: 256 });
    expect([...key.usages].sort()).toEqual(["decrypt", "encrypt"]);
  });
});

describe("KeyDerivation - extra input validation", () => {
  it("rejects non-integer or non-positive iteration counts", async () => {
    await expect(deriveKeyBytes("pw", new Uint8Array(16), 0)).rejects.toBeInstanceOf(ValidationError);
    // 1.5 should be invalid
    await expect(deriveKeyBytes("pw", new Uint8Array(16), 1.5)).rejects.toBeInstanceOf(ValidationError);
    await expect(deriveKeyBytes("pw", new Uint8Array(16), -1)).rejects.toBeInstanceOf(ValidationError);
  });

  it("rejects unreasonably high iteration counts", async () => {
    await expect(deriveKeyBytes("pw", new Uint8Array(16), 10_000_001)).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("KeyDerivation - determinism", () => {
  const salt = fixedBytes(16, 3);

  it("derives the same 32 bytes for the same inputs", async () => {
    const a = await deriveKeyBytes("correct horse", salt, 2000);
    const b = await deriveKeyBytes("correct horse", salt, 2000);
    expect(a.byteLength).toBe(32);
    expect(Array.from(a)).toEqual(Array.from(b));
  });

  it("changes with the password, the salt and the iteration count", async () => {
    const base = Array.from(await deriveKeyBytes("correct horse", salt, 2000));
    expect(Array.from(await deriveKeyBytes("correct horsf", salt, 2000))).not.toEqual(base);
    expect(Array.from(await deriveKeyBytes("correct horse", fixedBytes(16, 4), 2000))).not.toEqual(base);
    expect(Array.from(await deriveKeyBytes("correct horse", salt, 2001))).not.toEqual(base);
  });

  it("agrees with a direct PBKDF2-HMAC-SHA-256 call", async () => {
    const ours = await deriveKeyBytes("Tr0ub4dor&3", salt, 100_000);
    const direct = await rawPbkdf2("Tr0ub4dor&3", salt, 100_000);
    expect(Array.from(ours)).toEqual(Array.from(direct));
  });

  it("encodes the password as UTF-8", async () => {
    const ours = await deriveKeyBytes("pässwörd✓", salt, 1000);
    const direct = await rawPbkdf2("pässwörd✓", salt, 1000);
    expect(Array.from(ours)).toEqual(Array.from(direct));
  });
});
