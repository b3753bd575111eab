import "../setup";
import { decodePayload, encodePayload, encodedTokenLength } from "../../src/payload/PayloadCodec";
import { AuthFailureError, MalformedTokenError, ValidationError } from "../../src/errors";

const SALT_B64 = "AAAAAAAAAAAAAAAAAAAAAA=="; // 16 zero bytes
const NONCE_B64 = "AAAAAAAAAAAAAAAA"; // 12 zero bytes
const CT_B64 = "AAAAAAAAAAAAAAAAAAAAAAAAAAA="; // 20 zero bytes

function token(...parts: string[]): string {
  return parts.join(".");
}

describe("PayloadCodec - encode", () => {
  it("writes <version>.<salt>.<nonce>.<ciphertext> in padded base64", () => {
    const t = encodePayload({
      version: 1,
      salt: new Uint8Array(16),
      nonce: new Uint8Array(12),
      ciphertext: new Uint8Array(20)
    });
    expect(t).toBe(token("1", SALT_B64, NONCE_B64, CT_B64));
  });

  it("refuses fields that do not match the format", () => {
    const ok = { version: 2 as const, salt: new Uint8Array(16), nonce: new Uint8Array(12), ciphertext: new Uint8Array(16) };
    expect(() => encodePayload({ ...ok, salt: new Uint8Array(8) })).toThrow(ValidationError);
    expect(() => encodePayload({ ...ok, nonce: new Uint8Array(16) })).toThrow(ValidationError);
    expect(() => encodePayload({ ...ok, ciphertext: new Uint8Array(15) })).toThrow(ValidationError);
  });
});

describe("PayloadCodec - decode", () => {
  it("parses the four fields back", () => {
    const salt = Uint8Array.from({ length: 16 }, (_, i) => i);
    const nonce = Uint8Array.from({ length: 12 }, (_, i) => 100 + i);
    const ciphertext = Uint8Array.from({ length: 21 }, (_, i) => 200 + i);

    const payload = decodePayload(encodePayload({ version: 2, salt, nonce, ciphertext }));
    expect(payload.version).toBe(2);
    expect(Array.from(payload.salt)).toEqual(Array.from(salt));
    expect(Array.from(payload.nonce)).toEqual(Array.from(nonce));
    expect(Array.from(payload.ciphertext)).toEqual(Array.from(ciphertext));
  });

  it("trims surrounding whitespace such as a trailing newline", () => {
    expect(decodePayload(` ${token("1", SALT_B64, NONCE_B64, CT_B64)}\n`).version).toBe(1);
  });

  it.each([
    ["empty", ""],
    ["three fields", token("1", SALT_B64, NONCE_B64)],
    ["five fields", token("1", SALT_B64, NONCE_B64, CT_B64, CT_B64)],
    ["non-numeric version", token("x", SALT_B64, NONCE_B64, CT_B64)],
    ["zero-padded version", token("01", SALT_B64, NONCE_B64, CT_B64)],
    ["unknown version", token("3", SALT_B64, NONCE_B64, CT_B64)],
    ["short salt", token("1", "AAAAAAAAAAA=", NONCE_B64, CT_B64)],
    ["long nonce", token("1", SALT_B64, SALT_B64, CT_B64)],
    ["ciphertext shorter than the tag", token("1", SALT_B64, NONCE_B64, "AAAAAAAAAAAAAAAAAAAA")],
    ["truncated ciphertext segment", token("1", SALT_B64, NONCE_B64, CT_B64.slice(0, -2))],
    ["non-canonical salt", token("1", "AAAAAAAAAAAAAAAAAAAAAB==", NONCE_B64, CT_B64)],
    ["url-safe characters", token("1", SALT_B64, NONCE_B64, "AAAAAAAAAAAAAAAAAAAAAAAAAA_=")]
  ])("rejects %s with MalformedTokenError", (_label, input) => {
    expect(() => decodePayload(input)).toThrow(MalformedTokenError);
  });

  it("keeps malformed input distinct from authentication failure", () => {
    let caught: unknown;
    try {
      decodePayload("garbage");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(MalformedTokenError);
    expect(caught).not.toBeInstanceOf(AuthFailureError);
  });
});

describe("PayloadCodec - size limit", () => {
  const payload = { version: 1 as const, salt: new Uint8Array(16), nonce: new Uint8Array(12), ciphertext: new Uint8Array(20) };
  const full = token("1", SALT_B64, NONCE_B64, CT_B64);

  it("predicts the token length from the ciphertext size", () => {
    expect(encodedTokenLength(1, 20)).toBe(full.length);
    expect(encodedTokenLength(2, 16)).toBe(68);
  });

  it("refuses to encode a token over the limit", () => {
    expect(encodePayload(payload, full.length)).toBe(full);
    expect(() => encodePayload(payload, full.length - 1)).toThrow(ValidationError);
  });

  it("refuses to decode a token over the same limit", () => {
    expect(decodePayload(full, full.length).version).toBe(1);
    expect(() => decodePayload(full, full.length - 1)).toThrow(MalformedTokenError);
  });
});
