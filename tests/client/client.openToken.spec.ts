import "../setup";
import { openToken, type DecryptPhase } from "../../src/client/runtime";
import { buildRuntimeConfig } from "../../src/wrapper/WrapperGenerator";
import { AuthenticatedCipher } from "../../src/crypto/AuthenticatedCipher";
import { Envelope } from "../../src/api/sp/Envelope";
import { decodePayload } from "../../src/payload/PayloadCodec";
import { MalformedTokenError } from "../../src/errors";
import { STRONG_PASSWORD, fixedBytes } from "../helpers/fixtures";
import { independentSeal } from "../helpers/independentSeal";

const cipher = new AuthenticatedCipher();

describe("openToken - agreement with the encoder", () => {
  it.each([1, 2] as const)("opens v%i tokens produced by the library", async (version) => {
    const token = await Envelope.seal(cipher, "<h1>Grüße</h1>", STRONG_PASSWORD, { version });
    await expect(openToken(crypto.subtle, buildRuntimeConfig(token), STRONG_PASSWORD)).resolves.toEqual({
      ok: true,
      html: "<h1>Grüße</h1>"
    });
  });

  it("opens a token sealed by a direct WebCrypto implementation", async () => {
    const token = await independentSeal("Hello, world!", STRONG_PASSWORD, {
      version: 1,
      salt: fixedBytes(16, 1),
      nonce: fixedBytes(12, 2)
    });
    await expect(openToken(crypto.subtle, buildRuntimeConfig(token), STRONG_PASSWORD)).resolves.toEqual({
      ok: true,
      html: "Hello, world!"
    });
  });

  it("reports the phases it goes through", async () => {
    const token = await Envelope.seal(cipher, "x", STRONG_PASSWORD, { version: 1 });
    const phases: DecryptPhase[] = [];
    await openToken(crypto.subtle, buildRuntimeConfig(token), STRONG_PASSWORD, (p) => phases.push(p));
    expect(phases).toEqual(["deriving", "decrypting"]);
  });
});

describe("openToken - failures", () => {
  it("reports a wrong password as an authentication failure", async () => {
    const token = await Envelope.seal(cipher, "x", STRONG_PASSWORD, { version: 1 });
    await expect(openToken(crypto.subtle, buildRuntimeConfig(token), "wrong")).resolves.toEqual({
      ok: false,
      reason: "auth"
    });
  });

  it("reports a relabelled token as an authentication failure", async () => {
    const token = await Envelope.seal(cipher, "x", STRONG_PASSWORD, { version: 1 });
    await expect(openToken(crypto.subtle, buildRuntimeConfig(`2${token.slice(1)}`), STRONG_PASSWORD)).resolves.toEqual({
      ok: false,
      reason: "auth"
    });
  });

  it.each([
    ["truncated", (t: string) => t.slice(0, -3)],
    ["three fields", (t: string) => t.slice(0, t.lastIndexOf("."))],
    ["unknown version", (t: string) => `7${t.slice(1)}`],
    ["zero-padded version", (t: string) => `0${t}`],
    ["non-canonical salt", (t: string) => t.replace(/^1\.[^.]*\./, "1.AAAAAAAAAAAAAAAAAAAAAB==.")],
    ["url-safe alphabet", (t: string) => t.replace(/\.[^.]*$/, ".AAAAAAAAAAAAAAAAAAAAAAAAAAA_")]
  ])("reports a %s token as malformed without deriving", async (_label, mutate) => {
    const token = await Envelope.seal(cipher, "x", STRONG_PASSWORD, { version: 1 });
    const phases: DecryptPhase[] = [];
    await expect(
      openToken(crypto.subtle, buildRuntimeConfig(mutate(token)), STRONG_PASSWORD, (p) => phases.push(p))
    ).resolves.toEqual({ ok: false, reason: "malformed" });
    expect(phases).toEqual([]);
  });
});

describe("openToken - size limit", () => {
  it("embeds the same limit the library decoder applies", async () => {
    const token = await Envelope.seal(cipher, "x", STRONG_PASSWORD, { version: 1 });
    expect(buildRuntimeConfig(token).maxTokenChars).toBe(64 * 1024 * 1024);
  });

  it("agrees with the library decoder on both sides of the limit", async () => {
    const token = await Envelope.seal(cipher, "boundary", STRONG_PASSWORD, { version: 1 });
    const atLimit = { ...buildRuntimeConfig(token), maxTokenChars: token.length };
    const belowLimit = { ...atLimit, maxTokenChars: token.length - 1 };

    expect(decodePayload(token, token.length).version).toBe(1);
    await expect(openToken(crypto.subtle, atLimit, STRONG_PASSWORD)).resolves.toEqual({ ok: true, html: "boundary" });

    expect(() => decodePayload(token, token.length - 1)).toThrow(MalformedTokenError);
    await expect(openToken(crypto.subtle, belowLimit, STRONG_PASSWORD)).resolves.toEqual({
      ok: false,
      reason: "malformed"
    });
  });
});
