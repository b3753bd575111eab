/**
 * Decoder that runs inside the generated page.
 *
 * @remarks
 * The three exported functions are inlined into the artifact through
 * `Function.prototype.toString` (see {@link buildRuntimeScript}). Each of them
 * may therefore only touch its own parameters and browser globals: no imports,
 * no module-level constants, no calls to each other except through `host`.
 *
 * The token parser, PBKDF2 derivation and AES-GCM open below are a second,
 * independent implementation of `PayloadCodec.decodePayload`,
 * `deriveKeyFromPassword` and `AuthenticatedCipher.open`. Both must agree
 * byte-for-byte on every published format.
 *
 * @packageDocumentation
 */

/** One row of the format table embedded in the page. */
export interface RuntimeFormat {
  hash: string;
  iterations: number;
  saltLength: number;
  keyBits: number;
  nonceLength: number;
  tagLength: number;
  aad: string | null;
}

export interface RuntimeConfig {
  token: string;
  /** Longest token accepted, after trimming; same limit as `decodePayload`. */
  maxTokenChars: number;
  formats: Record<string, RuntimeFormat>;
  messages: { failure: string; working: string };
}

export type DecryptPhase = "deriving" | "decrypting";

export type DecryptorState = "awaiting-password" | DecryptPhase | "rendered" | "failed";

/** `reason` stays inside the engine; the page shows one message for both. */
export type OpenResult = { ok: true; html: string } | { ok: false; reason: "malformed" | "auth" };

export type SubmitOutcome = "rendered" | "failed" | "ignored";

export type OpenFn = (password: string, onPhase: (phase: DecryptPhase) => void) => Promise<OpenResult>;

export interface DecryptionEngine {
  getState(): DecryptorState;
  submit(password: string): Promise<SubmitOutcome>;
}

export interface DecryptorHost {
  subtle: SubtleCrypto;
  openToken: typeof openToken;
  createDecryptionEngine: typeof createDecryptionEngine;
  render: (html: string) => void;
}

export async function openToken(
  subtle: SubtleCrypto,
  config: RuntimeConfig,
  password: string,
  onPhase?: (phase: DecryptPhase) => void
): Promise<OpenResult> {
  const malformed: OpenResult = { ok: false, reason: "malformed" };
  const authFailure: OpenResult = { ok: false, reason: "auth" };

  const fromBase64 = (text: string) => {
    if (text.length === 0 || text.length % 4 !== 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(text)) return null;
    let binary: string;
    try {
      binary = atob(text);
    } catch {
      return null;
    }
    if (btoa(binary) !== text) return null;
    const bytes = new Uint8Array(binary.length);
    for (let i = 0; i < binary.length; i++) bytes[i] = binary.charCodeAt(i);
    return bytes;
  };

  if (typeof config.token !== "string") return malformed;
  const trimmed = config.token.trim();
  if (trimmed.length === 0 || trimmed.length > config.maxTokenChars) return malformed;
  const parts = trimmed.split(".");
  if (parts.length !== 4) return malformed;
  const [versionText, saltText, nonceText, ciphertextText] = parts;

  if (!/^[1-9][0-9]{0,8}$/.test(versionText)) return malformed;
  const format = Object.prototype.hasOwnProperty.call(config.formats, versionText)
    ? config.formats[versionText]
    : undefined;
  const salt = fromBase64(saltText);
  const nonce = fromBase64(nonceText);
  const ciphertext = fromBase64(ciphertextText);
  if (!format || !salt || !nonce || !ciphertext) return malformed;
  if (
    salt.length !== format.saltLength ||
    nonce.length !== format.nonceLength ||
    ciphertext.length < format.tagLength
  ) {
    return malformed;
  }

  const encoder = new TextEncoder();
  let key: CryptoKey;
  try {
    if (onPhase) onPhase("deriving");
    const material = await subtle.importKey("raw", new Uint8Array(encoder.encode(password)), { name: "PBKDF2" }, false, [
      "deriveKey"
    ]);
    key = await subtle.deriveKey(
      { name: "PBKDF2", hash: format.hash, salt, iterations: format.iterations },
      material,
      { name: "AES-GCM", length: format.keyBits },
      false,
      ["decrypt"]
    );
  } catch {
    return authFailure;
  }

  let plain: ArrayBuffer;
  try {
    if (onPhase) onPhase("decrypting");
    const params: AesGcmParams = { name: "AES-GCM", iv: nonce, tagLength: format.tagLength * 8 };
    if (format.aad !== null) params.additionalData = new Uint8Array(encoder.encode(format.aad));
    plain = await subtle.decrypt(params, key, ciphertext);
  } catch {
    return authFailure;
  }

  try {
    return { ok: true, html: new TextDecoder("utf-8", { fatal: true }).decode(plain) };
  } catch {
    return malformed;
  }
}

/**
 * awaiting-password → deriving → decrypting → rendered | failed.
 * `failed` hands straight back to awaiting-password; `rendered` is final.
 * Submissions outside awaiting-password are ignored, never queued.
 */
export function createDecryptionEngine(
  open: OpenFn,
  listener: (state: DecryptorState, result?: OpenResult) => void
): DecryptionEngine {
  let state: DecryptorState = "awaiting-password";

  const enter = (next: DecryptorState, result?: OpenResult) => {
    if (next === state && result === undefined) return;
    state = next;
    listener(next, result);
  };

  return {
    getState: () => state,
    submit: async (password: string): Promise<SubmitOutcome> => {
      if (state !== "awaiting-password") return "ignored";
      enter("deriving");

      let result: OpenResult;
      try {
        result = await open(password, (phase) => enter(phase));
      } catch {
        result = { ok: false, reason: "auth" };
      }

      if (result.ok) {
        enter("rendered", result);
        return "rendered";
      }
      enter("failed", result);
      enter("awaiting-password");
      return "failed";
    }
  };
}

/**
 * Binds the engine to the prompt markup. Returns `null` when the page lacks
 * the form, which leaves the static fallback text on screen.
 */
export function mountDecryptor(doc: Document, config: RuntimeConfig, host: DecryptorHost): DecryptionEngine | null {
  const form = doc.querySelector<HTMLFormElement>("#sp-form");
  const input = doc.querySelector<HTMLInputElement>("#sp-password");
  const status = doc.querySelector<HTMLElement>("#sp-status");
  const button = doc.querySelector<HTMLButtonElement>("#sp-submit");
  if (!form || !input || !status) return null;

  const engine = host.createDecryptionEngine(
    (password, onPhase) => host.openToken(host.subtle, config, password, onPhase),
    (state, result) => {
      form.setAttribute("data-state", state);
      const busy = state === "deriving" || state === "decrypting";
      input.disabled = busy;
      if (button) button.disabled = busy;

      if (busy) {
        status.textContent = config.messages.working;
      } else if (state === "failed") {
        status.textContent = config.messages.failure;
      } else if (state === "awaiting-password") {
        input.focus();
      } else if (state === "rendered" && result && result.ok) {
        status.textContent = "";
        host.render(result.html);
      }
    }
  );

  form.setAttribute("data-state", engine.getState());
  form.addEventListener("submit", (event) => {
    event.preventDefault();
    const password = input.value;
    input.value = "";
    engine.submit(password).catch(() => {
      status.textContent = config.messages.failure;
    });
  });
  return engine;
}
