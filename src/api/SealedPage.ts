/**
 * High-level API for producing and opening password-protected static pages.
 *
 * @packageDocumentation
 *
 * @remarks
 * - A document is encrypted with AES-256-GCM under a key derived from the password with
 *   PBKDF2-HMAC-SHA-256. Salt and nonce are fresh for every call; nothing is cached between calls.
 * - The result is a text token `<version>.<salt>.<nonce>.<ciphertext>` (see {@link encodePayload}).
 *   {@link SealedPage.protect} embeds it, together with a decoder, in a single static HTML page.
 *
 * - Error taxonomy:
 *   - {@link ValidationError}: bad inputs or options (empty password, unknown format version).
 *   - {@link WeakPasswordError}: the password policy rejected the password; carries every reason.
 *   - {@link MalformedTokenError}: the token or page does not contain a well-formed payload.
 *   - {@link AuthFailureError}: wrong password, or the payload was altered.
 *   - {@link CryptoError}: a WebCrypto primitive failed for another reason.
 */

import { AuthenticatedCipher } from "../crypto/AuthenticatedCipher";
import { ValidationError } from "../errors";
import { SP_CONSTANTS, type PasswordPolicyRules } from "../constants";
import { renderMarkdown } from "../document/markdown";
import { minifyHtml } from "../document/minify";
import { injectStyle } from "../document/style";
import { extractTitle } from "../document/title";
import { silentLogger, type Logger } from "../logging/logger";
import { getFormat } from "../payload/FormatRegistry";
import { encodedTokenLength } from "../payload/PayloadCodec";
import { PasswordPolicy } from "../policy/PasswordPolicy";
import type { FormatVersion, InputKind, PasswordCheck, ProtectedDocument } from "../types";
import { extractToken, wrap } from "../wrapper/WrapperGenerator";
import { Envelope } from "./sp/Envelope";

/**
 * Configuration for {@link SealedPage}.
 */
export interface SealedPageOptions {
  /**
   * Overrides for the password strength rules.
   *
   * @defaultValue {@link POLICY_DEFAULTS}: 8+ characters with lowercase, uppercase, digit and special character.
   */
  passwordPolicy?: Partial<PasswordPolicyRules>;

  /**
   * Token format used for new documents. Existing tokens always open with their own version.
   *
   * @defaultValue {@link SP_CONSTANTS.CURRENT_FORMAT_VERSION}
   */
  formatVersion?: FormatVersion;

  /** Minify documents and generated pages with html-minifier-terser. @defaultValue `true` */
  minify?: boolean;

  /** pino logger; silent when omitted. Never receives passwords, keys or plaintext. */
  logger?: Logger;
}

export interface EncryptOptions {
  /** Skip the password policy. The encryption itself is unchanged. */
  allowUnsafe?: boolean;
  version?: FormatVersion;
}

export interface DocumentSource {
  content: string;
  kind: InputKind;
}

export interface ConvertOptions {
  style?: string;
  title?: string;
  minify?: boolean;
}

export interface ProtectOptions extends EncryptOptions, ConvertOptions {}

/**
 * Main entry point.
 *
 * @example
 * const sp = new SealedPage();
 * const page = await sp.protect({ content: "# Notes", kind: "markdown" }, "c0rrect-Horse");
 * // page.html is a self-contained file; publish it anywhere.
 *
 * @example
 * // Token only, e.g. to store elsewhere
 * const token = await sp.encrypt("<p>secret</p>", "c0rrect-Horse");
 * await sp.decrypt(token, "c0rrect-Horse"); // "<p>secret</p>"
 */
export class SealedPage {
  public readonly policy: PasswordPolicy;
  public readonly formatVersion: FormatVersion;
  public readonly minify: boolean;

  /** @internal AES-GCM primitives and salt/nonce generation. */
  private readonly cipher = new AuthenticatedCipher();
  private readonly logger: Logger;

  constructor(opts?: SealedPageOptions) {
    this.policy = new PasswordPolicy(opts?.passwordPolicy);
    this.formatVersion = getFormat(opts?.formatVersion ?? SP_CONSTANTS.CURRENT_FORMAT_VERSION).version;
    this.minify = opts?.minify ?? true;
    this.logger = opts?.logger ?? silentLogger();
  }

  /** Runs the password policy without encrypting anything. */
  public checkPassword(password: string, opts: { allowUnsafe?: boolean } = {}): PasswordCheck {
    return this.policy.validate(password, opts);
  }

  /**
   * Encrypt a document into a token.
   *
   * @throws {@link WeakPasswordError} unless the password passes the policy or `allowUnsafe` is set.
   * @throws {@link ValidationError} if the token would exceed `MAX_TOKEN_CHARS`, which no decoder accepts.
   */
  public async encrypt(document: string, password: string, opts: EncryptOptions = {}): Promise<string> {
    if (typeof document !== "string") {
      throw new ValidationError("document must be a string");
    }
    this.policy.assertAcceptable(password, { allowUnsafe: opts.allowUnsafe });
    if (opts.allowUnsafe && !this.policy.validate(password).ok) {
      this.logger.warn("password policy bypassed");
    }

    const format = getFormat(opts.version ?? this.formatVersion);
    const version = format.version;
    const bytes = new TextEncoder().encode(document).byteLength;
    if (encodedTokenLength(version, bytes + format.tagLength) > SP_CONSTANTS.MAX_TOKEN_CHARS) {
      throw new ValidationError(
        `Document too large: its token would exceed ${SP_CONSTANTS.MAX_TOKEN_CHARS} characters`
      );
    }
    const started = Date.now();
    const token = await Envelope.seal(this.cipher, document, password, { version });
    this.logger.debug({ version, chars: document.length, ms: Date.now() - started }, "document sealed");
    return token;
  }

  /**
   * Decrypt a token.
   *
   * @throws {@link MalformedTokenError} if the token does not parse.
   * @throws {@link AuthFailureError} on a wrong password or an altered token.
   */
  public async decrypt(token: string, password: string): Promise<string> {
    const started = Date.now();
    const plaintext = await Envelope.open(this.cipher, token, password);
    this.logger.debug({ chars: plaintext.length, ms: Date.now() - started }, "document opened");
    return plaintext;
  }

  /** Decrypt the payload embedded in a page generated by {@link protect}. */
  public async decryptPage(html: string, password: string): Promise<string> {
    return this.decrypt(extractToken(html), password);
  }

  /** Recover the token from a generated page. */
  public extractToken(html: string): string {
    return extractToken(html);
  }

  /** Markdown → standalone HTML document, optionally styled and minified. */
  public async convert(markdown: string, opts: ConvertOptions = {}): Promise<string> {
    const html = await renderMarkdown(markdown, { style: opts.style, title: opts.title });
    return this.finish(html, opts.minify);
  }

  /**
   * Render (Markdown) or style (HTML) the source, encrypt it and embed the token in a static page.
   *
   * @returns The page, the token inside it and the title shown on the prompt.
   */
  public async protect(source: DocumentSource, password: string, opts: ProtectOptions = {}): Promise<ProtectedDocument> {
    this.policy.assertAcceptable(password, { allowUnsafe: opts.allowUnsafe });

    const document =
      source.kind === "markdown"
        ? await this.convert(source.content, opts)
        : await this.finish(injectStyle(source.content, opts.style ?? ""), opts.minify);
    const title = opts.title ?? extractTitle(document);

    const token = await this.encrypt(document, password, opts);
    const html = await this.finish(wrap({ token, title, style: opts.style }), opts.minify);
    this.logger.info({ kind: source.kind, title, chars: html.length }, "protected page generated");
    return { html, token, title };
  }

  private async finish(html: string, minify: boolean | undefined): Promise<string> {
    return (minify ?? this.minify) ? minifyHtml(html) : html;
  }
}
