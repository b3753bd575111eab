import { SealedPage, type SealedPageOptions } from "./api/SealedPage";

export type {
  SealedPageOptions,
  EncryptOptions,
  ConvertOptions,
  ProtectOptions,
  DocumentSource
} from "./api/SealedPage";
export { SealedPage } from "./api/SealedPage";
export { AuthenticatedCipher } from "./crypto/AuthenticatedCipher";
export { deriveKeyFromPassword, deriveKeyBytes } from "./crypto/KeyDerivation";
export { PasswordPolicy } from "./policy/PasswordPolicy";
export { encodePayload, decodePayload } from "./payload/PayloadCodec";
export { FORMATS, getFormat, publishedFormats, type FormatParams } from "./payload/FormatRegistry";
export { wrap, extractToken } from "./wrapper/WrapperGenerator";
export { renderMarkdown } from "./document/markdown";
export { injectStyle } from "./document/style";
export { extractTitle } from "./document/title";
export { minifyHtml } from "./document/minify";
export { SP_CONSTANTS, POLICY_DEFAULTS, type PasswordPolicyRules } from "./constants";
export * from "./errors";
export type * from "./types";

/**
 * Creates a new {@link SealedPage} instance.
 *
 * @example
 * ```typescript
 * import sealedPage from "sealed-page";
 *
 * const sp = sealedPage({ minify: false });
 * const { html } = await sp.protect({ content: "# Minutes", kind: "markdown" }, "c0rrect-Horse");
 * ```
 */
export default function sealedPage(opts?: SealedPageOptions): SealedPage {
  return new SealedPage(opts);
}
