import { SP_CONSTANTS } from "../constants";
import { MalformedTokenError, ValidationError } from "../errors";
import { createDecryptionEngine, mountDecryptor, openToken, type RuntimeConfig } from "../client/runtime";
import { escapeHtml, escapeStyle } from "../document/html";
import { publishedFormats } from "../payload/FormatRegistry";
import { safeParseJson, toScriptJson } from "../utils/json";
import { renderTemplate } from "./template";

export interface WrapInput {
  token: string;
  title: string;
  /** CSS for the prompt page, usually the same sheet the document uses. */
  style?: string;
}

const TOKEN_CHARS_RE = /^[0-9A-Za-z+/=.]+$/;

const PAYLOAD_RE = new RegExp(
  `<script\\b[^>]*\\bid=["']?${SP_CONSTANTS.PAYLOAD_ELEMENT_ID}["']?[^>]*>([\\s\\S]*?)</script>`,
  "i"
);

export function buildRuntimeConfig(token: string): RuntimeConfig {
  return {
    token,
    maxTokenChars: SP_CONSTANTS.MAX_TOKEN_CHARS,
    formats: publishedFormats(),
    messages: { failure: SP_CONSTANTS.MESSAGES.FAILURE, working: SP_CONSTANTS.MESSAGES.WORKING }
  };
}

/**
 * Inline script for the artifact: the runtime functions by source text, then
 * the bootstrap that reads the payload element and mounts the prompt.
 */
export function buildRuntimeScript(): string {
  const source = [
    "(function () {",
    '"use strict";',
    `var openToken = ${openToken.toString()};`,
    `var createDecryptionEngine = ${createDecryptionEngine.toString()};`,
    `var mountDecryptor = ${mountDecryptor.toString()};`,
    `var payload = document.getElementById(${JSON.stringify(SP_CONSTANTS.PAYLOAD_ELEMENT_ID)});`,
    "if (!payload || !window.crypto || !window.crypto.subtle) return;",
    "mountDecryptor(document, JSON.parse(payload.textContent), {",
    "  subtle: window.crypto.subtle,",
    "  openToken: openToken,",
    "  createDecryptionEngine: createDecryptionEngine,",
    "  render: function (html) { document.open(); document.write(html); document.close(); }",
    "});",
    "})();"
  ].join("\n");
  return source.replace(/<\/(script)/gi, "<\\/$1");
}

/** Pure templating: the token is carried verbatim, nothing is encrypted here. */
export function wrap(input: WrapInput): string {
  if (typeof input.token !== "string" || !TOKEN_CHARS_RE.test(input.token)) {
    throw new ValidationError("Token must be a non-empty base64 token string");
  }
  return renderTemplate({
    title: escapeHtml(input.title),
    style: input.style ? escapeStyle(input.style) : "",
    payloadJson: toScriptJson(buildRuntimeConfig(input.token)),
    runtime: buildRuntimeScript()
  });
}

/**
 * Recovers the token from a page produced by {@link wrap}.
 * @throws {@link MalformedTokenError} if the page carries no payload.
 */
export function extractToken(html: string): string {
  const match = PAYLOAD_RE.exec(html);
  if (!match) {
    throw new MalformedTokenError("No protected payload found in document");
  }

  let config: unknown;
  try {
    config = safeParseJson(match[1] ?? "");
  } catch {
    throw new MalformedTokenError("Protected payload is not valid JSON");
  }

  if (typeof config !== "object" || config === null || !("token" in config) || typeof config.token !== "string") {
    throw new MalformedTokenError("Protected payload has no token");
  }
  return config.token;
}
