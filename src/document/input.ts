import { extname } from "node:path";
import { UnsupportedInputError } from "../errors";
import type { InputKind } from "../types";

const KINDS: Record<string, InputKind> = {
  ".md": "markdown",
  ".markdown": "markdown",
  ".html": "html",
  ".htm": "html"
};

export function inferInputKind(path: string): InputKind {
  const ext = extname(path).toLowerCase();
  const kind = KINDS[ext];
  if (!kind) {
    throw new UnsupportedInputError(
      `Unsupported file type "${ext || "(none)"}"; only .md and .html are supported`
    );
  }
  return kind;
}
