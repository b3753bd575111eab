import type { PasswordViolation } from "./types";

export class SealedPageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SealedPageError";
  }
}

export class ValidationError extends SealedPageError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class WeakPasswordError extends SealedPageError {
  constructor(public readonly reasons: readonly PasswordViolation[]) {
    super(`Password rejected: ${reasons.map((r) => r.message).join(" ")}`);
    this.name = "WeakPasswordError";
  }
}

export class MalformedTokenError extends SealedPageError {
  constructor(message = "Malformed protected payload") {
    super(message);
    this.name = "MalformedTokenError";
  }
}

export class AuthFailureError extends SealedPageError {
  constructor(message = "Incorrect password or tampered data") {
    super(message);
    this.name = "AuthFailureError";
  }
}

export class CryptoError extends SealedPageError {
  constructor(message: string) {
    super(message);
    this.name = "CryptoError";
  }
}

export class IOFailureError extends SealedPageError {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = "IOFailureError";
  }
}

export class UnsupportedInputError extends SealedPageError {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedInputError";
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
