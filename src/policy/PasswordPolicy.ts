import { POLICY_DEFAULTS, type PasswordPolicyRules } from "../constants";
import { ValidationError, WeakPasswordError } from "../errors";
import type { PasswordCheck, PasswordViolation } from "../types";

export interface ValidateOptions {
  /** Accept a password that breaks the rules. Does not change how it is used. */
  allowUnsafe?: boolean;
}

/**
 * Strength gate run before a password is used for encryption. Decryption never
 * consults it: a page protected with a weak password still opens with it.
 */
export class PasswordPolicy {
  public readonly rules: Readonly<PasswordPolicyRules>;

  constructor(rules?: Partial<PasswordPolicyRules>) {
    this.rules = Object.freeze({ ...POLICY_DEFAULTS, ...rules });
    if (!Number.isInteger(this.rules.minLength) || this.rules.minLength < 1) {
      throw new ValidationError("minLength must be a positive integer");
    }
  }

  /** Pure check; an empty password is reported as a violation, not thrown. */
  validate(password: string, opts: ValidateOptions = {}): PasswordCheck {
    if (typeof password !== "string") {
      throw new ValidationError("Password must be a string");
    }
    if (opts.allowUnsafe) return { ok: true };

    const reasons = this.violations(password);
    return reasons.length === 0 ? { ok: true } : { ok: false, reasons };
  }

  /**
   * @throws {@link ValidationError} for an empty password, even with `allowUnsafe`.
   * @throws {@link WeakPasswordError} listing every violated rule.
   */
  assertAcceptable(password: string, opts: ValidateOptions = {}): void {
    if (typeof password !== "string" || password.length === 0) {
      throw new ValidationError("Password must be a non-empty string");
    }
    const check = this.validate(password, opts);
    if (!check.ok) throw new WeakPasswordError(check.reasons);
  }

  private violations(password: string): PasswordViolation[] {
    const r = this.rules;
    const chars = Array.from(password);
    const out: PasswordViolation[] = [];

    if (chars.length < r.minLength) {
      out.push({ rule: "too-short", message: `Password must be at least ${r.minLength} characters long.` });
    }
    if (r.requireLowercase && !chars.some((c) => c !== c.toUpperCase())) {
      out.push({ rule: "missing-lowercase", message: "Password must contain at least one lowercase letter." });
    }
    if (r.requireUppercase && !chars.some((c) => c !== c.toLowerCase())) {
      out.push({ rule: "missing-uppercase", message: "Password must contain at least one uppercase letter." });
    }
    if (r.requireDigit && !chars.some((c) => c >= "0" && c <= "9")) {
      out.push({ rule: "missing-digit", message: "Password must contain at least one digit." });
    }
    if (r.requireSpecial && !chars.some((c) => r.specialCharacters.includes(c))) {
      out.push({ rule: "missing-special", message: "Password must contain at least one special character." });
    }
    return out;
  }
}
