export const SP_CONSTANTS = {
  CURRENT_FORMAT_VERSION: 2 as const,
  SUPPORTED_VERSIONS: [1, 2] as const,

  // AES-GCM
  AES: {
    NAME: "AES-GCM" as const,
    LENGTH: 256 as const,
    IV_LENGTH: 12 as const, // 96-bit nonce
    TAG_LENGTH: 16 as const // 128-bit tag, appended to the ciphertext
  },

  // PBKDF2 (HMAC-SHA-256)
  PBKDF2: {
    NAME: "PBKDF2" as const,
    HASH: "SHA-256" as const,
    MAX_ITERATIONS: 10_000_000 as const
  },

  // Salt for PBKDF2
  SALT_LEN: 16,

  // Token
  TOKEN_SEPARATOR: ".",
  MAX_TOKEN_CHARS: 64 * 1024 * 1024,

  // Generated page
  PAYLOAD_ELEMENT_ID: "sealed-page-payload",
  DEFAULT_TITLE: "Untitled document",
  MESSAGES: {
    FAILURE: "Incorrect password or corrupted data.",
    WORKING: "Decrypting…"
  },

  // CLI
  ENV: {
    PASSWORD: "SEALED_PAGE_PASSWORD",
    LOG_LEVEL: "SEALED_PAGE_LOG_LEVEL"
  },
  DEFAULT_LOG_LEVEL: "warn"
};

export interface PasswordPolicyRules {
  minLength: number;
  requireLowercase: boolean;
  requireUppercase: boolean;
  requireDigit: boolean;
  requireSpecial: boolean;
  specialCharacters: string;
}

export const POLICY_DEFAULTS: Readonly<PasswordPolicyRules> = Object.freeze({
  minLength: 8,
  requireLowercase: true,
  requireUppercase: true,
  requireDigit: true,
  requireSpecial: true,
  specialCharacters: "!@#$%^&*()-_=+[]{}|;:'\",.<>?/"
});
