export const STRONG_PASSWORD = "Tr0ub4dor&3";

/** Deterministic, non-zero bytes for salts and nonces in known-answer tests. */
export function fixedBytes(length: number, seed: number): Uint8Array {
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i++) out[i] = (seed + i * 7) & 0xff;
  return out;
}

/** Resolves to whatever the promise rejected with, or null if it resolved. */
export async function captureError(p: Promise<unknown>): Promise<unknown> {
  return p.then(
    () => null,
    (e: unknown) => e
  );
}
