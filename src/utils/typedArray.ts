// src/utils/typedArray.ts

/** Realm-independent `instanceof Uint8Array` (test runners and iframes have their own intrinsics). */
export function isBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array || (ArrayBuffer.isView(value) && value.constructor.name === "Uint8Array");
}

/**
 * Fresh Uint8Array over its own ArrayBuffer. WebCrypto receives views, never
 * bare ArrayBuffers: a view is accepted whichever realm created it.
 */
export function toBufferSource(u8: Uint8Array) {
  const copy = new Uint8Array(u8.byteLength);
  copy.set(u8);
  return copy;
}
