import { webcrypto as nodeCrypto } from "node:crypto";

if (!globalThis.crypto || !globalThis.crypto.subtle) {
  Object.defineProperty(globalThis, "crypto", { value: nodeCrypto, configurable: true });
}
