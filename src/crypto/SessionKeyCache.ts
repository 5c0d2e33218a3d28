import type { webcrypto } from "node:crypto";

/**
 * Holds the session key for one vault. The key is non-extractable and kept
 * only in RAM; clearing drops the reference.
 */
export class SessionKeyCache {
  private key: webcrypto.CryptoKey | null = null;

  set(key: webcrypto.CryptoKey) {
    this.key = key;
  }

  get(): webcrypto.CryptoKey | null {
    return this.key;
  }

  has(): boolean {
    return this.key !== null;
  }

  clear() {
    this.key = null;
  }
}
