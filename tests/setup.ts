import type { KdfParams, ConfigStore } from "../src/types";

/** Cheap Argon2id profile so lifecycle specs stay fast. Never used outside tests. */
export const FAST_KDF: KdfParams = { iterations: 1, memoryKiB: 64, parallelism: 4 };

/** Fixed all-zero salt for deterministic scenarios. */
export const ZERO_SALT = new Uint8Array(16);

/** A fixed 32-byte key for cipher specs that do not need a derivation. */
export function fixedKeyBytes(fill = 7): Uint8Array {
  return new Uint8Array(32).fill(fill);
}

/** ConfigStore whose reads or writes fail on demand. */
export class FlakyConfigStore implements ConfigStore {
  private map = new Map<string, string>();
  failReads = false;
  failWritesFor: string | null = null;

  constructor(initial?: Record<string, string>) {
    if (initial) for (const [k, v] of Object.entries(initial)) this.map.set(k, v);
  }

  async get(key: string): Promise<string | null> {
    if (this.failReads) throw new Error("disk read failed");
    return this.map.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    if (this.failWritesFor === key) throw new Error(`disk write failed: ${key}`);
    this.map.set(key, value);
  }

  has(key: string): boolean {
    return this.map.has(key);
  }
}
