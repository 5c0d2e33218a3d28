import { timingSafeEqual, webcrypto } from "node:crypto";
import { RandomSourceError } from "../errors";

export function asArrayBuffer(u8: Uint8Array): ArrayBuffer {
  const out = new ArrayBuffer(u8.byteLength);
  new Uint8Array(out).set(u8);
  return out;
}

/** Fresh bytes from the platform CSPRNG. Never a counter, never cached. */
export function getRandomBytes(length: number): Uint8Array {
  const out = new Uint8Array(length);
  try {
    webcrypto.getRandomValues(out);
  } catch (e) {
    throw new RandomSourceError(`Secure random source unavailable: ${(e as Error)?.message ?? e}`);
  }
  return out;
}

/** Length mismatch returns false up front; equal lengths compare in constant time. */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  return timingSafeEqual(a, b);
}

export function wipe(u8: Uint8Array): void {
  u8.fill(0);
}
