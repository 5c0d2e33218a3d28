import { webcrypto } from "node:crypto";
import { argon2idAsync } from "@noble/hashes/argon2";
import { VAULT_CONSTANTS } from "../constants";
import { CryptoError, ValidationError } from "../errors";
import type { KdfParams } from "../types";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { asArrayBuffer, constantTimeEqual, getRandomBytes, wipe } from "../utils/bytes";

export const DEFAULT_KDF_PARAMS: Readonly<KdfParams> = Object.freeze({
  iterations: VAULT_CONSTANTS.ARGON2.ITERATIONS,
  memoryKiB: VAULT_CONSTANTS.ARGON2.MEMORY_KIB,
  parallelism: VAULT_CONSTANTS.ARGON2.PARALLELISM
});

export function generateSalt(): Uint8Array {
  return getRandomBytes(VAULT_CONSTANTS.SALT_LEN);
}

function assertSalt(salt: Uint8Array): void {
  if (!(salt instanceof Uint8Array) || salt.byteLength !== VAULT_CONSTANTS.SALT_LEN) {
    throw new ValidationError(`Salt must be Uint8Array of length ${VAULT_CONSTANTS.SALT_LEN}`);
  }
}

function assertParams(params: KdfParams): void {
  const { iterations, memoryKiB, parallelism } = params;
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new ValidationError("iterations must be a positive integer");
  }
  if (!Number.isInteger(parallelism) || parallelism < 1) {
    throw new ValidationError("parallelism must be a positive integer");
  }
  // Argon2 needs at least 8 KiB per lane.
  if (!Number.isInteger(memoryKiB) || memoryKiB < 8 * parallelism) {
    throw new ValidationError(`memoryKiB must be an integer >= ${8 * parallelism}`);
  }
}

/**
 * Runs Argon2id over (password, salt) and returns the raw 32-byte output.
 *
 * Deterministic for identical inputs. The empty password is accepted; whether it
 * is allowed is a caller decision. The async variant yields to the event loop
 * while it works, so derivation does not freeze other tasks on the loop.
 */
export async function deriveKeyBytes(
  password: string,
  salt: Uint8Array,
  params: KdfParams = DEFAULT_KDF_PARAMS
): Promise<Uint8Array> {
  if (typeof password !== "string") {
    throw new ValidationError("Password must be a string");
  }
  assertSalt(salt);
  assertParams(params);

  let hash: Uint8Array;
  try {
    hash = await argon2idAsync(new TextEncoder().encode(password), salt, {
      t: params.iterations,
      m: params.memoryKiB,
      p: params.parallelism,
      dkLen: VAULT_CONSTANTS.ARGON2.HASH_LEN
    });
  } catch (e) {
    throw new CryptoError(`Argon2 derivation failed: ${(e as Error)?.message ?? e}`);
  }

  if (hash.byteLength !== VAULT_CONSTANTS.ARGON2.HASH_LEN) {
    throw new CryptoError(
      `Argon2 returned invalid hash size (expected ${VAULT_CONSTANTS.ARGON2.HASH_LEN} bytes)`
    );
  }
  return hash;
}

/** Imports 32 raw bytes as a non-extractable AES-256-GCM key. */
export async function importAesKey(raw: Uint8Array): Promise<webcrypto.CryptoKey> {
  if (!(raw instanceof Uint8Array) || raw.byteLength !== VAULT_CONSTANTS.ARGON2.HASH_LEN) {
    throw new ValidationError(`Key must be ${VAULT_CONSTANTS.ARGON2.HASH_LEN} bytes`);
  }
  try {
    return await webcrypto.subtle.importKey(
      "raw",
      asArrayBuffer(raw),
      { name: VAULT_CONSTANTS.AES.NAME, length: VAULT_CONSTANTS.AES.LENGTH },
      false,
      ["encrypt", "decrypt"]
    );
  } catch (e) {
    throw new CryptoError(`Failed to import derived key: ${(e as Error)?.message ?? e}`);
  }
}

/** Derives the session key and imports it; the intermediate bytes are zeroed. */
export async function deriveKey(
  password: string,
  salt: Uint8Array,
  params: KdfParams = DEFAULT_KDF_PARAMS
): Promise<webcrypto.CryptoKey> {
  const raw = await deriveKeyBytes(password, salt, params);
  try {
    return await importAesKey(raw);
  } finally {
    wipe(raw);
  }
}

/**
 * Verification hash for the master password, base64-encoded.
 *
 * This is the same derivation as {@link deriveKey}: the stored hash is the
 * encryption key in base64. Kept that way so existing installations stay readable.
 */
export async function hashPassword(
  password: string,
  salt: Uint8Array,
  params: KdfParams = DEFAULT_KDF_PARAMS
): Promise<string> {
  const raw = await deriveKeyBytes(password, salt, params);
  try {
    return bytesToBase64(raw);
  } finally {
    wipe(raw);
  }
}

/** Constant-time check of `password` against a stored hash. Undecodable hashes never match. */
export async function verifyPassword(
  password: string,
  salt: Uint8Array,
  storedHash: string,
  params: KdfParams = DEFAULT_KDF_PARAMS
): Promise<boolean> {
  const raw = await deriveKeyBytes(password, salt, params);
  try {
    return matchesStoredHash(raw, storedHash);
  } finally {
    wipe(raw);
  }
}

/** @internal Compares already-derived bytes with a stored base64 hash. */
export function matchesStoredHash(derived: Uint8Array, storedHash: string): boolean {
  let decoded: Uint8Array;
  try {
    decoded = base64ToBytes(storedHash);
  } catch {
    return false;
  }
  return constantTimeEqual(derived, decoded);
}
