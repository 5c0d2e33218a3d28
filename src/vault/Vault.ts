import type { webcrypto } from "node:crypto";
import { deriveKeyBytes, DEFAULT_KDF_PARAMS, importAesKey } from "../crypto/KeyDerivation";
import { SecretCipher } from "../crypto/SecretCipher";
import { SessionKeyCache } from "../crypto/SessionKeyCache";
import { LockedError } from "../errors";
import type { EncryptedBlob, KdfParams, SecretCodec } from "../types";
import { wipe } from "../utils/bytes";

/**
 * An unlocked vault: one derived key held in memory, plus encrypt/decrypt.
 *
 * Instances are independent, so tests and callers may hold several at once.
 * The key never changes for the life of the instance; concurrent calls are safe.
 */
export class Vault implements SecretCodec {
  private readonly session = new SessionKeyCache();

  private constructor(key: webcrypto.CryptoKey) {
    this.session.set(key);
  }

  /** Derives the key from `password` and `salt` (Argon2id). */
  static async fromPassword(
    password: string,
    salt: Uint8Array,
    params: KdfParams = DEFAULT_KDF_PARAMS
  ): Promise<Vault> {
    const raw = await deriveKeyBytes(password, salt, params);
    try {
      return await Vault.fromKeyBytes(raw);
    } finally {
      wipe(raw);
    }
  }

  /** Builds a vault around 32 already-derived key bytes. The caller keeps ownership of `raw`. */
  static async fromKeyBytes(raw: Uint8Array): Promise<Vault> {
    return new Vault(await importAesKey(raw));
  }

  isDestroyed(): boolean {
    return !this.session.has();
  }

  async encrypt(plaintext: string): Promise<EncryptedBlob> {
    return this.cipherOrThrow().encrypt(plaintext);
  }

  async decrypt(blob: EncryptedBlob): Promise<string> {
    return this.cipherOrThrow().decrypt(blob);
  }

  /** Drops the key. Later encrypt/decrypt calls throw {@link LockedError}. */
  destroy(): void {
    this.session.clear();
  }

  private cipherOrThrow(): SecretCipher {
    const key = this.session.get();
    if (!key) throw new LockedError("Vault key has been destroyed");
    return new SecretCipher(key);
  }
}
