import { webcrypto } from "node:crypto";
import { VAULT_CONSTANTS } from "../constants";
import { CryptoError, DecryptionError, MalformedBlobError, ValidationError } from "../errors";
import type { EncryptedBlob, SecretCodec } from "../types";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { asArrayBuffer, getRandomBytes } from "../utils/bytes";

// With the u flag a well-formed pair is one code point, so only unpaired halves match.
const LONE_SURROGATE = /[\uD800-\uDFFF]/u;

/**
 * AES-256-GCM over individual secret strings.
 *
 * Blob layout: `base64(nonce[12] || ciphertext || tag[16])`, no AAD.
 * Empty strings pass through unencrypted in both directions.
 * Blob size is bounded only by the plaintext: whatever `encrypt` produced, `decrypt` accepts.
 */
export class SecretCipher implements SecretCodec {
  constructor(private readonly key: webcrypto.CryptoKey) {
    this.assertKey(key);
  }

  /**
   * @throws {@link ValidationError} If `plaintext` holds a lone UTF-16 surrogate, which UTF-8 cannot carry.
   */
  async encrypt(plaintext: string): Promise<EncryptedBlob> {
    if (typeof plaintext !== "string") throw new ValidationError("Plaintext must be a string");
    if (plaintext.length === 0) return "";
    if (LONE_SURROGATE.test(plaintext)) {
      throw new ValidationError("Plaintext contains an unpaired surrogate");
    }

    // Fresh nonce per call; RandomSourceError propagates as is.
    const iv = getRandomBytes(VAULT_CONSTANTS.AES.IV_LENGTH);

    let ct: ArrayBuffer;
    try {
      ct = await webcrypto.subtle.encrypt(
        { name: VAULT_CONSTANTS.AES.NAME, iv: asArrayBuffer(iv) },
        this.key,
        asArrayBuffer(new TextEncoder().encode(plaintext))
      );
    } catch (e) {
      throw new CryptoError(`Encryption failed: ${(e as Error)?.message ?? e}`);
    }

    const out = new Uint8Array(iv.byteLength + ct.byteLength);
    out.set(iv, 0);
    out.set(new Uint8Array(ct), iv.byteLength);
    return bytesToBase64(out);
  }

  async decrypt(blob: EncryptedBlob): Promise<string> {
    if (typeof blob !== "string") throw new ValidationError("Blob must be a string");
    if (blob.length === 0) return "";

    let data: Uint8Array;
    try {
      data = base64ToBytes(blob, Infinity);
    } catch {
      throw new MalformedBlobError("Encrypted value is not valid base64");
    }
    if (data.byteLength < VAULT_CONSTANTS.AES.IV_LENGTH) {
      throw new MalformedBlobError("Encrypted value is shorter than the nonce");
    }

    const iv = data.subarray(0, VAULT_CONSTANTS.AES.IV_LENGTH);
    const ct = data.subarray(VAULT_CONSTANTS.AES.IV_LENGTH);

    let pt: ArrayBuffer;
    try {
      pt = await webcrypto.subtle.decrypt(
        { name: VAULT_CONSTANTS.AES.NAME, iv: asArrayBuffer(iv) },
        this.key,
        asArrayBuffer(ct)
      );
    } catch {
      throw new DecryptionError();
    }
    return new TextDecoder().decode(pt);
  }

  private assertKey(key: webcrypto.CryptoKey): void {
    if (!key || key.algorithm?.name !== VAULT_CONSTANTS.AES.NAME) {
      throw new ValidationError(`Invalid key algorithm; expected ${VAULT_CONSTANTS.AES.NAME}`);
    }
    for (const u of ["encrypt", "decrypt"] as const) {
      if (!key.usages.includes(u)) {
        throw new ValidationError(`Key missing "${u}" usage`);
      }
    }
  }
}
