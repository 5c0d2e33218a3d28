import { webcrypto } from "node:crypto";
import { FAST_KDF, ZERO_SALT } from "../setup";
import {
  deriveKey,
  deriveKeyBytes,
  generateSalt,
  hashPassword,
  verifyPassword
} from "../../src/crypto/KeyDerivation";
import { RandomSourceError, ValidationError } from "../../src/errors";
import { base64ToBytes, bytesToBase64 } from "../../src/utils/base64";

describe("generateSalt", () => {
  it("returns 16 fresh bytes per call", () => {
    const a = generateSalt();
    const b = generateSalt();
    expect(a).toBeInstanceOf(Uint8Array);
    expect(a.byteLength).toBe(16);
    expect(Buffer.from(a).equals(Buffer.from(b))).toBe(false);
  });

  it("wraps entropy failures as RandomSourceError", () => {
    const spy = jest.spyOn(webcrypto, "getRandomValues").mockImplementation(() => {
      throw new Error("no entropy");
    });
    try {
      expect(() => generateSalt()).toThrow(RandomSourceError);
    } finally {
      spy.mockRestore();
    }
  });
});

describe("deriveKeyBytes", () => {
  it("is deterministic for identical inputs", async () => {
    const a = await deriveKeyBytes("correct horse", ZERO_SALT, FAST_KDF);
    const b = await deriveKeyBytes("correct horse", ZERO_SALT, FAST_KDF);
    expect(a.byteLength).toBe(32);
    expect(Array.from(a)).toEqual(Array.from(b));
  });

  it("changes with the salt", async () => {
    const other = new Uint8Array(16).fill(1);
    const a = await deriveKeyBytes("correct horse", ZERO_SALT, FAST_KDF);
    const b = await deriveKeyBytes("correct horse", other, FAST_KDF);
    expect(Array.from(a)).not.toEqual(Array.from(b));
  });

  it("changes with the password", async () => {
    const a = await deriveKeyBytes("correct horse", ZERO_SALT, FAST_KDF);
    const b = await deriveKeyBytes("wrong horse", ZERO_SALT, FAST_KDF);
    expect(Array.from(a)).not.toEqual(Array.from(b));
  });

  it("accepts the empty password", async () => {
    const out = await deriveKeyBytes("", ZERO_SALT, FAST_KDF);
    expect(out.byteLength).toBe(32);
  });

  it("validates salt length", async () => {
    await expect(deriveKeyBytes("pw", new Uint8Array(8), FAST_KDF)).rejects.toBeInstanceOf(ValidationError);
    await expect(
      deriveKeyBytes("pw", undefined as unknown as Uint8Array, FAST_KDF)
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("rejects unusable cost parameters", async () => {
    await expect(deriveKeyBytes("pw", ZERO_SALT, { ...FAST_KDF, iterations: 0 })).rejects.toBeInstanceOf(ValidationError);
    await expect(deriveKeyBytes("pw", ZERO_SALT, { ...FAST_KDF, parallelism: 1.5 })).rejects.toBeInstanceOf(ValidationError);
    await expect(deriveKeyBytes("pw", ZERO_SALT, { ...FAST_KDF, memoryKiB: 16 })).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("deriveKey", () => {
  it("imports a non-extractable AES-GCM key", async () => {
    const key = await deriveKey("correct horse", ZERO_SALT, FAST_KDF);
    expect(key.algorithm.name).toBe("AES-GCM");
    expect(key.extractable).toBe(false);
    expect([...key.usages].sort()).toEqual(["decrypt", "encrypt"]);
  });
});

describe("hashPassword / verifyPassword", () => {
  it("hash is the base64 of the derived key bytes", async () => {
    const hash = await hashPassword("correct horse", ZERO_SALT, FAST_KDF);
    const raw = await deriveKeyBytes("correct horse", ZERO_SALT, FAST_KDF);
    expect(hash).toBe(bytesToBase64(raw));
    expect(base64ToBytes(hash).byteLength).toBe(32);
  });

  it("accepts the right password and rejects a wrong one", async () => {
    const hash = await hashPassword("correct horse", ZERO_SALT, FAST_KDF);
    await expect(verifyPassword("correct horse", ZERO_SALT, hash, FAST_KDF)).resolves.toBe(true);
    await expect(verifyPassword("wrong horse", ZERO_SALT, hash, FAST_KDF)).resolves.toBe(false);
  });

  it("treats undecodable or truncated hashes as a mismatch", async () => {
    const hash = await hashPassword("correct horse", ZERO_SALT, FAST_KDF);
    await expect(verifyPassword("correct horse", ZERO_SALT, "not-base64!!", FAST_KDF)).resolves.toBe(false);
    await expect(verifyPassword("correct horse", ZERO_SALT, "", FAST_KDF)).resolves.toBe(false);
    const truncated = bytesToBase64(base64ToBytes(hash).subarray(0, 16));
    await expect(verifyPassword("correct horse", ZERO_SALT, truncated, FAST_KDF)).resolves.toBe(false);
  });
});
