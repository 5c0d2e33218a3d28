import { FAST_KDF, ZERO_SALT, fixedKeyBytes } from "../setup";
import { DecryptionError, LockedError, ValidationError } from "../../src/errors";
import { Vault } from "../../src/vault/Vault";

describe("Vault", () => {
  it("round-trips the documented scenario", async () => {
    const k1 = await Vault.fromPassword("correct horse", ZERO_SALT, FAST_KDF);
    const blob = await k1.encrypt("db-secret-123");
    await expect(k1.decrypt(blob)).resolves.toBe("db-secret-123");

    const k2 = await Vault.fromPassword("wrong horse", ZERO_SALT, FAST_KDF);
    await expect(k2.decrypt(blob)).rejects.toBeInstanceOf(DecryptionError);
  });

  it("two vaults from the same password and salt read each other's blobs", async () => {
    const a = await Vault.fromPassword("correct horse", ZERO_SALT, FAST_KDF);
    const b = await Vault.fromPassword("correct horse", ZERO_SALT, FAST_KDF);
    await expect(b.decrypt(await a.encrypt("shared"))).resolves.toBe("shared");
  });

  it("leaves the caller's key bytes untouched", async () => {
    const raw = fixedKeyBytes(9);
    await Vault.fromKeyBytes(raw);
    expect(Array.from(raw)).toEqual(new Array(32).fill(9));
  });

  it("rejects key material that is not 32 bytes", async () => {
    await expect(Vault.fromKeyBytes(new Uint8Array(16))).rejects.toBeInstanceOf(ValidationError);
  });

  it("refuses to work after destroy()", async () => {
    const v = await Vault.fromKeyBytes(fixedKeyBytes());
    const blob = await v.encrypt("db-secret-123");
    expect(v.isDestroyed()).toBe(false);

    v.destroy();
    expect(v.isDestroyed()).toBe(true);
    await expect(v.encrypt("x")).rejects.toBeInstanceOf(LockedError);
    await expect(v.decrypt(blob)).rejects.toBeInstanceOf(LockedError);
  });
});
