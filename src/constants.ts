export const VAULT_CONSTANTS = {
  // AES-GCM
  AES: {
    NAME: "AES-GCM" as const,
    LENGTH: 256 as const,
    IV_LENGTH: 12 as const, // 96-bit nonce
    TAG_LENGTH: 16 as const
  },

  // Argon2id. Changing any of these invalidates every stored hash and blob.
  ARGON2: {
    ITERATIONS: 1,
    MEMORY_KIB: 64 * 1024,
    PARALLELISM: 4,
    HASH_LEN: 32 // 256-bit
  },

  // Salt for Argon2
  SALT_LEN: 16,

  // Config store keys
  CONFIG_KEYS: {
    SALT: "master_salt",
    HASH: "master_hash"
  }
};
