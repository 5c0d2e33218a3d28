import { CredentialVault, type CredentialVaultOptions } from "./vault/CredentialVault";

export type { CredentialVaultOptions } from "./vault/CredentialVault";
export { CredentialVault } from "./vault/CredentialVault";
export { Vault } from "./vault/Vault";
export { SecretCipher } from "./crypto/SecretCipher";
export {
  DEFAULT_KDF_PARAMS,
  deriveKey,
  deriveKeyBytes,
  generateSalt,
  hashPassword,
  importAesKey,
  verifyPassword
} from "./crypto/KeyDerivation";
export { MemoryConfigStore } from "./storage/MemoryConfigStore";
export { SqliteConfigStore } from "./storage/SqliteConfigStore";
export { SECRET_FIELDS, openProfile, sealProfile } from "./profiles/ProfileSecrets";
export type { OpenedProfile, SecretField } from "./profiles/ProfileSecrets";
export { createConsoleLogger, createMemoryLogger, silentLogger } from "./utils/logger";
export type { LogEntry, LogLevel, Logger, MemoryLogger } from "./utils/logger";
export { VAULT_CONSTANTS } from "./constants";
export * from "./errors";
export type * from "./types";

/**
 * Creates a {@link CredentialVault} and starts reading the store.
 *
 * @example
 * ```typescript
 * import createCredentialVault, { SqliteConfigStore } from 'db-credential-vault';
 *
 * const vault = createCredentialVault({ store: SqliteConfigStore.open("/home/me/.config/dbclient/app.db") });
 *
 * async function main() {
 *   if (!(await vault.hasMasterPassword())) {
 *     await vault.setMasterPassword("correct horse battery staple");
 *   } else if (!(await vault.unlock("correct horse battery staple"))) {
 *     throw new Error("Wrong master password");
 *   }
 *   const blob = await vault.encrypt("db-password");
 *   console.log(await vault.decrypt(blob)); // "db-password"
 * }
 *
 * main();
 * ```
 */
export default function createCredentialVault(opts: CredentialVaultOptions): CredentialVault {
  return new CredentialVault(opts);
}
