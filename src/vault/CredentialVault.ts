/**
 * Master-password session for stored connection secrets.
 *
 * @packageDocumentation
 *
 * @remarks
 * - States: **uninitialized** (no master password yet), **locked** (password set, key not in memory)
 *   and **unlocked** (a {@link Vault} holds the derived key).
 * - Persistence: only the salt and the verification hash, written to the injected {@link ConfigStore}
 *   under `master_salt` / `master_hash`. Ciphertext blobs are stored by the caller.
 *
 * - Error taxonomy:
 *   - {@link ValidationError} : bad inputs, stored salt that cannot be decoded.
 *   - {@link ModeError} : wrong lifecycle step (setting a second master password, unlocking before one is set).
 *   - {@link LockedError} : encrypt/decrypt without an unlocked session.
 *   - {@link MalformedBlobError} / {@link DecryptionError} : see {@link SecretCipher}.
 *   - Store errors propagate unchanged.
 *
 * A wrong password at unlock is not an error: {@link CredentialVault.unlock} resolves `false`.
 */

import { VAULT_CONSTANTS } from "../constants";
import { deriveKeyBytes, DEFAULT_KDF_PARAMS, generateSalt, matchesStoredHash } from "../crypto/KeyDerivation";
import { LockedError, ValidationError } from "../errors";
import type { ConfigStore, EncryptedBlob, KdfParams, SecretCodec } from "../types";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { wipe } from "../utils/bytes";
import { silentLogger, type Logger } from "../utils/logger";
import { Vault } from "./Vault";
import { State } from "./states/BaseState";
import { InitialState } from "./states/InitialState";

/**
 * Configuration for {@link CredentialVault}.
 */
export interface CredentialVaultOptions {
  /** Where the salt and verification hash live. */
  store: ConfigStore;

  /** Receives lifecycle events. Never sees passwords, keys or plaintexts. Defaults to a silent logger. */
  logger?: Logger;

  /**
   * Argon2id cost override.
   *
   * @remarks
   * Hashes and blobs written under one set of parameters cannot be read under another.
   * Meant for tests; production installations use {@link DEFAULT_KDF_PARAMS}.
   */
  kdfParams?: KdfParams;

  /** @defaultValue `"master_salt"` */
  saltKey?: string;

  /** @defaultValue `"master_hash"` */
  hashKey?: string;
}

/**
 * Session orchestrator. Pass the instance (or the {@link Vault} from {@link getVault})
 * to whatever needs encrypt/decrypt; there is no process-wide vault.
 *
 * @example
 * const vault = new CredentialVault({ store: SqliteConfigStore.open(dbPath) });
 * if (!(await vault.hasMasterPassword())) {
 *   await vault.setMasterPassword(password);
 * } else if (!(await vault.unlock(password))) {
 *   // wrong password
 * }
 * const blob = await vault.encrypt("db-password");
 */
export class CredentialVault implements SecretCodec {
  /** @internal Backing state machine (Initial → Uninitialized|Locked → Unlocked). */
  private state: State;

  /** @internal Resolves after InitialState.initialize(). All public async methods await this barrier. */
  private ready: Promise<void>;

  /** @internal Bumped by every lock(); pending setup/unlock calls compare against it. */
  private lockCount = 0;

  /** @internal */
  public readonly store: ConfigStore;

  /** @internal */
  public readonly logger: Logger;

  /** @internal */
  public readonly kdfParams: KdfParams;

  /** @internal */
  public readonly saltKey: string;

  /** @internal */
  public readonly hashKey: string;

  constructor(opts: CredentialVaultOptions) {
    this.store = opts.store;
    this.logger = opts.logger ?? silentLogger;
    this.kdfParams = opts.kdfParams ?? DEFAULT_KDF_PARAMS;
    this.saltKey = opts.saltKey ?? VAULT_CONSTANTS.CONFIG_KEYS.SALT;
    this.hashKey = opts.hashKey ?? VAULT_CONSTANTS.CONFIG_KEYS.HASH;

    const initial = new InitialState(this);
    this.state = initial;
    this.ready = initial.initialize();
    // Awaiting methods still see the rejection; this only records it.
    this.ready.catch((e: unknown) => {
      this.logger.error("vault initialization failed", { error: (e as Error)?.message ?? String(e) });
    });
  }

  /** @internal State transition helper (do not call directly). */
  public transitionTo(state: State): void {
    this.state = state;
  }

  /** @internal */
  public isCurrent(state: State): boolean {
    return this.state === state;
  }

  /** @internal */
  public get lockEpoch(): number {
    return this.lockCount;
  }

  /**
   * Waits for the initial store read.
   *
   * @throws Whatever the store threw while reading the hash.
   */
  public async initialize(): Promise<void> {
    await this.ready;
  }

  /** `true` once a master password exists in the store. */
  public async hasMasterPassword(): Promise<boolean> {
    await this.ready;
    return this.state.hasMasterPassword();
  }

  /**
   * `true` unless a vault key is held in memory.
   *
   * @remarks
   * Synchronous; before initialization completes it reports `true`.
   */
  public isLocked(): boolean {
    return this.state.name === "initial" ? true : this.state.isLocked();
  }

  /**
   * First-run setup: generates a salt, stores salt and hash, keeps the session unlocked.
   *
   * @throws {@link ValidationError} If the password is empty.
   * @throws {@link ModeError} If a master password already exists or another setup is in flight.
   * @throws {@link RandomSourceError} If no salt could be generated.
   *
   * @remarks
   * A {@link lock} issued while setup is pending still persists the password but leaves the session locked.
   */
  public async setMasterPassword(masterPassword: string): Promise<void> {
    const epoch = this.lockCount;
    await this.ready;
    return this.state.setMasterPassword(masterPassword, epoch);
  }

  /**
   * Verifies `masterPassword` against the stored hash.
   *
   * @returns `true` and an unlocked session on match; `false` otherwise (state unchanged).
   * Also `false` when a {@link lock} or another unlock landed while this one was deriving;
   * the key it derived is then discarded.
   * @throws {@link ModeError} If no master password has been set.
   * @throws {@link ValidationError} If the stored salt is unreadable.
   */
  public async unlock(masterPassword: string): Promise<boolean> {
    const epoch = this.lockCount;
    await this.ready;
    return this.state.unlock(masterPassword, epoch);
  }

  /** Drops the in-memory key and cancels pending unlocks. No-op on the key unless unlocked. */
  public lock(): void {
    this.lockCount++;
    if (this.state.name === "initial") return;
    this.state.lock();
  }

  /**
   * The unlocked {@link Vault}, for handing to components that only need encrypt/decrypt.
   *
   * @throws {@link LockedError} If locked.
   */
  public getVault(): Vault {
    if (this.state.name === "initial") throw new LockedError();
    return this.state.getVault();
  }

  public async encrypt(plaintext: string): Promise<EncryptedBlob> {
    await this.ready;
    return this.state.encrypt(plaintext);
  }

  public async decrypt(blob: EncryptedBlob): Promise<string> {
    await this.ready;
    return this.state.decrypt(blob);
  }

  /**
   * @internal Generates and persists salt + hash, returns the vault for the new key.
   *
   * The salt is written before the hash; a failed hash write leaves the store without a
   * master password, so the next attempt starts over with a fresh salt.
   */
  public async createMasterPassword(masterPassword: string): Promise<Vault> {
    const salt = generateSalt();
    const raw = await deriveKeyBytes(masterPassword, salt, this.kdfParams);
    try {
      await this.store.set(this.saltKey, bytesToBase64(salt));
      await this.store.set(this.hashKey, bytesToBase64(raw));
      return await Vault.fromKeyBytes(raw);
    } finally {
      wipe(raw);
    }
  }

  /**
   * @internal Reads salt + hash and derives once; the verification hash and the key are the
   * same bytes, so a match yields the vault directly.
   *
   * @returns The vault on match, `null` otherwise.
   */
  public async openWithPassword(masterPassword: string): Promise<Vault | null> {
    const salt = await this.readSalt();
    const storedHash = (await this.store.get(this.hashKey)) ?? "";

    const raw = await deriveKeyBytes(masterPassword, salt, this.kdfParams);
    try {
      if (!matchesStoredHash(raw, storedHash)) return null;
      return await Vault.fromKeyBytes(raw);
    } finally {
      wipe(raw);
    }
  }

  private async readSalt(): Promise<Uint8Array> {
    const saltB64 = await this.store.get(this.saltKey);
    if (!saltB64) {
      throw new ValidationError(`Missing "${this.saltKey}" in config store`);
    }
    let salt: Uint8Array;
    try {
      salt = base64ToBytes(saltB64);
    } catch {
      throw new ValidationError(`Stored "${this.saltKey}" is not valid base64`);
    }
    if (salt.byteLength !== VAULT_CONSTANTS.SALT_LEN) {
      throw new ValidationError(`Stored "${this.saltKey}" must decode to ${VAULT_CONSTANTS.SALT_LEN} bytes`);
    }
    return salt;
  }
}
