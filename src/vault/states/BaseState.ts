import type { CredentialVault } from "../CredentialVault";
import type { Vault } from "../Vault";
import type { EncryptedBlob } from "../../types";

export abstract class State {
  constructor(protected context: CredentialVault) {}

  abstract readonly name: "initial" | "uninitialized" | "locked" | "unlocked";

  abstract hasMasterPassword(): boolean;
  abstract isLocked(): boolean;
  /** `lockEpoch` is the context's lock count when the caller started; see {@link State.superseded}. */
  abstract setMasterPassword(masterPassword: string, lockEpoch: number): Promise<void>;
  abstract unlock(masterPassword: string, lockEpoch: number): Promise<boolean>;
  abstract lock(): void;
  abstract getVault(): Vault;
  abstract encrypt(plaintext: string): Promise<EncryptedBlob>;
  abstract decrypt(blob: EncryptedBlob): Promise<string>;

  protected transitionTo(state: State): void {
    this.context.transitionTo(state);
  }

  /** True once another transition or a `lock()` happened after the call that captured `lockEpoch`. */
  protected superseded(lockEpoch: number): boolean {
    return !this.context.isCurrent(this) || this.context.lockEpoch !== lockEpoch;
  }
}
