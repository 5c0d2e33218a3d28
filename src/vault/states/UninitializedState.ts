import { State } from "./BaseState";
import { LockedState } from "./LockedState";
import { UnlockedState } from "./UnlockedState";
import { LockedError, ModeError, ValidationError } from "../../errors";
import type { Vault } from "../Vault";
import type { EncryptedBlob } from "../../types";

/** First run: no verification hash stored yet. */
export class UninitializedState extends State {
  readonly name = "uninitialized" as const;

  private pending: Promise<Vault> | null = null;

  hasMasterPassword(): boolean {
    return false;
  }

  isLocked(): boolean {
    return true;
  }

  async setMasterPassword(masterPassword: string, lockEpoch: number): Promise<void> {
    if (typeof masterPassword !== "string" || masterPassword.length === 0) {
      throw new ValidationError("masterPassword must be a non-empty string");
    }
    if (this.pending) {
      throw new ModeError("Master password setup already in progress");
    }

    this.pending = this.context.createMasterPassword(masterPassword);
    let vault: Vault;
    try {
      vault = await this.pending;
    } finally {
      this.pending = null;
    }
    this.context.logger.info("master password set");

    // Password is persisted either way; a lock() during setup wins over staying unlocked.
    if (this.superseded(lockEpoch)) {
      vault.destroy();
      this.transitionTo(new LockedState(this.context));
      return;
    }
    this.transitionTo(new UnlockedState(this.context, vault));
  }

  async unlock(_masterPassword: string, _lockEpoch: number): Promise<boolean> {
    throw new ModeError("No master password set; use setMasterPassword()");
  }

  lock(): void {
    // No-op
  }

  getVault(): Vault {
    throw new LockedError();
  }

  async encrypt(_plaintext: string): Promise<EncryptedBlob> {
    throw new LockedError();
  }

  async decrypt(_blob: EncryptedBlob): Promise<string> {
    throw new LockedError();
  }
}
