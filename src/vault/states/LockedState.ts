import { State } from "./BaseState";
import { UnlockedState } from "./UnlockedState";
import { LockedError, ModeError, ValidationError } from "../../errors";
import type { Vault } from "../Vault";
import type { EncryptedBlob } from "../../types";

export class LockedState extends State {
  readonly name = "locked" as const;

  hasMasterPassword(): boolean {
    return true;
  }

  isLocked(): boolean {
    return true;
  }

  async setMasterPassword(_masterPassword: string, _lockEpoch: number): Promise<void> {
    throw new ModeError("Master password already set");
  }

  async unlock(masterPassword: string, lockEpoch: number): Promise<boolean> {
    if (typeof masterPassword !== "string") {
      throw new ValidationError("masterPassword must be a string");
    }

    const vault = await this.context.openWithPassword(masterPassword);
    if (!vault) {
      this.context.logger.warn("unlock rejected");
      return false;
    }
    if (this.superseded(lockEpoch)) {
      vault.destroy();
      this.context.logger.info("unlock discarded");
      return false;
    }

    this.context.logger.info("vault unlocked");
    this.transitionTo(new UnlockedState(this.context, vault));
    return true;
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
