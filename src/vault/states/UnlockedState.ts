import { State } from "./BaseState";
import { LockedState } from "./LockedState";
import { ModeError, ValidationError } from "../../errors";
import type { CredentialVault } from "../CredentialVault";
import type { Vault } from "../Vault";
import type { EncryptedBlob } from "../../types";

export class UnlockedState extends State {
  readonly name = "unlocked" as const;

  constructor(context: CredentialVault, private readonly vault: Vault) {
    super(context);
  }

  hasMasterPassword(): boolean {
    return true;
  }

  isLocked(): boolean {
    return false;
  }

  async setMasterPassword(_masterPassword: string, _lockEpoch: number): Promise<void> {
    throw new ModeError("Master password already set");
  }

  /** Re-verifies; on success the held key is replaced, on failure the session stays as it was. */
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

    this.vault.destroy();
    this.context.logger.info("vault unlocked");
    this.transitionTo(new UnlockedState(this.context, vault));
    return true;
  }

  lock(): void {
    this.vault.destroy();
    this.context.logger.info("vault locked");
    this.transitionTo(new LockedState(this.context));
  }

  getVault(): Vault {
    return this.vault;
  }

  encrypt(plaintext: string): Promise<EncryptedBlob> {
    return this.vault.encrypt(plaintext);
  }

  decrypt(blob: EncryptedBlob): Promise<string> {
    return this.vault.decrypt(blob);
  }
}
