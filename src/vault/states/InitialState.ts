import { State } from "./BaseState";
import { LockedState } from "./LockedState";
import { UninitializedState } from "./UninitializedState";
import type { Vault } from "../Vault";
import type { EncryptedBlob } from "../../types";

export class InitialState extends State {
  readonly name = "initial" as const;

  async initialize(): Promise<void> {
    const hash = await this.context.store.get(this.context.hashKey);
    if (hash) {
      this.context.logger.info("vault initialized", { state: "locked" });
      this.transitionTo(new LockedState(this.context));
    } else {
      this.context.logger.info("vault initialized", { state: "uninitialized" });
      this.transitionTo(new UninitializedState(this.context));
    }
  }

  hasMasterPassword(): boolean { throw new Error("Not initialized"); }
  isLocked(): boolean { throw new Error("Not initialized"); }
  setMasterPassword(masterPassword: string, lockEpoch: number): Promise<void> { throw new Error("Not initialized"); }
  unlock(masterPassword: string, lockEpoch: number): Promise<boolean> { throw new Error("Not initialized"); }
  lock(): void { throw new Error("Not initialized"); }
  getVault(): Vault { throw new Error("Not initialized"); }
  encrypt(plaintext: string): Promise<EncryptedBlob> { throw new Error("Not initialized"); }
  decrypt(blob: EncryptedBlob): Promise<string> { throw new Error("Not initialized"); }
}
