/** base64(nonce || ciphertext || tag); "" means no secret set. */
export type EncryptedBlob = string;

/** Argon2id cost parameters. Output length is fixed at 32 bytes. */
export interface KdfParams {
  iterations: number;
  memoryKiB: number;
  parallelism: number;
}

/**
 * Key-value configuration store holding the salt and verification hash.
 * Missing keys resolve to `null`.
 */
export interface ConfigStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
}

/** Anything that can seal and open secret strings. */
export interface SecretCodec {
  encrypt(plaintext: string): Promise<EncryptedBlob>;
  decrypt(blob: EncryptedBlob): Promise<string>;
}

export interface ConnectionProfile {
  id: string;
  name: string;
  host: string;
  port: number;
  username: string;
  password: string;     // EncryptedBlob when sealed
  defaultDb: string;
  useSsl: boolean;
  sshEnabled: boolean;
  sshHost: string;
  sshPort: number;
  sshUser: string;
  sshAuth: "key" | "password";
  sshKeyPath: string;
  sshPassword: string;  // EncryptedBlob when sealed
  sortOrder: number;
}
