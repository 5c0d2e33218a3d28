import type { ConnectionProfile, SecretCodec } from "../types";
import { silentLogger, type Logger } from "../utils/logger";

/** Profile attributes stored as encrypted blobs. */
export const SECRET_FIELDS = ["password", "sshPassword"] as const;

export type SecretField = (typeof SECRET_FIELDS)[number];

export interface OpenedProfile {
  profile: ConnectionProfile;
  /** Fields that could not be decrypted and were left as stored. */
  failedFields: SecretField[];
}

/**
 * Encrypts every secret field before the profile is persisted.
 * Without a codec (no master password in use) the profile is returned unchanged.
 * Encryption failures propagate; nothing is written in plaintext by accident.
 */
export async function sealProfile(
  codec: SecretCodec | null,
  profile: ConnectionProfile
): Promise<ConnectionProfile> {
  if (!codec) return { ...profile };

  const sealed: ConnectionProfile = { ...profile };
  for (const field of SECRET_FIELDS) {
    sealed[field] = await codec.encrypt(profile[field]);
  }
  return sealed;
}

/**
 * Decrypts every secret field of a loaded profile.
 *
 * A field that fails (legacy plaintext, foreign key, corruption) keeps its stored
 * value and is listed in `failedFields`; the rest of the profile still loads.
 */
export async function openProfile(
  codec: SecretCodec | null,
  profile: ConnectionProfile,
  logger: Logger = silentLogger
): Promise<OpenedProfile> {
  const opened: ConnectionProfile = { ...profile };
  const failedFields: SecretField[] = [];
  if (!codec) return { profile: opened, failedFields };

  for (const field of SECRET_FIELDS) {
    try {
      opened[field] = await codec.decrypt(profile[field]);
    } catch (e) {
      failedFields.push(field);
      logger.warn("kept stored value for undecryptable field", {
        profileId: profile.id,
        field,
        error: (e as Error)?.name ?? "Error"
      });
    }
  }
  return { profile: opened, failedFields };
}
