export class VaultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VaultError";
  }
}

export class ValidationError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class LockedError extends VaultError {
  constructor(message = "Vault is locked") {
    super(message);
    this.name = "LockedError";
  }
}

export class ModeError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "ModeError";
  }
}

export class RandomSourceError extends VaultError {
  constructor(message = "Secure random source unavailable") {
    super(message);
    this.name = "RandomSourceError";
  }
}

export class MalformedBlobError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedBlobError";
  }
}

/**
 * Authentication failure while opening a blob. Wrong key, corruption and
 * tampering all surface with the same message.
 */
export class DecryptionError extends VaultError {
  constructor() {
    super("Wrong master password or corrupted data");
    this.name = "DecryptionError";
  }
}

export class CryptoError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "CryptoError";
  }
}

export class PersistenceError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "PersistenceError";
  }
}
