import { ValidationError } from "../errors";

// Standard alphabet, padded. Whitespace and URL-safe variants are rejected.
const STRICT_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const MAX_BASE64_LEN = 1024 * 1024;

export function bytesToBase64(bytes: ArrayBuffer | Uint8Array): string {
  const u8 = bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes);
  if (u8.byteLength === 0) return "";
  return Buffer.from(u8.buffer, u8.byteOffset, u8.byteLength).toString("base64");
}

/**
 * Strict decode. `maxLength` caps the encoded length; pass `Infinity` where the
 * input was produced by this package and must always decode.
 */
export function base64ToBytes(b64: string, maxLength: number = MAX_BASE64_LEN): Uint8Array {
  if (typeof b64 !== "string" || b64.length === 0) {
    throw new ValidationError("Base64 input must be a non-empty string");
  }
  if (b64.length > maxLength) {
    throw new ValidationError("Base64 input too large");
  }
  if (!STRICT_BASE64.test(b64)) {
    throw new ValidationError("Invalid base64 input");
  }
  return new Uint8Array(Buffer.from(b64, "base64"));
}
