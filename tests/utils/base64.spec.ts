import { base64ToBytes, bytesToBase64 } from "../../src/utils/base64";
import { ValidationError } from "../../src/errors";

describe("base64 utils", () => {
  it("encodes with the standard padded alphabet", () => {
    expect(bytesToBase64(new Uint8Array([0xfb, 0xff]))).toBe("+/8=");
    expect(bytesToBase64(new Uint8Array([1, 2, 3, 4]))).toBe("AQIDBA==");
    expect(bytesToBase64(new Uint8Array([]))).toBe("");
  });

  it("encodes subarray views without leaking neighbouring bytes", () => {
    const whole = new Uint8Array([9, 1, 2, 3, 9]);
    expect(bytesToBase64(whole.subarray(1, 4))).toBe("AQID");
  });

  it("decodes standard base64", () => {
    expect(Array.from(base64ToBytes("AQIDBA=="))).toEqual([1, 2, 3, 4]);
    expect(Array.from(base64ToBytes("+/8="))).toEqual([0xfb, 0xff]);
  });

  it("rejects empty, URL-safe, unpadded and garbage input", () => {
    expect(() => base64ToBytes("")).toThrow(ValidationError);
    expect(() => base64ToBytes("-_8=")).toThrow(ValidationError);
    expect(() => base64ToBytes("AQIDBA")).toThrow(ValidationError);
    expect(() => base64ToBytes("AQ ID BA==")).toThrow(ValidationError);
    expect(() => base64ToBytes("not-base64!!")).toThrow(ValidationError);
  });

  it("rejects oversized input", () => {
    expect(() => base64ToBytes("A".repeat(1024 * 1024 + 4))).toThrow(ValidationError);
  });

  it("takes a caller-supplied length cap", () => {
    expect(() => base64ToBytes("AQIDBA==", 4)).toThrow(ValidationError);
    expect(base64ToBytes("A".repeat(1024 * 1024 + 4), Infinity).byteLength).toBe(786435);
  });
});
