import { generateKeyPairSync, sign } from "node:crypto";
import { ValidationError } from "@latch/discord";
import { describe, expect, it } from "vitest";
import { decodeHex, importPublicKey, verifySignature } from "./signature";

const { publicKey, privateKey } = generateKeyPairSync("ed25519");
const PUBLIC_KEY_HEX = publicKey
  .export({ format: "der", type: "spki" })
  .subarray(12)
  .toString("hex");

describe("decodeHex", () => {
  it("decodes mixed-case hex", () => {
    expect([...decodeHex("0aFf")]).toEqual([10, 255]);
  });

  it.each(["", "abc", "zz", "0x12"])("rejects %j", (value) => {
    expect(() => decodeHex(value)).toThrow(ValidationError);
  });
});

describe("verifySignature", () => {
  const key = importPublicKey(PUBLIC_KEY_HEX);
  const body = Buffer.from('{"type":1}');
  const signature = sign(null, Buffer.from(`123${body.toString()}`), privateKey).toString("hex");

  it("accepts a signature over timestamp and body", () => {
    expect(verifySignature(key, signature, "123", body)).toBe(true);
  });

  it("rejects a different timestamp", () => {
    expect(verifySignature(key, signature, "124", body)).toBe(false);
  });

  it("rejects a signature of the wrong length", () => {
    expect(() => verifySignature(key, "abcd", "123", body)).toThrow(
      "Invalid signature length",
    );
  });
});
