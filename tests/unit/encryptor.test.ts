import { describe, expect, it, vi } from "vitest";
import {
  Encryptor,
  IV_LENGTH,
  KEY_LENGTH,
  SALT_LENGTH,
  TAG_LENGTH,
  generateRandomKey,
} from "../../src/crypto/encryptor";
import { decodeEnvelope, encodeEnvelope } from "../../src/crypto/envelope";
import { EncryptionError, ErrorCode } from "../../src/errors";
import { EncryptionMode } from "../../src/types";

// Every fresh salt costs a full 600k-iteration derivation, so each test
// keeps the number of encrypt calls small.
describe("Encryptor", () => {
  const encryptor = new Encryptor("test-secret");

  it("round-trips a message", async () => {
    const message = "disk usage at 91% on /var, héllo wörld";
    const result = await encryptor.encrypt(message);

    expect(result.mode).toBe(EncryptionMode.AES256_GCM_PBKDF2_SHA256_600K);
    expect(Buffer.from(result.iv, "base64")).toHaveLength(IV_LENGTH);
    expect(Buffer.from(result.salt, "base64")).toHaveLength(SALT_LENGTH);
    expect(Buffer.from(result.ciphertext, "base64")).toHaveLength(
      Buffer.byteLength(message, "utf8") + TAG_LENGTH
    );
    await expect(encryptor.decrypt(result)).resolves.toBe(message);
  });

  it("produces different ciphertext, IV and salt for identical input", async () => {
    const a = await encryptor.encrypt("same message");
    const b = await encryptor.encrypt("same message");

    expect(a.ciphertext).not.toBe(b.ciphertext);
    expect(a.iv).not.toBe(b.iv);
    expect(a.salt).not.toBe(b.salt);
  });

  it("rejects decryption under a different secret", async () => {
    const result = await encryptor.encrypt("secret stuff");
    const other = new Encryptor("another-test-secret");

    await expect(other.decrypt(result)).rejects.toThrow(EncryptionError);
    await expect(other.decrypt(result)).rejects.toThrow("Failed to decrypt message");
  });

  it("detects a flipped ciphertext byte", async () => {
    const result = await encryptor.encrypt("tamper with me");
    const bytes = Buffer.from(result.ciphertext, "base64");
    bytes[0] ^= 0x01;

    await expect(
      encryptor.decrypt({ ...result, ciphertext: bytes.toString("base64") })
    ).rejects.toThrow("Failed to decrypt message");
  });

  it("rejects a salt of the wrong length", async () => {
    const result = {
      ciphertext: Buffer.alloc(32).toString("base64"),
      iv: Buffer.alloc(IV_LENGTH).toString("base64"),
      salt: Buffer.alloc(16).toString("base64"),
      mode: EncryptionMode.AES256_GCM_PBKDF2_SHA256_600K,
    };

    await expect(encryptor.decrypt(result)).rejects.toThrow(
      "Invalid salt length: expected 32 bytes"
    );
  });

  it("rejects an IV of the wrong length", async () => {
    const result = {
      ciphertext: Buffer.alloc(32).toString("base64"),
      iv: Buffer.alloc(16).toString("base64"),
      salt: Buffer.alloc(SALT_LENGTH).toString("base64"),
      mode: EncryptionMode.AES256_GCM_PBKDF2_SHA256_600K,
    };

    await expect(encryptor.decrypt(result)).rejects.toThrow(
      "Invalid IV length: expected 12 bytes"
    );
  });

  it("reports modes without a key derivation as unsupported", async () => {
    const err = await encryptor
      .encrypt("hello", EncryptionMode.AES256_GCM_SCRYPT)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EncryptionError);
    if (!(err instanceof EncryptionError)) return;
    expect(err.code).toBe(ErrorCode.UNSUPPORTED_MODE);
    expect(err.message).toBe("AES256-GCM_SCRYPT key derivation not yet implemented");
    expect(err.retryable).toBe(false);
  });

  it("refuses a blank secret", () => {
    expect(() => new Encryptor("   ")).toThrow("Secret cannot be null or empty");
  });

  it("clears cached keys", async () => {
    const local = new Encryptor("test-secret");
    await local.encrypt("warm the cache");
    expect(local.cachedKeyCount).toBe(1);

    local.clearCache();
    expect(local.cachedKeyCount).toBe(0);
  });

  it("wipes a key evicted from a full cache", async () => {
    const local = new Encryptor("test-secret", { maxCachedKeys: 1 });
    const first = await local.encrypt("first");

    const fill = vi.spyOn(Buffer.prototype, "fill");
    try {
      await local.encrypt("second");
      expect(local.cachedKeyCount).toBe(1);
      await vi.waitFor(() => expect(fill).toHaveBeenCalledWith(0));
    } finally {
      fill.mockRestore();
    }

    // an evicted key is derived again on demand
    await expect(local.decrypt(first)).resolves.toBe("first");
  });

  it("round-trips through the single-string envelope", async () => {
    const packed = await encryptor.encryptToString("packed message");

    const decoded = Buffer.from(packed, "base64").toString("utf8").split(".");
    expect(decoded).toHaveLength(4);
    expect(decoded[3]).toBe("1");
    await expect(encryptor.decryptString(packed)).resolves.toBe("packed message");
  });
});

describe("envelope", () => {
  it("encodes the four parts in order", () => {
    const packed = encodeEnvelope({ ciphertext: "Y3Q=", iv: "aXY=", salt: "c2FsdA==", mode: 1 });
    expect(Buffer.from(packed, "base64").toString("utf8")).toBe("Y3Q=.aXY=.c2FsdA==.1");
    expect(decodeEnvelope(packed)).toEqual({
      ciphertext: "Y3Q=",
      iv: "aXY=",
      salt: "c2FsdA==",
      mode: 1,
    });
  });

  it("rejects empty input", () => {
    expect(() => decodeEnvelope("")).toThrow("Encrypted data cannot be empty");
  });

  it("rejects the wrong number of parts", () => {
    const packed = Buffer.from("a.b.c", "utf8").toString("base64");
    expect(() => decodeEnvelope(packed)).toThrow("Invalid encrypted data format");
  });

  it("rejects an unknown mode", () => {
    const packed = Buffer.from("a.b.c.9", "utf8").toString("base64");
    let caught: unknown;
    try {
      decodeEnvelope(packed);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EncryptionError);
    if (!(caught instanceof EncryptionError)) return;
    expect(caught.code).toBe(ErrorCode.UNSUPPORTED_MODE);
  });
});

describe("generateRandomKey", () => {
  it("returns 32 fresh bytes", () => {
    const a = generateRandomKey();
    const b = generateRandomKey();
    expect(a).toHaveLength(KEY_LENGTH);
    expect(a.equals(b)).toBe(false);
  });
});
