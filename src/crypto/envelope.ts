/**
 * Single-string envelope ⇢ base64( payload.iv.salt.mode )
 *
 *   payload : base64 ciphertext with the 16-byte GCM tag appended
 *   iv      : base64, 12 bytes
 *   salt    : base64, 32 bytes
 *   mode    : encryption scheme tag (integer)
 *
 * Base64 never contains '.', so the separator is unambiguous.
 */
import { EncryptionError, ErrorCode } from "../errors";
import type { EncryptionResult } from "../types";
import { isEncryptionMode } from "../types";

export function encodeEnvelope(result: EncryptionResult): string {
  const combined = `${result.ciphertext}.${result.iv}.${result.salt}.${result.mode}`;
  return Buffer.from(combined, "utf8").toString("base64");
}

export function decodeEnvelope(b64: string): EncryptionResult {
  if (!b64 || !b64.trim()) {
    throw new EncryptionError("Encrypted data cannot be empty");
  }

  const parts = Buffer.from(b64, "base64").toString("utf8").split(".");
  if (parts.length !== 4) {
    throw new EncryptionError("Invalid encrypted data format");
  }

  const [ciphertext, iv, salt, rawMode] = parts;
  const mode = Number(rawMode);
  if (!isEncryptionMode(mode)) {
    throw new EncryptionError(`Invalid encryption mode in envelope: ${rawMode}`, {
      code: ErrorCode.UNSUPPORTED_MODE,
    });
  }
  return { ciphertext, iv, salt, mode };
}
