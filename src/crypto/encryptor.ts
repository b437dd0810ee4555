import {
  createCipheriv,
  createDecipheriv,
  pbkdf2,
  randomBytes,
} from "node:crypto";
import { promisify } from "node:util";

import { EncryptionError, ErrorCode } from "../errors";
import { encryptHist } from "../metrics";
import {
  EncryptionMode,
  encryptionModeName,
  isEncryptionMode,
  type EncryptionResult,
} from "../types";
import { decodeEnvelope, encodeEnvelope } from "./envelope";

const pbkdf2Async = promisify(pbkdf2);

const CIPHER = "aes-256-gcm";
export const IV_LENGTH = 12; // 96 bits
export const TAG_LENGTH = 16; // 128 bits
export const KEY_LENGTH = 32; // 256 bits
export const SALT_LENGTH = 32; // 256 bits
export const PBKDF2_ITERATIONS = 600_000;
const PBKDF2_DIGEST = "sha256";

const DEFAULT_MAX_CACHED_KEYS = 32;

interface CacheEntry {
  pending: Promise<Buffer>;
  key?: Buffer;
}

export interface EncryptorOptions {
  mode?: EncryptionMode;
  /** Upper bound on derived keys kept in memory; oldest are evicted first. */
  maxCachedKeys?: number;
}

/**
 * Per-message authenticated encryption.
 *
 * Each call draws a fresh 32-byte salt and 12-byte IV, derives an AES-256
 * key with PBKDF2-HMAC-SHA256 (600k iterations) from the secret and that
 * salt, then seals the UTF-8 message with AES-256-GCM. The 16-byte tag is
 * appended to the ciphertext.
 *
 * Derived keys are cached per (scheme, salt) for the secret this instance
 * was built with, so decrypting something this instance encrypted skips the
 * KDF. A fresh salt always costs a full derivation.
 */
export class Encryptor {
  private readonly secret: string;
  private readonly mode: EncryptionMode;
  private readonly maxCachedKeys: number;
  private readonly keyCache = new Map<string, CacheEntry>();

  constructor(secret: string, opts: EncryptorOptions = {}) {
    if (typeof secret !== "string" || secret.trim().length === 0) {
      throw new EncryptionError("Secret cannot be null or empty");
    }
    this.secret = secret;
    this.mode = opts.mode ?? EncryptionMode.AES256_GCM_PBKDF2_SHA256_600K;
    this.maxCachedKeys = Math.max(1, opts.maxCachedKeys ?? DEFAULT_MAX_CACHED_KEYS);
  }

  get defaultMode(): EncryptionMode {
    return this.mode;
  }

  get cachedKeyCount(): number {
    return this.keyCache.size;
  }

  async encrypt(message: string, mode: EncryptionMode = this.mode): Promise<EncryptionResult> {
    if (typeof message !== "string") {
      throw new EncryptionError("Message cannot be null");
    }
    assertSupported(mode);

    const endTimer = encryptHist.startTimer();
    try {
      const salt = randomBytes(SALT_LENGTH);
      const iv = randomBytes(IV_LENGTH);
      const key = await this.deriveKey(salt, mode);

      const cipher = createCipheriv(CIPHER, key, iv, { authTagLength: TAG_LENGTH });
      const sealed = Buffer.concat([
        cipher.update(message, "utf8"),
        cipher.final(),
        cipher.getAuthTag(),
      ]);

      return {
        ciphertext: sealed.toString("base64"),
        iv: iv.toString("base64"),
        salt: salt.toString("base64"),
        mode,
      };
    } catch (err) {
      if (err instanceof EncryptionError) throw err;
      throw new EncryptionError("Failed to encrypt message", { cause: err });
    } finally {
      endTimer();
    }
  }

  async decrypt(result: EncryptionResult): Promise<string> {
    if (!result || result.ciphertext == null || result.iv == null || result.salt == null) {
      throw new EncryptionError("Encrypted payload, IV, and salt cannot be null");
    }
    if (!isEncryptionMode(result.mode)) {
      throw new EncryptionError(`Unsupported encryption mode: ${String(result.mode)}`, {
        code: ErrorCode.UNSUPPORTED_MODE,
      });
    }
    assertSupported(result.mode);

    const sealed = Buffer.from(result.ciphertext, "base64");
    const iv = Buffer.from(result.iv, "base64");
    const salt = Buffer.from(result.salt, "base64");

    if (iv.length !== IV_LENGTH) {
      throw new EncryptionError(`Invalid IV length: expected ${IV_LENGTH} bytes`);
    }
    if (salt.length !== SALT_LENGTH) {
      throw new EncryptionError(`Invalid salt length: expected ${SALT_LENGTH} bytes`);
    }
    if (sealed.length < TAG_LENGTH) {
      throw new EncryptionError("Ciphertext is shorter than the authentication tag");
    }

    try {
      const key = await this.deriveKey(salt, result.mode);
      const decipher = createDecipheriv(CIPHER, key, iv, { authTagLength: TAG_LENGTH });
      decipher.setAuthTag(sealed.subarray(sealed.length - TAG_LENGTH));
      const plain = Buffer.concat([
        decipher.update(sealed.subarray(0, sealed.length - TAG_LENGTH)),
        decipher.final(),
      ]);
      return plain.toString("utf8");
    } catch (err) {
      if (err instanceof EncryptionError) throw err;
      throw new EncryptionError("Failed to decrypt message", { cause: err });
    }
  }

  /** Encrypt and pack the result into one base64 string. */
  async encryptToString(message: string): Promise<string> {
    return encodeEnvelope(await this.encrypt(message));
  }

  async decryptString(envelope: string): Promise<string> {
    return this.decrypt(decodeEnvelope(envelope));
  }

  /** Drop every cached key and overwrite the key bytes. */
  clearCache(): void {
    for (const entry of this.keyCache.values()) {
      entry.key?.fill(0);
    }
    this.keyCache.clear();
  }

  private deriveKey(salt: Buffer, mode: EncryptionMode): Promise<Buffer> {
    const cacheKey = `${mode}:${salt.toString("base64")}`;
    const cached = this.keyCache.get(cacheKey);
    if (cached) return cached.pending;

    const entry: CacheEntry = {
      pending: pbkdf2Async(this.secret, salt, PBKDF2_ITERATIONS, KEY_LENGTH, PBKDF2_DIGEST),
    };
    void entry.pending.then(
      (key) => {
        entry.key = key;
      },
      () => {
        this.keyCache.delete(cacheKey);
      }
    );

    this.keyCache.set(cacheKey, entry);
    this.evictOverflow();
    return entry.pending;
  }

  private evictOverflow(): void {
    while (this.keyCache.size > this.maxCachedKeys) {
      const oldest = this.keyCache.entries().next();
      if (oldest.done) return;
      const [cacheKey, entry] = oldest.value;
      this.keyCache.delete(cacheKey);
      // callers already awaiting this key resume before the wipe
      void entry.pending.then(
        (key) => key.fill(0),
        () => undefined
      );
    }
  }
}

function assertSupported(mode: EncryptionMode): void {
  if (mode !== EncryptionMode.AES256_GCM_PBKDF2_SHA256_600K) {
    throw new EncryptionError(
      `${encryptionModeName(mode)} key derivation not yet implemented`,
      { code: ErrorCode.UNSUPPORTED_MODE }
    );
  }
}

/** 32 random bytes suitable as a raw AES-256 key. */
export function generateRandomKey(): Buffer {
  return randomBytes(KEY_LENGTH);
}
