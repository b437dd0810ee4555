/**
 * @module log-record
 * @description Immutable log record as it travels through the queue, plus
 * its JSON wire form.
 *
 * A record holds only encrypted content. The plaintext message never
 * reaches the queue: it is sealed by the encryptor first and the record
 * keeps the base64 ciphertext, IV and salt alongside the scheme tag.
 */

import { z } from "zod";
import { InvalidRecordError } from "../errors";
import {
  isEncryptionMode,
  isSeverity,
  type EncryptionMode,
  type EncryptionResult,
  type Severity,
} from "../types";

export const MAX_NODE_LENGTH = 255;

/**
 * Zod schema for a record. `timestamp` is epoch milliseconds so the value
 * cannot be mutated after construction the way a `Date` can.
 */
export const LogRecordSchema = z.object({
  node: z
    .string()
    .min(1, "node cannot be empty")
    .max(MAX_NODE_LENGTH, "node exceeds maximum length of 255 characters"),
  payload: z.string(),
  severity: z.custom<Severity>(isSeverity, "severity must be between 0 and 4"),
  timestamp: z.number().finite(),
  mode: z.custom<EncryptionMode>(isEncryptionMode, "encryption mode must be between 1 and 4"),
  iv: z.string().min(1, "iv cannot be empty"),
  salt: z.string().min(1, "salt cannot be empty"),
});

export type LogRecord = Readonly<z.infer<typeof LogRecordSchema>>;

/** Unvalidated record fields; `severity` and `mode` are checked on construction. */
export interface LogRecordFields {
  node: string;
  payload: string;
  severity: number;
  timestamp: number;
  mode: number;
  iv: string;
  salt: string;
}

export function createLogRecord(fields: LogRecordFields): LogRecord {
  const result = LogRecordSchema.safeParse(fields);
  if (!result.success) {
    throw new InvalidRecordError(result.error.issues.map((i) => i.message).join("; "));
  }
  return Object.freeze(result.data);
}

export function recordFromEncryption(
  node: string,
  enc: EncryptionResult,
  severity: Severity,
  timestamp: Date = new Date()
): LogRecord {
  return createLogRecord({
    node,
    payload: enc.ciphertext,
    severity,
    timestamp: timestamp.getTime(),
    mode: enc.mode,
    iv: enc.iv,
    salt: enc.salt,
  });
}

/* ---------- Wire form ------------------------------------------------ */

/**
 * JSON body accepted by the ingest endpoint. `timestamp` is epoch seconds
 * with the sub-second part as a fraction.
 */
export const WireRecordSchema = z.object({
  node: z.string(),
  payload: z.string(),
  loglevel: z.number().int(),
  timestamp: z.number(),
  encryption_mode: z.number().int(),
  iv: z.string(),
  salt: z.string(),
});

export type WireRecord = z.infer<typeof WireRecordSchema>;

export function toWire(record: LogRecord): WireRecord {
  return {
    node: record.node,
    payload: record.payload,
    loglevel: record.severity,
    timestamp: record.timestamp / 1000,
    encryption_mode: record.mode,
    iv: record.iv,
    salt: record.salt,
  };
}

export function serializeRecord(record: LogRecord): string {
  return JSON.stringify(toWire(record));
}

export function parseWireRecord(json: string): LogRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new InvalidRecordError(
      `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const wire = WireRecordSchema.safeParse(raw);
  if (!wire.success) {
    throw new InvalidRecordError(wire.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }

  return createLogRecord({
    node: wire.data.node,
    payload: wire.data.payload,
    severity: wire.data.loglevel,
    timestamp: Math.round(wire.data.timestamp * 1000),
    mode: wire.data.encryption_mode === 0 ? 1 : wire.data.encryption_mode,
    iv: wire.data.iv,
    salt: wire.data.salt,
  });
}
