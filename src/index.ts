export { Pipeline } from "./pipeline/pipeline";
export type { PipelineDeps, PipelineEncryptor } from "./pipeline/pipeline";
export { WorkerPool } from "./pipeline/worker-pool";
export type { WorkerPoolOptions } from "./pipeline/worker-pool";
export { StatsCounters, snapshotStats } from "./pipeline/stats";

export { Encryptor, generateRandomKey } from "./crypto/encryptor";
export type { EncryptorOptions } from "./crypto/encryptor";
export { encodeEnvelope, decodeEnvelope } from "./crypto/envelope";

export {
  BlockingBoundedQueue,
  DroppingBoundedQueue,
  createBoundedQueue,
} from "./queue/bounded-queue";
export type { AdmissionMode, BoundedQueue } from "./queue/bounded-queue";
export { RingBuffer } from "./queue/ring-buffer";

export { RetryStrategy, DEFAULT_RETRY_POLICY } from "./retry/strategy";
export type { RetryPolicy, ExecuteOptions } from "./retry/strategy";
export { isRetryable } from "./retry/classify";

export { HttpDeliveryPort } from "./network/transport";
export type { HttpDeliveryPortOptions } from "./network/transport";
export { DeliveryReceiptSchema, isAccepted } from "./network/port";
export type { DeliveryPort, DeliveryReceipt } from "./network/port";

export {
  createLogRecord,
  recordFromEncryption,
  serializeRecord,
  parseWireRecord,
  toWire,
} from "./schema/log-record";
export type { LogRecord, LogRecordFields, WireRecord } from "./schema/log-record";

export { PipelineTransport, severityForLevel } from "./adapters/winston-transport";
export type { PipelineTransportOptions } from "./adapters/winston-transport";

export * as global from "./global";

export { resolveConfig, DEFAULTS } from "./config";
export { createLogger, createSilentLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";
export { registry } from "./metrics";

export {
  CiphershipError,
  EncryptionError,
  QueueFullError,
  PipelineClosedError,
  DeliveryError,
  RetryExhaustedError,
  ConfigError,
  InvalidRecordError,
  ErrorCode,
} from "./errors";

export {
  Severity,
  SeverityAlias,
  severityName,
  severityFromName,
  severityFromValue,
  EncryptionMode,
  encryptionModeName,
  encryptionModeFromName,
  encryptionModeFromValue,
} from "./types";
export type {
  LogLevel,
  PipelineInit,
  ResolvedConfig,
  PipelineState,
  PipelineStats,
  SubmitItem,
  EncryptionResult,
} from "./types";
