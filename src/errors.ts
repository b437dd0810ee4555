/**
 * Error taxonomy for the delivery pipeline.
 *
 * Every error raised by the library carries a structured {@link ErrorCode}
 * and a `retryable` flag, so the retry strategy and callers can tell a
 * transient delivery failure from a fatal one without reading messages.
 *
 * @module errors
 */

export enum ErrorCode {
  // Encryption
  ENCRYPTION_FAILED = "ENCRYPTION_FAILED",
  UNSUPPORTED_MODE = "UNSUPPORTED_MODE",

  // Admission
  QUEUE_FULL = "QUEUE_FULL",
  PIPELINE_CLOSED = "PIPELINE_CLOSED",

  // Delivery
  DELIVERY_FAILED = "DELIVERY_FAILED",
  NETWORK_ERROR = "NETWORK_ERROR",
  TIMEOUT = "TIMEOUT",
  SERVER_ERROR = "SERVER_ERROR",
  RATE_LIMITED = "RATE_LIMITED",
  CLIENT_ERROR = "CLIENT_ERROR",
  AUTH_ERROR = "AUTH_ERROR",
  RETRY_EXHAUSTED = "RETRY_EXHAUSTED",

  // Input
  INVALID_CONFIG = "INVALID_CONFIG",
  INVALID_RECORD = "INVALID_RECORD",
}

const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.NETWORK_ERROR,
  ErrorCode.TIMEOUT,
  ErrorCode.SERVER_ERROR,
  ErrorCode.RATE_LIMITED,
]);

export function isRetryableCode(code: ErrorCode): boolean {
  return RETRYABLE_CODES.has(code);
}

/**
 * Base class for all library errors.
 */
export class CiphershipError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CiphershipError";
    this.code = code;
    this.retryable = isRetryableCode(code);
    if (options?.details !== undefined) {
      this.details = options.details;
    }
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): { error: string; code: ErrorCode; details?: Record<string, unknown> } {
    return {
      error: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    };
  }
}

/** Bad secret, corrupt ciphertext, failed tag check or unknown scheme. */
export class EncryptionError extends CiphershipError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: ErrorCode.ENCRYPTION_FAILED | ErrorCode.UNSUPPORTED_MODE }
  ) {
    super(message, options?.code ?? ErrorCode.ENCRYPTION_FAILED, {
      cause: options?.cause,
    });
    this.name = "EncryptionError";
  }
}

export class QueueFullError extends CiphershipError {
  constructor(capacity: number) {
    super(`Queue is full (capacity ${capacity})`, ErrorCode.QUEUE_FULL, {
      details: { capacity },
    });
    this.name = "QueueFullError";
  }
}

export class PipelineClosedError extends CiphershipError {
  constructor() {
    super("Pipeline is shutting down, rejecting new entries", ErrorCode.PIPELINE_CLOSED);
    this.name = "PipelineClosedError";
  }
}

/**
 * Failure reported by a delivery port. The code decides whether the
 * retry strategy tries again.
 */
export class DeliveryError extends CiphershipError {
  readonly status?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DELIVERY_FAILED,
    options?: { status?: number; cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, code, { cause: options?.cause, details: options?.details });
    this.name = "DeliveryError";
    if (options?.status !== undefined) {
      this.status = options.status;
    }
  }

  static fromStatus(status: number, body: string): DeliveryError {
    let code: ErrorCode;
    if (status === 429) code = ErrorCode.RATE_LIMITED;
    else if (status >= 500) code = ErrorCode.SERVER_ERROR;
    else if (status === 401 || status === 403) code = ErrorCode.AUTH_ERROR;
    else if (status >= 400) code = ErrorCode.CLIENT_ERROR;
    else code = ErrorCode.DELIVERY_FAILED;

    return new DeliveryError(`HTTP ${status}: ${body}`, code, { status });
  }
}

export class RetryExhaustedError extends CiphershipError {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(
      `Operation failed after ${attempts} attempts: ${reason}`,
      ErrorCode.RETRY_EXHAUSTED,
      { cause: lastError, details: { attempts } }
    );
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class ConfigError extends CiphershipError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.join("\n")}`, ErrorCode.INVALID_CONFIG, {
      details: { issues },
    });
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class InvalidRecordError extends CiphershipError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_RECORD);
    this.name = "InvalidRecordError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
