export type LogLevel =
  | "error"
  | "warn"
  | "info"
  | "verbose"
  | "debug"
  | "silly";

export interface PipelineInit {
  serverUrl: string;
  node: string;
  apiKey: string;
  secret: string;
  timeoutMs?: number;
  queueSize?: number;
  flushIntervalMs?: number;
  workerCount?: number;
  failsafe?: boolean;
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  jitter?: boolean;
  /** Strict mode only: how long `submit` waits for queue space; 0 waits indefinitely. */
  offerTimeoutMs?: number;
  pollIntervalMs?: number;
  drainTimeoutMs?: number;
  shutdownGraceMs?: number;
  logLevel?: LogLevel;
}

export type ResolvedConfig = Readonly<Required<PipelineInit>>;

/* ---------- Severity ------------------------------------------------ */

export const Severity = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

const SEVERITY_NAMES: Record<Severity, string> = {
  0: "DEBUG",
  1: "INFO",
  2: "WARN",
  3: "ERROR",
  4: "FATAL",
};

/** Syslog-style names folded onto the five ordinals. */
export const SeverityAlias = {
  NOTICE: Severity.INFO,
  WARNING: Severity.WARN,
  CRITICAL: Severity.ERROR,
  ALERT: Severity.FATAL,
  EMERGENCY: Severity.FATAL,
} as const;

export function isSeverity(value: unknown): value is Severity {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= Severity.DEBUG &&
    value <= Severity.FATAL
  );
}

export function severityName(level: Severity): string {
  return SEVERITY_NAMES[level];
}

export function severityFromValue(value: number): Severity {
  if (!isSeverity(value)) {
    throw new RangeError(
      `Invalid severity value: ${value}. Valid values are 0-4.`
    );
  }
  return value;
}

export function severityFromName(name: string): Severity {
  const key = name.trim().toUpperCase();
  for (const [level, levelName] of Object.entries(SEVERITY_NAMES)) {
    if (levelName === key) return severityFromValue(Number(level));
  }
  for (const [alias, level] of Object.entries(SeverityAlias)) {
    if (alias === key) return level;
  }
  throw new RangeError(`Invalid severity name: ${name}`);
}

/* ---------- Encryption modes ---------------------------------------- */

export const EncryptionMode = {
  AES256_GCM_PBKDF2_SHA256_600K: 1,
  AES256_GCM_SCRYPT: 2,
  AES256_GCM_ARGON2: 3,
  CHACHA20_POLY1305_ARGON2: 4,
} as const;

export type EncryptionMode =
  (typeof EncryptionMode)[keyof typeof EncryptionMode];

const MODE_NAMES: Record<EncryptionMode, string> = {
  1: "AES256-GCM_PBKDF2-SHA256-600K",
  2: "AES256-GCM_SCRYPT",
  3: "AES256-GCM_ARGON2",
  4: "ChaCha20-Poly1305_ARGON2",
};

export function isEncryptionMode(value: unknown): value is EncryptionMode {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= EncryptionMode.AES256_GCM_PBKDF2_SHA256_600K &&
    value <= EncryptionMode.CHACHA20_POLY1305_ARGON2
  );
}

export function encryptionModeName(mode: EncryptionMode): string {
  return MODE_NAMES[mode];
}

export function encryptionModeFromValue(value: number): EncryptionMode {
  if (!isEncryptionMode(value)) {
    throw new RangeError(
      `Invalid encryption mode value: ${value}. Valid values are 1-4.`
    );
  }
  return value;
}

export function encryptionModeFromName(name: string): EncryptionMode {
  const key = name.trim().toLowerCase();
  for (const [mode, modeName] of Object.entries(MODE_NAMES)) {
    if (modeName.toLowerCase() === key) {
      return encryptionModeFromValue(Number(mode));
    }
  }
  throw new RangeError(`Invalid encryption mode name: ${name}`);
}

/* ---------- Encryption result --------------------------------------- */

/**
 * Output of one encryption call. Every field except `mode` is base64 text.
 * Consumed straight away to build a {@link LogRecord}; never stored.
 */
export interface EncryptionResult {
  ciphertext: string;
  iv: string;
  salt: string;
  mode: EncryptionMode;
}

/* ---------- Pipeline ------------------------------------------------ */

export type PipelineState = "running" | "draining" | "stopped";

export interface PipelineStats {
  totalSent: number;
  totalFailed: number;
  totalDropped: number;
  queueSize: number;
  queueCapacity: number;
  isQueueFull: boolean;
  queueUtilization: number;
}

export interface SubmitItem {
  message: string;
  severity: Severity;
  timestamp?: Date;
}
