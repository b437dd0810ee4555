import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { PipelineInit, ResolvedConfig } from "./types";

export const DEFAULTS = {
  timeoutMs: 30_000,
  queueSize: 1000,
  flushIntervalMs: 5_000,
  workerCount: 2,
  failsafe: true,
  maxRetries: 5,
  initialDelayMs: 100,
  maxDelayMs: 30_000,
  backoffFactor: 2.0,
  jitter: true,
  offerTimeoutMs: 0,
  pollIntervalMs: 1_000,
  drainTimeoutMs: 10_000,
  shutdownGraceMs: 5_000,
  logLevel: "info",
} as const satisfies Partial<PipelineInit>;

const LOG_LEVELS = ["error", "warn", "info", "verbose", "debug", "silly"] as const;

const notBlank = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .refine((v) => v.trim().length > 0, `${field} cannot be empty`);

const ConfigSchema = z.object({
  serverUrl: notBlank("serverUrl").refine(
    (v) => v.startsWith("http://") || v.startsWith("https://"),
    "serverUrl must start with 'http://' or 'https://'"
  ),
  node: notBlank("node").refine(
    (v) => v.length <= 255,
    "node exceeds maximum length of 255 characters"
  ),
  apiKey: notBlank("apiKey"),
  secret: notBlank("secret"),
  timeoutMs: z.number().positive("timeoutMs must be positive"),
  queueSize: z.number().int().positive("queueSize must be positive"),
  flushIntervalMs: z.number().nonnegative("flushIntervalMs cannot be negative"),
  workerCount: z.number().int().positive("workerCount must be positive"),
  failsafe: z.boolean(),
  maxRetries: z.number().int().nonnegative("maxRetries cannot be negative"),
  initialDelayMs: z.number().nonnegative("initialDelayMs cannot be negative"),
  maxDelayMs: z.number().nonnegative("maxDelayMs cannot be negative"),
  backoffFactor: z.number().gte(1, "backoffFactor must be >= 1.0"),
  jitter: z.boolean(),
  offerTimeoutMs: z.number().nonnegative("offerTimeoutMs cannot be negative"),
  pollIntervalMs: z.number().positive("pollIntervalMs must be positive"),
  drainTimeoutMs: z.number().nonnegative("drainTimeoutMs cannot be negative"),
  shutdownGraceMs: z.number().nonnegative("shutdownGraceMs cannot be negative"),
  logLevel: z.enum(LOG_LEVELS),
});

type EnvKind = "string" | "number" | "boolean";

const ENV_MAPPINGS: ReadonlyArray<[string, keyof PipelineInit, EnvKind]> = [
  ["CIPHERSHIP_SERVER_URL", "serverUrl", "string"],
  ["CIPHERSHIP_NODE", "node", "string"],
  ["CIPHERSHIP_API_KEY", "apiKey", "string"],
  ["CIPHERSHIP_SECRET", "secret", "string"],
  ["CIPHERSHIP_HTTP_TIMEOUT_MS", "timeoutMs", "number"],
  ["CIPHERSHIP_QUEUE_SIZE", "queueSize", "number"],
  ["CIPHERSHIP_FLUSH_INTERVAL_MS", "flushIntervalMs", "number"],
  ["CIPHERSHIP_WORKER_COUNT", "workerCount", "number"],
  ["CIPHERSHIP_FAILSAFE_MODE", "failsafe", "boolean"],
  ["CIPHERSHIP_MAX_RETRIES", "maxRetries", "number"],
  ["CIPHERSHIP_INITIAL_DELAY_MS", "initialDelayMs", "number"],
  ["CIPHERSHIP_MAX_DELAY_MS", "maxDelayMs", "number"],
  ["CIPHERSHIP_BACKOFF_FACTOR", "backoffFactor", "number"],
  ["CIPHERSHIP_JITTER_ENABLED", "jitter", "boolean"],
  ["CIPHERSHIP_OFFER_TIMEOUT_MS", "offerTimeoutMs", "number"],
  ["CIPHERSHIP_LOG_LEVEL", "logLevel", "string"],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function withoutUndefined(obj: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

export function readYaml(filePath: string): Record<string, unknown> {
  try {
    const abs = path.resolve(process.cwd(), filePath);

    if (!fs.existsSync(abs)) return {};
    const raw = fs.readFileSync(abs, "utf8");
    const parsed: unknown = yaml.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const out: Record<string, unknown> = {};

  for (const [envVar, field, kind] of ENV_MAPPINGS) {
    const raw = env[envVar];
    if (raw === undefined || raw.trim() === "") continue;

    const value = raw.trim();
    if (kind === "boolean") {
      out[field] = ["true", "1", "yes"].includes(value.toLowerCase());
    } else if (kind === "number") {
      out[field] = Number(value);
    } else {
      out[field] = value;
    }
  }
  return out;
}

/**
 * Build the effective configuration. Precedence, lowest first:
 * defaults, the YAML file named by `CIPHERSHIP_RC`, `CIPHERSHIP_*`
 * environment variables, then `userCfg`.
 *
 * @throws {ConfigError} listing every field that failed validation
 */
export function resolveConfig(
  userCfg: Partial<PipelineInit> = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const fileCfg = env["CIPHERSHIP_RC"] ? readYaml(env["CIPHERSHIP_RC"]) : {};

  const merged: Record<string, unknown> = {
    ...DEFAULTS,
    ...fileCfg,
    ...readEnv(env),
    ...withoutUndefined(userCfg),
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return Object.freeze(result.data);
}
