import { CiphershipError } from "../errors";

/** Socket and DNS error codes from Node and undici that are worth retrying. */
const TRANSIENT_CODES: ReadonlySet<string> = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const TRANSIENT_PHRASES = [
  "connection refused",
  "connection reset",
  "connection timed out",
  "timeout",
  "network is unreachable",
  "no route to host",
  "temporarily unavailable",
  "http 5",
  "http 429",
] as const;

const MAX_CAUSE_DEPTH = 5;

function errorCode(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, "code");
  return typeof code === "string" ? code : undefined;
}

/**
 * Structured verdict, if the error carries one: our own errors say so
 * directly, foreign errors may carry a socket code. Walks `cause`.
 */
export function structuredVerdict(error: unknown, depth = 0): boolean | undefined {
  if (!(error instanceof Error) || depth > MAX_CAUSE_DEPTH) return undefined;

  if (error instanceof CiphershipError) return error.retryable;

  const code = errorCode(error);
  if (code !== undefined && TRANSIENT_CODES.has(code)) return true;
  if (error.name === "TimeoutError") return true;

  return structuredVerdict(error.cause, depth + 1);
}

/**
 * Transient (retry) versus permanent (give up).
 *
 * Structured information wins; the message match only applies to foreign
 * errors that carry none.
 */
export function isRetryable(error: unknown): boolean {
  if (error == null) return false;

  const verdict = structuredVerdict(error);
  if (verdict !== undefined) return verdict;

  const message = error instanceof Error ? error.message : typeof error === "string" ? error : "";
  if (!message) return false;

  const lower = message.toLowerCase();
  return TRANSIENT_PHRASES.some((phrase) => lower.includes(phrase));
}
