import { Agent, request, type Dispatcher } from "undici";
import { DeliveryError, ErrorCode, errorMessage } from "../errors";
import { isRetryable } from "../retry/classify";
import { createLogger, type Logger } from "../utils/logger";
import { DeliveryReceiptSchema, type DeliveryPort, type DeliveryReceipt } from "./port";

const USER_AGENT = "ciphership-node/0.1.0";
const INGEST_PATH = "/v1/ingest";

const TIMEOUT_CODES: ReadonlySet<string> = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

export interface HttpDeliveryPortOptions {
  serverUrl: string;
  apiKey: string;
  timeoutMs?: number;
  logger?: Logger;
  /** Bring your own undici dispatcher; it is then not closed by `close()`. */
  dispatcher?: Dispatcher;
}

/**
 * Delivery port that POSTs each record to `{serverUrl}/v1/ingest`.
 *
 * Non-2xx answers become a {@link DeliveryError} whose code reflects the
 * status (5xx and 429 retryable, the rest not). Socket failures are
 * wrapped as `NETWORK_ERROR` or `TIMEOUT`.
 */
export class HttpDeliveryPort implements DeliveryPort {
  private readonly serverUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(opts: HttpDeliveryPortOptions) {
    this.serverUrl = opts.serverUrl.replace(/\/+$/, "");
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.log = opts.logger ?? createLogger("warn");
    this.ownsDispatcher = opts.dispatcher === undefined;
    this.dispatcher = opts.dispatcher ?? new Agent({ keepAliveTimeout: 10_000 });
  }

  async send(serializedEntry: string, signal?: AbortSignal): Promise<DeliveryReceipt> {
    const url = `${this.serverUrl}${INGEST_PATH}`;

    this.log.debug("Sending log record", { url, bytes: serializedEntry.length });

    const { status, body } = await this.call(url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.apiKey}`,
      },
      body: serializedEntry,
      signal,
    });

    if (status === 200 || status === 201) {
      return parseReceipt(body);
    }

    const error = DeliveryError.fromStatus(status, body);
    if (error.code === ErrorCode.SERVER_ERROR) {
      this.log.warn(`Server error (will retry): HTTP ${status}`, { status, url });
    } else if (error.code === ErrorCode.RATE_LIMITED) {
      this.log.warn(`Rate limited (will retry): HTTP ${status}`, { status, url });
    } else if (error.code === ErrorCode.AUTH_ERROR) {
      this.log.error(`Authentication/authorization error: HTTP ${status}`, {
        status,
        url,
        hint: "Check your API key",
      });
    } else {
      this.log.error(`Client error: HTTP ${status}`, { status, url });
    }
    throw error;
  }

  /** `GET /health`; resolves with the trimmed body on 200. */
  async health(): Promise<string> {
    const { status, body } = await this.call(`${this.serverUrl}/health`, { method: "GET" });
    if (status !== 200) {
      throw DeliveryError.fromStatus(status, body);
    }
    return body.trim();
  }

  /** `GET /version`; resolves with the parsed JSON object on 200. */
  async version(): Promise<Record<string, unknown>> {
    const { status, body } = await this.call(`${this.serverUrl}/version`, { method: "GET" });
    if (status !== 200) {
      throw DeliveryError.fromStatus(status, body);
    }
    const parsed: unknown = safeJson(body);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new DeliveryError("Invalid version response", ErrorCode.DELIVERY_FAILED, { status });
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async call(
    url: string,
    opts: {
      method: "GET" | "POST";
      headers?: Record<string, string>;
      body?: string;
      signal?: AbortSignal;
    }
  ): Promise<{ status: number; body: string }> {
    try {
      const res = await request(url, {
        method: opts.method,
        headers: { "user-agent": USER_AGENT, ...opts.headers },
        body: opts.body,
        signal: opts.signal,
        dispatcher: this.dispatcher,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      const body = await res.body.text();
      return { status: res.statusCode, body };
    } catch (err) {
      if (opts.signal?.aborted) throw err;
      throw wrapNetworkError(err);
    }
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseReceipt(body: string): DeliveryReceipt {
  if (!body.trim()) return { success: true };

  const parsed = DeliveryReceiptSchema.safeParse(safeJson(body));
  if (!parsed.success) {
    throw new DeliveryError("Invalid ingest response", ErrorCode.DELIVERY_FAILED, {
      details: { body: body.slice(0, 200) },
    });
  }
  return parsed.data;
}

function wrapNetworkError(err: unknown): DeliveryError {
  if (err instanceof DeliveryError) return err;

  const code: unknown = err instanceof Error ? Reflect.get(err, "code") : undefined;
  if (typeof code === "string" && TIMEOUT_CODES.has(code)) {
    return new DeliveryError(`Request timeout: ${errorMessage(err)}`, ErrorCode.TIMEOUT, {
      cause: err,
    });
  }
  if (isRetryable(err)) {
    return new DeliveryError(`Network error: ${errorMessage(err)}`, ErrorCode.NETWORK_ERROR, {
      cause: err,
    });
  }
  return new DeliveryError(`Failed to send log entry: ${errorMessage(err)}`, ErrorCode.DELIVERY_FAILED, {
    cause: err,
  });
}
