import Transport from "winston-transport";
import type { Pipeline } from "../pipeline/pipeline";
import { Severity } from "../types";

/** winston npm and syslog level names folded onto pipeline severities. */
const LEVEL_MAP: Readonly<Record<string, Severity>> = {
  emerg: Severity.FATAL,
  alert: Severity.FATAL,
  fatal: Severity.FATAL,
  crit: Severity.ERROR,
  error: Severity.ERROR,
  warning: Severity.WARN,
  warn: Severity.WARN,
  notice: Severity.INFO,
  info: Severity.INFO,
  http: Severity.INFO,
  verbose: Severity.DEBUG,
  debug: Severity.DEBUG,
  silly: Severity.DEBUG,
};

export function severityForLevel(level: string): Severity {
  return LEVEL_MAP[level.toLowerCase()] ?? Severity.INFO;
}

export interface PipelineTransportOptions extends Transport.TransportStreamOptions {
  pipeline: Pipeline;
}

interface WinstonInfo {
  level: string;
  message?: unknown;
  stack?: unknown;
}

/**
 * winston transport that ships every log call through a {@link Pipeline}.
 *
 * ```ts
 * const logger = winston.createLogger({
 *   transports: [new PipelineTransport({ pipeline })],
 * });
 * ```
 */
export class PipelineTransport extends Transport {
  private readonly pipeline: Pipeline;

  constructor(opts: PipelineTransportOptions) {
    const { pipeline, ...rest } = opts;
    super(rest);
    this.pipeline = pipeline;
  }

  override log(info: WinstonInfo, callback: () => void): void {
    const severity = severityForLevel(info.level);
    void this.pipeline.submit(formatMessage(info), severity).then(
      () => {
        this.emit("logged", info);
        callback();
      },
      (err: unknown) => {
        this.emit("warn", err);
        callback();
      }
    );
  }
}

function formatMessage(info: WinstonInfo): string {
  const text = typeof info.message === "string" ? info.message : JSON.stringify(info.message ?? "");
  return typeof info.stack === "string" ? `${text}\n${info.stack}` : text;
}
