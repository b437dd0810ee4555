/**
 * Optional process-wide pipeline holder for applications that prefer a
 * `log(...)` call over passing a {@link Pipeline} around.
 *
 * Nothing inside the library reads this holder. `init` and `close` run one
 * at a time; re-initializing closes the previous pipeline first.
 */

import pLimit from "p-limit";
import { CiphershipError, ErrorCode } from "./errors";
import { Pipeline, type PipelineDeps } from "./pipeline/pipeline";
import { Severity, SeverityAlias, type PipelineInit } from "./types";

const mutex = pLimit(1);
let current: Pipeline | undefined;

export class NotInitializedError extends CiphershipError {
  constructor() {
    super("Pipeline not initialized. Call init() first.", ErrorCode.PIPELINE_CLOSED);
    this.name = "NotInitializedError";
  }
}

export function init(configOrPipeline: PipelineInit | Pipeline, deps?: PipelineDeps): Promise<Pipeline> {
  return mutex(async () => {
    const previous = current;
    current = undefined;
    if (previous) await previous.close();

    current =
      configOrPipeline instanceof Pipeline
        ? configOrPipeline
        : new Pipeline(configOrPipeline, deps);
    return current;
  });
}

export function isInitialized(): boolean {
  return current !== undefined;
}

export function getPipeline(): Pipeline {
  if (!current) throw new NotInitializedError();
  return current;
}

export function log(message: string, severity: Severity = Severity.INFO, timestamp?: Date): Promise<void> {
  return getPipeline().submit(message, severity, timestamp);
}

export const debug = (message: string): Promise<void> => log(message, Severity.DEBUG);
export const info = (message: string): Promise<void> => log(message, Severity.INFO);
export const notice = (message: string): Promise<void> => log(message, SeverityAlias.NOTICE);
export const warn = (message: string): Promise<void> => log(message, Severity.WARN);
export const warning = (message: string): Promise<void> => log(message, SeverityAlias.WARNING);
export const error = (message: string): Promise<void> => log(message, Severity.ERROR);
export const critical = (message: string): Promise<void> => log(message, SeverityAlias.CRITICAL);
export const alert = (message: string): Promise<void> => log(message, SeverityAlias.ALERT);
export const emergency = (message: string): Promise<void> => log(message, SeverityAlias.EMERGENCY);
export const fatal = (message: string): Promise<void> => log(message, Severity.FATAL);

export function flush(timeoutMs?: number): Promise<boolean> {
  return getPipeline().flush(timeoutMs);
}

/** Close and forget the held pipeline. A no-op when none is held. */
export function close(): Promise<void> {
  return mutex(async () => {
    const previous = current;
    current = undefined;
    if (previous) await previous.close();
  });
}
