import { Registry, Histogram, Counter, Gauge } from "prom-client";

export const registry = new Registry();

export const encryptHist = new Histogram({
  name: "ciphership_encrypt_ms",
  help: "Latency of per-message key derivation plus AES-GCM encryption (ms)",
  buckets: [1, 5, 25, 100, 250, 500, 1000, 2500],
  registers: [registry],
});

export const deliveredCounter = new Counter({
  name: "ciphership_delivered_total",
  help: "Number of log records accepted by the ingest endpoint",
  registers: [registry],
});

export const deliveryFailures = new Counter({
  name: "ciphership_delivery_failures_total",
  help: "Number of log records given up on after retries or a fatal error",
  registers: [registry],
});

export const droppedCounter = new Counter({
  name: "ciphership_dropped_total",
  help: "Number of log records discarded because the queue was full",
  registers: [registry],
});

export const retryCounter = new Counter({
  name: "ciphership_retries_total",
  help: "Number of delivery retries scheduled after a transient failure",
  registers: [registry],
});

export const queueGauge = new Gauge({
  name: "ciphership_queue_depth",
  help: "Number of log records currently buffered in memory",
  registers: [registry],
});
