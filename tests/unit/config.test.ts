import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULTS, readEnv, readYaml, resolveConfig } from "../../src/config";
import { ConfigError } from "../../src/errors";

const required = {
  serverUrl: "https://ingest.example.test",
  node: "web-01",
  apiKey: "test-api-key",
  secret: "test-secret",
};

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("resolveConfig", () => {
  it("fills defaults around the required fields", () => {
    const cfg = resolveConfig(required, {});

    expect(cfg).toEqual({ ...DEFAULTS, ...required });
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it("ignores user fields that are explicitly undefined", () => {
    const cfg = resolveConfig({ ...required, queueSize: undefined }, {});
    expect(cfg.queueSize).toBe(1000);
  });

  it("reads CIPHERSHIP_* variables", () => {
    const cfg = resolveConfig(
      {},
      {
        CIPHERSHIP_SERVER_URL: "http://localhost:8080",
        CIPHERSHIP_NODE: "env-node",
        CIPHERSHIP_API_KEY: "test-api-key",
        CIPHERSHIP_SECRET: "test-secret",
        CIPHERSHIP_QUEUE_SIZE: "50",
        CIPHERSHIP_FAILSAFE_MODE: "no",
        CIPHERSHIP_JITTER_ENABLED: "YES",
        CIPHERSHIP_BACKOFF_FACTOR: "1.5",
        CIPHERSHIP_LOG_LEVEL: "debug",
      }
    );

    expect(cfg.serverUrl).toBe("http://localhost:8080");
    expect(cfg.node).toBe("env-node");
    expect(cfg.queueSize).toBe(50);
    expect(cfg.failsafe).toBe(false);
    expect(cfg.jitter).toBe(true);
    expect(cfg.backoffFactor).toBe(1.5);
    expect(cfg.logLevel).toBe("debug");
  });

  it("lets the caller's object override the environment", () => {
    const cfg = resolveConfig({ ...required, workerCount: 4 }, { CIPHERSHIP_WORKER_COUNT: "8" });
    expect(cfg.workerCount).toBe(4);
  });

  it("collects every validation issue", () => {
    const issues = issuesOf(() =>
      resolveConfig(
        {
          ...required,
          serverUrl: "ftp://ingest.example.test",
          node: "n".repeat(256),
          queueSize: 0,
          backoffFactor: 0.5,
        },
        {}
      )
    );

    expect(issues).toEqual([
      "serverUrl: serverUrl must start with 'http://' or 'https://'",
      "node: node exceeds maximum length of 255 characters",
      "queueSize: queueSize must be positive",
      "backoffFactor: backoffFactor must be >= 1.0",
    ]);
  });

  it("rejects blank required fields", () => {
    const issues = issuesOf(() => resolveConfig({ ...required, apiKey: "  " }, {}));
    expect(issues).toEqual(["apiKey: apiKey cannot be empty"]);
  });

  it("rejects numeric variables that do not parse", () => {
    expect(() => resolveConfig(required, { CIPHERSHIP_QUEUE_SIZE: "lots" })).toThrow(ConfigError);
  });
});

describe("readEnv", () => {
  it("skips blank values", () => {
    expect(readEnv({ CIPHERSHIP_NODE: "  ", CIPHERSHIP_MAX_RETRIES: "3" })).toEqual({
      maxRetries: 3,
    });
  });
});

describe("YAML file", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ciphership-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("sits between defaults and the environment", () => {
    const file = path.join(dir, "ciphership.yaml");
    fs.writeFileSync(
      file,
      ["serverUrl: https://from-file.example.test", "node: file-node", "queueSize: 25", "workerCount: 3"].join(
        "\n"
      )
    );

    const cfg = resolveConfig(
      { apiKey: "test-api-key", secret: "test-secret" },
      { CIPHERSHIP_RC: file, CIPHERSHIP_WORKER_COUNT: "6" }
    );

    expect(cfg.serverUrl).toBe("https://from-file.example.test");
    expect(cfg.node).toBe("file-node");
    expect(cfg.queueSize).toBe(25);
    expect(cfg.workerCount).toBe(6);
  });

  it("contributes nothing when missing or not a mapping", () => {
    expect(readYaml(path.join(dir, "absent.yaml"))).toEqual({});

    const list = path.join(dir, "list.yaml");
    fs.writeFileSync(list, "- a\n- b\n");
    expect(readYaml(list)).toEqual({});
  });
});
