import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { AppConfig } from "../../src/infrastructure/config/config.js";
import { createRetrierFromConfig } from "../../src/infrastructure/resilience/from-config.js";
import { type LogRecord, createRecordingLogger } from "../helpers/recording-logger.js";

const baseConfig: AppConfig = {
  retry: {
    retries: 2,
    backoff: "fixed",
    periodMs: 250,
    initDelayMs: 100,
    maxDelayMs: 400,
    factor: 3,
  },
  log: { level: "info", format: "json" },
};

describe("createRetrierFromConfig", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("installs a fixed backoff with the configured budget", () => {
    const retrier = createRetrierFromConfig(baseConfig);

    expect(retrier.retries).toBe(2);
    expect(retrier.backoff).toMatchObject({ kind: "fixed", periodMs: 250 });
  });

  it("installs an exponential backoff when selected", () => {
    const retrier = createRetrierFromConfig({
      ...baseConfig,
      retry: { ...baseConfig.retry, backoff: "exponential", retries: -1 },
    });

    expect(retrier.unlimited).toBe(true);
    expect(retrier.backoff).toMatchObject({
      kind: "exponential",
      initDelayMs: 100,
      maxDelayMs: 400,
      factor: 3,
    });
    expect([1, 2, 3].map((a) => retrier.backoff.computeDelay(a))).toEqual([100, 300, 400]);
  });

  it("logs failures through a child logger when one is given", async () => {
    const records: LogRecord[] = [];
    const retrier = createRetrierFromConfig(baseConfig, createRecordingLogger(records));

    const pending = retrier.execute(new AbortController().signal, () =>
      Promise.reject(new Error("unavailable")),
    );
    await vi.runAllTimersAsync();
    const result = await pending;

    expect(result.ok).toBe(false);
    expect(records.map((r) => r.level)).toEqual(["warn", "warn", "error"]);
    expect(records[0]?.meta).toEqual({
      component: "retrier",
      attempt: 1,
      delayMs: 250,
      error: "unavailable",
    });
  });

  it("stays silent without a logger", async () => {
    const retrier = createRetrierFromConfig({
      ...baseConfig,
      retry: { ...baseConfig.retry, retries: 0 },
    });

    const result = await retrier.execute(new AbortController().signal, () => "ready");

    expect(result).toEqual({ ok: true, value: "ready" });
  });
});
