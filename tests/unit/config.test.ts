import { describe, expect, it } from "vitest";
import { ErrorCode } from "../../src/core/errors/app-error.js";
import { loadConfig } from "../../src/infrastructure/config/config.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const result = loadConfig({});

    expect(result).toEqual({
      ok: true,
      value: {
        retry: {
          retries: 3,
          backoff: "fixed",
          periodMs: 1000,
          initDelayMs: 1000,
          maxDelayMs: 30_000,
          factor: 2,
        },
        log: { level: "info", format: "pretty" },
      },
    });
  });

  it("coerces numeric environment values", () => {
    const result = loadConfig({
      RETRY_MAX_RETRIES: "-1",
      RETRY_BACKOFF: "exponential",
      RETRY_INIT_DELAY_MS: "500",
      RETRY_MAX_DELAY_MS: "900",
      RETRY_FACTOR: "1.5",
      LOG_LEVEL: "debug",
      LOG_FORMAT: "json",
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.retry).toMatchObject({
        retries: -1,
        backoff: "exponential",
        initDelayMs: 500,
        maxDelayMs: 900,
        factor: 1.5,
      });
      expect(result.value.log).toEqual({ level: "debug", format: "json" });
    }
  });

  it("rejects a factor below 1", () => {
    const result = loadConfig({ RETRY_FACTOR: "0.5" });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.VALIDATION);
      expect(Object.keys(result.error.details ?? {})).toEqual(["retry.factor"]);
    }
  });

  it("collects every invalid field", () => {
    const result = loadConfig({
      RETRY_MAX_RETRIES: "2.5",
      RETRY_BACKOFF: "linear",
      RETRY_PERIOD_MS: "soon",
      LOG_LEVEL: "verbose",
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(Object.keys(result.error.details ?? {}).sort()).toEqual([
        "log.level",
        "retry.backoff",
        "retry.periodMs",
        "retry.retries",
      ]);
    }
  });
});
