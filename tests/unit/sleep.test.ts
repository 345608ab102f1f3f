import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MAX_TIMER_MS, sleep } from "../../src/shared/utils/sleep.js";

describe("sleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves true after the full delay", async () => {
    let settled: boolean | undefined;
    const pending = sleep(1000).then((v) => {
      settled = v;
      return v;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    expect(await pending).toBe(true);
  });

  it("resolves false at once for an already-aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(1000, controller.signal)).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("resolves false as soon as the signal aborts and clears the timer", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);

    await vi.advanceTimersByTimeAsync(300);
    controller.abort();

    await expect(pending).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("ignores an abort that comes after the delay elapsed", async () => {
    const controller = new AbortController();
    const pending = sleep(100, controller.signal);

    await vi.advanceTimersByTimeAsync(100);
    controller.abort();

    await expect(pending).resolves.toBe(true);
  });

  it("treats a negative delay as zero", async () => {
    const pending = sleep(-5);
    await vi.advanceTimersByTimeAsync(1);
    await expect(pending).resolves.toBe(true);
  });

  it("waits out delays longer than the timer limit in chunks", async () => {
    let settled: boolean | undefined;
    const pending = sleep(MAX_TIMER_MS + 1000).then((v) => {
      settled = v;
      return v;
    });

    await vi.advanceTimersByTimeAsync(MAX_TIMER_MS);
    expect(settled).toBeUndefined();
    expect(vi.getTimerCount()).toBe(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(await pending).toBe(true);
  });
});
