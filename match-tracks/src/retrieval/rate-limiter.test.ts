import { describe, it, expect } from "vitest";
import { RateLimiter } from "./rate-limiter.js";

const limits = {
  direct: { concurrency: 1, intervalCap: 10, intervalMs: 0 },
  engine: { concurrency: 2, intervalCap: 10, intervalMs: 0 },
  browser: { concurrency: 1, intervalCap: 10, intervalMs: 0 },
};

describe("RateLimiter", () => {
  it("returns the task result", async () => {
    const limiter = new RateLimiter(limits);
    await expect(limiter.schedule("engine", async () => 42)).resolves.toBe(42);
  });

  it("runs one task at a time for a strategy with concurrency 1", async () => {
    const limiter = new RateLimiter(limits);
    let running = 0;
    let peak = 0;
    const task = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    };

    await Promise.all([
      limiter.schedule("direct", task),
      limiter.schedule("direct", task),
      limiter.schedule("direct", task),
    ]);

    expect(peak).toBe(1);
  });

  it("never starts a task whose signal is already aborted", async () => {
    const limiter = new RateLimiter(limits);
    const controller = new AbortController();
    controller.abort();
    let started = false;

    await expect(
      limiter.schedule(
        "direct",
        async () => {
          started = true;
        },
        controller.signal
      )
    ).rejects.toThrow();
    expect(started).toBe(false);
  });
});
