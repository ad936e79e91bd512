import { describe, it, expect, vi } from "vitest";
import { BrowserAutomationStrategy, type BrowserLauncher } from "./browser.js";
import { RateLimiter } from "./rate-limiter.js";
import { resolveConfig } from "../config/config.js";
import { logger } from "../utils/logger.js";

logger.setQuiet(true);

const query = { text: "Never Sleep Again", strategy: "browser" as const, rank: 0 };

function makeStrategy(enabled: boolean, executablePath?: string, launch: BrowserLauncher = vi.fn()) {
  const config = resolveConfig({ strategies: { browser: { enabled, executablePath } } });
  return new BrowserAutomationStrategy(
    config.strategies.browser,
    config.catalog,
    new RateLimiter(config.rateLimits),
    launch
  );
}

describe("BrowserAutomationStrategy", () => {
  it("is unavailable when disabled", () => {
    expect(makeStrategy(false, "/usr/bin/chromium").isAvailable()).toBe(false);
  });

  it("is unavailable without an executable", () => {
    expect(makeStrategy(true).isAvailable()).toBe(false);
  });

  it("is available when enabled with an executable", () => {
    expect(makeStrategy(true, "/usr/bin/chromium").isAvailable()).toBe(true);
  });

  it("disables itself after a failed launch", async () => {
    const launch = vi.fn(async () => {
      throw new Error("no such file");
    });
    const strategy = makeStrategy(true, "/missing/chromium", launch);

    const response = await strategy.fetch(query);

    expect(response.ok).toBe(false);
    expect(response.retryable).toBe(false);
    expect(response.error).toBe("Browser launch failed: no such file");
    expect(strategy.isAvailable()).toBe(false);
    expect(launch).toHaveBeenCalledWith("/missing/chromium");
  });
});
