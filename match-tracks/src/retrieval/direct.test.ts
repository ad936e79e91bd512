import { describe, it, expect, vi, afterEach } from "vitest";
import { DirectSearchStrategy, searchUrl } from "./direct.js";
import { RateLimiter } from "./rate-limiter.js";
import { resolveConfig } from "../config/config.js";
import { logger } from "../utils/logger.js";

logger.setQuiet(true);

const config = resolveConfig({});
const query = { text: "Never Sleep Again Example Artist", strategy: "direct" as const, rank: 0 };

describe("searchUrl", () => {
  it("puts the query in the q parameter", () => {
    expect(searchUrl(config.catalog, "a b&c")).toBe(
      "https://www.beatport.com/search/tracks?q=a+b%26c"
    );
  });
});

describe("DirectSearchStrategy", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the search page as one document", async () => {
    const fetchMock = vi.fn(async () => new Response("<html>results</html>"));
    vi.stubGlobal("fetch", fetchMock);
    const strategy = new DirectSearchStrategy(config.catalog, true, new RateLimiter(config.rateLimits));

    const response = await strategy.fetch(query);

    expect(response.ok).toBe(true);
    expect(response.strategy).toBe("direct");
    expect(response.documents).toEqual([
      {
        url: "https://www.beatport.com/search/tracks?q=Never+Sleep+Again+Example+Artist",
        contentType: "html",
        body: "<html>results</html>",
      },
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports failures in the response instead of throwing", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("", { status: 500, statusText: "Server Error" })));
    const strategy = new DirectSearchStrategy(config.catalog, true, new RateLimiter(config.rateLimits));

    const response = await strategy.fetch(query);

    expect(response.ok).toBe(false);
    expect(response.retryable).toBe(true);
    expect(response.documents).toEqual([]);
    expect(response.error).toContain("HTTP 500");
  });

  it("is unavailable when disabled", () => {
    const strategy = new DirectSearchStrategy(config.catalog, false, new RateLimiter(config.rateLimits));
    expect(strategy.isAvailable()).toBe(false);
  });
});
