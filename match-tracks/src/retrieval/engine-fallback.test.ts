import { describe, it, expect, vi, afterEach } from "vitest";
import { EngineFallbackStrategy, catalogTrackUrls } from "./engine-fallback.js";
import type { EngineProvider, EngineSearchResult } from "./engines/index.js";
import { RateLimiter } from "./rate-limiter.js";
import { resolveConfig } from "../config/config.js";
import type { EngineProviderName } from "../config/types.js";
import { logger } from "../utils/logger.js";

logger.setQuiet(true);

const config = resolveConfig({});
const query = { text: "Never Sleep Again", strategy: "engine" as const, rank: 0 };
const TRACK_URL = "https://www.beatport.com/track/never-sleep-again/123";

function stubProvider(
  name: EngineProviderName,
  search: () => Promise<EngineSearchResult[]>
): EngineProvider & { calls: number } {
  const provider = {
    calls: 0,
    getName: () => name,
    search: async () => {
      provider.calls++;
      return search();
    },
  };
  return provider;
}

function hit(url: string): EngineSearchResult {
  return { title: "hit", url, description: "" };
}

function makeStrategy(providers: EngineProvider[], clock: () => number = Date.now) {
  return new EngineFallbackStrategy(
    providers,
    config.strategies.engine,
    config.catalog,
    new RateLimiter(config.rateLimits),
    clock
  );
}

describe("catalogTrackUrls", () => {
  it("keeps catalog track pages and canonicalizes them", () => {
    const urls = catalogTrackUrls(
      [
        hit("https://beatport.com/track/never-sleep-again/123/"),
        hit("https://www.beatport.com/release/never-sleep-again/999"),
        hit("https://example.test/track/x/1"),
        hit("https://www.beatport.com/de/track/other/456"),
        hit("not a url"),
        hit("https://www.beatport.com/track/never-sleep-again/123"),
      ],
      "https://www.beatport.com"
    );
    expect(urls).toEqual([
      "https://www.beatport.com/track/never-sleep-again/123",
      "https://www.beatport.com/de/track/other/456",
    ]);
  });
});

describe("EngineFallbackStrategy", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("fetches track pages from the first backend with hits", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html>track</html>")));
    const empty = stubProvider("brave", async () => []);
    const good = stubProvider("duckduckgo", async () => [hit(TRACK_URL)]);
    const unused = stubProvider("serper", async () => [hit(TRACK_URL)]);

    const response = await makeStrategy([empty, good, unused]).fetch(query);

    expect(response.ok).toBe(true);
    expect(response.documents).toEqual([
      { url: TRACK_URL, contentType: "html", body: "<html>track</html>" },
    ]);
    expect(unused.calls).toBe(0);
  });

  it("tries the last successful backend first", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html></html>")));
    const first = stubProvider("brave", async () => []);
    const second = stubProvider("serper", async () => [hit(TRACK_URL)]);
    const strategy = makeStrategy([first, second]);

    await strategy.fetch(query);
    expect(strategy.rotation().map((p) => p.getName())).toEqual(["serper", "brave"]);
  });

  it("skips a failing backend until its cooldown ends", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html></html>")));
    let now = 0;
    const broken = stubProvider("brave", async () => {
      throw new Error("quota exceeded");
    });
    const good = stubProvider("duckduckgo", async () => [hit(TRACK_URL)]);
    const strategy = makeStrategy([broken, good], () => now);

    await strategy.fetch(query);
    await strategy.fetch(query);
    expect(broken.calls).toBe(1);

    now += config.strategies.engine.failureCooldownMs;
    expect(strategy.rotation().map((p) => p.getName())).toContain("brave");
  });

  it("fails when every backend errors", async () => {
    const broken = stubProvider("brave", async () => {
      throw new Error("down");
    });
    const response = await makeStrategy([broken]).fetch(query);
    expect(response.ok).toBe(false);
    expect(response.retryable).toBe(false);
    expect(response.error).toBe("All search engines failed:\n  brave: down");
  });

  it("returns an empty result when no backend has track pages", async () => {
    const empty = stubProvider("duckduckgo", async () => [hit("https://example.test/")]);
    const response = await makeStrategy([empty]).fetch(query);
    expect(response.ok).toBe(true);
    expect(response.documents).toEqual([]);
  });

  it("searches with the site filter", async () => {
    const search = vi.fn(async () => []);
    const provider: EngineProvider = { getName: () => "duckduckgo", search };
    await makeStrategy([provider]).fetch(query);
    expect(search).toHaveBeenCalledWith(
      { query: "site:beatport.com/track Never Sleep Again" },
      undefined
    );
  });

  it("is unavailable without backends", () => {
    expect(makeStrategy([]).isAvailable()).toBe(false);
  });
});
