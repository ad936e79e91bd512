import type { MatchConfig } from "./types.js";

/**
 * Default configuration values
 */
export const defaultConfig: MatchConfig = {
  catalog: {
    baseUrl: "https://www.beatport.com",
    searchPath: "/search/tracks",
    userAgent:
      "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
    timeoutMs: 10000,
  },
  thresholds: {
    minAcceptScore: 80,
    reviewFloor: 50,
    highConfidenceScore: 90,
  },
  weights: {
    title: 0.55,
    artist: 0.35,
    remixBonus: 15,
    remixPenalty: 15,
    yearBonus: 2,
  },
  guards: {
    titleSimFloor: 15,
    minTitleTokenCoverage: 0.5,
    remixLabelMatchThreshold: 85,
  },
  escalation: {
    minCandidates: 5,
  },
  remixDetection: {
    mixKeywords: [
      "remix",
      "mix",
      "edit",
      "dub",
      "rework",
      "refix",
      "re-fire",
      "refire",
      "vip",
      "bootleg",
      "flip",
      "version",
    ],
    neutralLabels: [
      "original mix",
      "original",
      "extended mix",
      "extended",
      "main mix",
      "radio edit",
      "club mix",
    ],
  },
  strategies: {
    direct: { enabled: true },
    engine: {
      enabled: true,
      engines: [{ provider: "duckduckgo" }],
      siteFilter: "site:beatport.com/track",
      maxPagesPerQuery: 8,
      failureCooldownMs: 5 * 60 * 1000,
    },
    browser: {
      enabled: false,
      maxContexts: 1,
      timeoutMs: 30000,
    },
  },
  rateLimits: {
    direct: { concurrency: 4, intervalCap: 4, intervalMs: 1000 },
    engine: { concurrency: 2, intervalCap: 2, intervalMs: 1000 },
    browser: { concurrency: 1, intervalCap: 1, intervalMs: 1000 },
  },
  retry: {
    backoffMs: 750,
  },
  concurrency: 4,
  cache: {
    enabled: true,
    ttlSeconds: 7 * 24 * 60 * 60,
  },
  limits: {
    maxRanks: 8,
    perTrackTimeBudgetMs: 0,
  },
};
