import type { RunConfig } from "../config/types.js";
import type { StrategyTag } from "../model/types.js";
import { STRATEGY_ORDER } from "../model/types.js";
import { createEngineProvider } from "./engines/index.js";
import { RateLimiter } from "./rate-limiter.js";
import type { RetrievalStrategy } from "./strategy.js";
import { DirectSearchStrategy } from "./direct.js";
import { EngineFallbackStrategy } from "./engine-fallback.js";
import { BrowserAutomationStrategy } from "./browser.js";

/**
 * Build the strategies for a run, in escalation order, sharing one rate
 * limiter. Disabled strategies are still returned and report unavailable.
 */
export function createStrategies(config: RunConfig): RetrievalStrategy[] {
  const limiter = new RateLimiter(config.rateLimits);
  const { catalog, strategies } = config;
  const http = { userAgent: catalog.userAgent, timeoutMs: catalog.timeoutMs };

  const byTag: Record<StrategyTag, RetrievalStrategy> = {
    direct: new DirectSearchStrategy(catalog, strategies.direct.enabled, limiter),
    engine: new EngineFallbackStrategy(
      strategies.engine.engines.map((engine) => createEngineProvider(engine, http)),
      strategies.engine,
      catalog,
      limiter
    ),
    browser: new BrowserAutomationStrategy(strategies.browser, catalog, limiter),
  };
  return STRATEGY_ORDER.map((tag) => byTag[tag]);
}

export type { RetrievalStrategy } from "./strategy.js";
export { RateLimiter } from "./rate-limiter.js";
