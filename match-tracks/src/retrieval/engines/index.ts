/**
 * Search-engine backends used by the engine fallback strategy.
 */

import type { EngineConfig } from "../../config/types.js";
import type { EngineProvider } from "./provider.js";
import { BraveSearchProvider } from "./providers/brave.js";
import { SerperProvider } from "./providers/serper.js";
import { DuckDuckGoProvider } from "./providers/duckduckgo.js";

/**
 * Create an engine provider from configuration.
 *
 * @param http User agent and timeout for providers that fetch pages directly
 * @throws Error if provider is not supported
 */
export function createEngineProvider(
  config: Readonly<EngineConfig>,
  http: { userAgent: string; timeoutMs: number }
): EngineProvider {
  switch (config.provider) {
    case "brave":
      return new BraveSearchProvider(config);
    case "serper":
      return new SerperProvider(config);
    case "duckduckgo":
      return new DuckDuckGoProvider(config, http);
    default:
      throw new Error(`Unsupported search engine provider: ${String(config.provider)}`);
  }
}

export type { EngineProvider } from "./provider.js";
export type { EngineSearchRequest, EngineSearchResult } from "./types.js";
