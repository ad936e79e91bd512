/**
 * Search-engine backend interface.
 * All engine backends must implement this interface.
 */

import type { EngineProviderName } from "../../config/types.js";
import type { EngineSearchRequest, EngineSearchResult } from "./types.js";

/**
 * Interface for search backends (Brave, Serper, DuckDuckGo).
 */
export interface EngineProvider {
  /**
   * Execute a search query.
   * Throws on transport or API errors; an empty array means no hits.
   */
  search(request: EngineSearchRequest, signal?: AbortSignal): Promise<EngineSearchResult[]>;

  /**
   * Get the name of this provider (e.g., "brave", "serper").
   */
  getName(): EngineProviderName;
}
