/**
 * Brave Search API provider implementation.
 */

import { BraveSearch } from "brave-search";
import type { EngineProvider } from "../provider.js";
import type { EngineSearchRequest, EngineSearchResult } from "../types.js";
import type { EngineConfig, EngineProviderName } from "../../../config/types.js";

/**
 * Brave Search provider using the official Brave Search API.
 */
export class BraveSearchProvider implements EngineProvider {
  private client: BraveSearch;
  private maxResults: number;

  constructor(config: Readonly<EngineConfig>) {
    this.client = new BraveSearch(config.apiKey ?? "");
    this.maxResults = config.maxResults ?? 10;
  }

  async search(request: EngineSearchRequest): Promise<EngineSearchResult[]> {
    const response = await this.client.webSearch(request.query, {
      count: request.count ?? this.maxResults,
    });

    return (response.web?.results ?? []).map((result) => ({
      title: result.title,
      url: result.url,
      description: result.description,
    }));
  }

  getName(): EngineProviderName {
    return "brave";
  }
}
