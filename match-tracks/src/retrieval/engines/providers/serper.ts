/**
 * Serper.dev API provider implementation.
 * Uses Google Search results via Serper.dev API.
 */

import { SerperClient } from "@agentic/serper";
import type { EngineProvider } from "../provider.js";
import type { EngineSearchRequest, EngineSearchResult } from "../types.js";
import type { EngineConfig, EngineProviderName } from "../../../config/types.js";

/**
 * Serper.dev provider using Google Search results.
 */
export class SerperProvider implements EngineProvider {
  private client: SerperClient;
  private maxResults: number;

  constructor(config: Readonly<EngineConfig>) {
    this.client = new SerperClient({
      apiKey: config.apiKey,
    });
    this.maxResults = config.maxResults ?? 10;
  }

  async search(request: EngineSearchRequest): Promise<EngineSearchResult[]> {
    const response = await this.client.search({
      q: request.query,
      num: request.count ?? this.maxResults,
    });

    return (response.organic ?? []).map((result) => ({
      title: result.title,
      url: result.link,
      description: result.snippet ?? "",
    }));
  }

  getName(): EngineProviderName {
    return "serper";
  }
}
