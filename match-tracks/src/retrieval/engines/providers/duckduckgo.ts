/**
 * DuckDuckGo HTML endpoint provider. Needs no API key.
 */

import * as cheerio from "cheerio";
import type { EngineProvider } from "../provider.js";
import type { EngineSearchRequest, EngineSearchResult } from "../types.js";
import type { EngineConfig, EngineProviderName } from "../../../config/types.js";
import { fetchText } from "../../http.js";

const ENDPOINT = "https://html.duckduckgo.com/html/";

/**
 * Result links point at a DuckDuckGo redirect carrying the target in `uddg`.
 */
export function resolveResultUrl(href: string): string | undefined {
  if (!href) return undefined;
  try {
    const url = new URL(href, "https://duckduckgo.com");
    const target = url.searchParams.get("uddg");
    if (target) return target;
    return url.hostname.endsWith("duckduckgo.com") ? undefined : url.toString();
  } catch {
    return undefined;
  }
}

/**
 * Parse the result list of a DuckDuckGo HTML page.
 */
export function parseResults(html: string): EngineSearchResult[] {
  const $ = cheerio.load(html);
  const results: EngineSearchResult[] = [];
  $(".result").each((_, el) => {
    const link = $(el).find("a.result__a").first();
    const url = resolveResultUrl(link.attr("href") ?? "");
    if (!url) return;
    results.push({
      title: link.text().trim(),
      url,
      description: $(el).find(".result__snippet").text().replace(/\s+/g, " ").trim(),
    });
  });
  return results;
}

export class DuckDuckGoProvider implements EngineProvider {
  private maxResults: number;

  constructor(
    config: Readonly<EngineConfig>,
    private readonly http: { userAgent: string; timeoutMs: number }
  ) {
    this.maxResults = config.maxResults ?? 10;
  }

  async search(request: EngineSearchRequest, signal?: AbortSignal): Promise<EngineSearchResult[]> {
    const url = `${ENDPOINT}?${new URLSearchParams({ q: request.query })}`;
    const page = await fetchText(url, {
      strategy: "engine",
      timeoutMs: this.http.timeoutMs,
      headers: { "User-Agent": this.http.userAgent },
      signal,
    });
    return parseResults(page.body).slice(0, request.count ?? this.maxResults);
  }

  getName(): EngineProviderName {
    return "duckduckgo";
  }
}
