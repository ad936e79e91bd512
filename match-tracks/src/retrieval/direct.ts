import type { RunConfig } from "../config/types.js";
import type { Query, RawDocument } from "../model/types.js";
import type { RateLimiter } from "./rate-limiter.js";
import { ThrottledStrategy } from "./strategy.js";
import { fetchText } from "./http.js";

/**
 * Catalog search URL for a query
 */
export function searchUrl(catalog: RunConfig["catalog"], text: string): string {
  const url = new URL(catalog.searchPath, catalog.baseUrl);
  url.searchParams.set("q", text);
  return url.toString();
}

/**
 * One request against the catalog's own search page.
 */
export class DirectSearchStrategy extends ThrottledStrategy {
  readonly tag = "direct";
  readonly description = "catalog search page";

  constructor(
    private readonly catalog: RunConfig["catalog"],
    private readonly enabled: boolean,
    limiter: RateLimiter
  ) {
    super(limiter);
  }

  isAvailable(): boolean {
    return this.enabled;
  }

  protected async retrieve(query: Query, signal?: AbortSignal): Promise<RawDocument[]> {
    const result = await fetchText(searchUrl(this.catalog, query.text), {
      strategy: this.tag,
      timeoutMs: this.catalog.timeoutMs,
      headers: { "User-Agent": this.catalog.userAgent, Accept: "text/html" },
      signal,
    });
    return [{ url: result.url, contentType: result.contentType, body: result.body }];
  }
}
