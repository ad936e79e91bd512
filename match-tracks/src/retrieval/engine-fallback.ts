import type { RunConfig } from "../config/types.js";
import type { Query, RawDocument } from "../model/types.js";
import { RetrievalError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { EngineProvider, EngineSearchResult } from "./engines/index.js";
import type { RateLimiter } from "./rate-limiter.js";
import { ThrottledStrategy } from "./strategy.js";
import { CANCELLED, fetchText } from "./http.js";

const TRACK_PATH = /^\/(?:[a-z]{2}\/)?track\/[^/]+\/\d+\/?$/i;

function bareHost(hostname: string): string {
  return hostname.toLowerCase().replace(/^www\./, "");
}

/**
 * Canonical catalog track URLs among search hits, in hit order.
 */
export function catalogTrackUrls(
  results: readonly EngineSearchResult[],
  baseUrl: string
): string[] {
  const base = new URL(baseUrl);
  const urls: string[] = [];
  for (const result of results) {
    let url: URL;
    try {
      url = new URL(result.url);
    } catch {
      continue;
    }
    if (bareHost(url.hostname) !== bareHost(base.hostname)) continue;
    if (!TRACK_PATH.test(url.pathname)) continue;
    const canonical = `${base.origin}${url.pathname.replace(/\/$/, "")}`;
    if (!urls.includes(canonical)) urls.push(canonical);
  }
  return urls;
}

/**
 * Rotates through third-party search backends.
 *
 * The first backend whose hits include catalog track pages wins, and those
 * pages become the response documents. The last backend that worked is tried
 * first next time; a backend that errored is skipped until its cooldown ends.
 */
export class EngineFallbackStrategy extends ThrottledStrategy {
  readonly tag = "engine";
  readonly description = "search engine rotation";

  private preferred?: string;
  private failedAt = new Map<string, number>();

  constructor(
    private readonly providers: readonly EngineProvider[],
    private readonly settings: RunConfig["strategies"]["engine"],
    private readonly catalog: RunConfig["catalog"],
    limiter: RateLimiter,
    private readonly clock: () => number = Date.now
  ) {
    super(limiter, clock);
  }

  isAvailable(): boolean {
    return this.settings.enabled && this.providers.length > 0;
  }

  /** Backends in the order they will be tried, skipping those cooling down */
  rotation(): EngineProvider[] {
    const now = this.clock();
    const usable = this.providers.filter((p) => {
      const failed = this.failedAt.get(p.getName());
      return failed === undefined || now - failed >= this.settings.failureCooldownMs;
    });
    const preferred = usable.find((p) => p.getName() === this.preferred);
    return preferred ? [preferred, ...usable.filter((p) => p !== preferred)] : usable;
  }

  protected async retrieve(query: Query, signal?: AbortSignal): Promise<RawDocument[]> {
    const text = `${this.settings.siteFilter} ${query.text}`.trim();
    const rotation = this.rotation();
    if (rotation.length === 0) {
      throw new RetrievalError("All search engines are cooling down", this.tag, false);
    }

    const errors: string[] = [];
    for (const provider of rotation) {
      if (signal?.aborted) throw new RetrievalError(CANCELLED, this.tag, false);
      const name = provider.getName();

      let results: EngineSearchResult[];
      try {
        results = await provider.search({ query: text }, signal);
      } catch (error) {
        if (signal?.aborted) throw new RetrievalError(CANCELLED, this.tag, false);
        this.failedAt.set(name, this.clock());
        if (this.preferred === name) this.preferred = undefined;
        errors.push(`${name}: ${errorMessage(error)}`);
        logger.warn(`Search engine ${name} failed: ${errorMessage(error)}`);
        continue;
      }

      const urls = catalogTrackUrls(results, this.catalog.baseUrl);
      logger.debug(`${name}: ${results.length} hits, ${urls.length} track pages for "${text}"`);
      if (urls.length === 0) continue;

      this.preferred = name;
      return this.fetchPages(urls.slice(0, this.settings.maxPagesPerQuery), signal);
    }

    if (errors.length === rotation.length) {
      throw new RetrievalError(`All search engines failed:\n  ${errors.join("\n  ")}`, this.tag, false);
    }
    return [];
  }

  private async fetchPages(urls: string[], signal?: AbortSignal): Promise<RawDocument[]> {
    const documents: RawDocument[] = [];
    for (const url of urls) {
      try {
        const page = await fetchText(url, {
          strategy: this.tag,
          timeoutMs: this.catalog.timeoutMs,
          headers: { "User-Agent": this.catalog.userAgent, Accept: "text/html" },
          signal,
        });
        documents.push({ url: page.url, contentType: page.contentType, body: page.body });
      } catch (error) {
        if (signal?.aborted) throw error;
        logger.warn(`Skipping track page ${url}: ${errorMessage(error)}`);
      }
    }
    return documents;
  }
}
