import type { StrategyTag } from "../model/types.js";
import { RetrievalError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";

/** Failure text used when the run is cancelled */
export const CANCELLED = "cancelled";

export interface HttpRequestOptions {
  strategy: StrategyTag;
  timeoutMs: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface HttpResult {
  url: string;
  status: number;
  contentType: "html" | "json";
  body: string;
}

/**
 * GET a URL as text.
 *
 * Network errors, timeouts, 5xx and 429 are retryable; other HTTP errors are
 * not. Aborting the signal fails with a non-retryable "cancelled" error.
 *
 * @throws RetrievalError
 */
export async function fetchText(url: string, options: HttpRequestOptions): Promise<HttpResult> {
  const { strategy, timeoutMs, headers, signal } = options;
  if (signal?.aborted) {
    throw new RetrievalError(CANCELLED, strategy, false);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = (): void => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  logger.logCurl("GET", url, headers);

  try {
    const response = await fetch(url, { headers, signal: controller.signal, redirect: "follow" });
    if (!response.ok) {
      const retryable = response.status >= 500 || response.status === 429;
      throw new RetrievalError(
        `HTTP ${response.status} ${response.statusText} for ${url}`,
        strategy,
        retryable,
        response.status
      );
    }
    const body = await response.text();
    const type = response.headers.get("content-type") ?? "";
    return {
      url: response.url || url,
      status: response.status,
      contentType: type.includes("json") ? "json" : "html",
      body,
    };
  } catch (error) {
    if (error instanceof RetrievalError) throw error;
    if (signal?.aborted) {
      throw new RetrievalError(CANCELLED, strategy, false);
    }
    if (timedOut) {
      throw new RetrievalError(`Timed out after ${timeoutMs}ms: ${url}`, strategy, true);
    }
    throw new RetrievalError(`Request failed for ${url}: ${errorMessage(error)}`, strategy, true);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}
