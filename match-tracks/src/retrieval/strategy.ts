import type { Query, RawDocument, RawResponse, StrategyTag } from "../model/types.js";
import { RetrievalError, errorMessage } from "../errors.js";
import type { RateLimiter } from "./rate-limiter.js";
import { CANCELLED } from "./http.js";

/**
 * Common capability of every retrieval strategy. `fetch` never throws for
 * network or format problems; it returns a RawResponse with `ok: false`.
 */
export interface RetrievalStrategy {
  readonly tag: StrategyTag;
  readonly description: string;

  /** Whether the strategy can run at all (enabled, configured, not broken) */
  isAvailable(): boolean;

  fetch(query: Query, signal?: AbortSignal): Promise<RawResponse>;

  /** Release held resources at the end of a run */
  close?(): Promise<void>;
}

/**
 * Shared envelope for strategies: throttling through the rate limiter,
 * timing, and turning thrown errors into failed responses.
 */
export abstract class ThrottledStrategy implements RetrievalStrategy {
  abstract readonly tag: StrategyTag;
  abstract readonly description: string;

  constructor(
    private readonly limiter: RateLimiter,
    private readonly now: () => number = Date.now
  ) {}

  abstract isAvailable(): boolean;

  /** Produce the documents for a query; may throw */
  protected abstract retrieve(query: Query, signal?: AbortSignal): Promise<RawDocument[]>;

  async fetch(query: Query, signal?: AbortSignal): Promise<RawResponse> {
    const started = this.now();
    const base = {
      query: { ...query, strategy: this.tag },
      strategy: this.tag,
      fetchedAt: new Date(started).toISOString(),
    };

    try {
      const documents = await this.limiter.schedule(
        this.tag,
        () => this.retrieve(query, signal),
        signal
      );
      return { ...base, latencyMs: this.now() - started, ok: true, documents };
    } catch (error) {
      const cancelled = signal?.aborted === true;
      return {
        ...base,
        latencyMs: this.now() - started,
        ok: false,
        error: cancelled ? CANCELLED : errorMessage(error),
        retryable: !cancelled && error instanceof RetrievalError && error.retryable,
        documents: [],
      };
    }
  }
}
