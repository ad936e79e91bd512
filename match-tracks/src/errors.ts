import type { StrategyTag } from "./model/types.js";

/**
 * Invalid thresholds, weights or strategy settings.
 * The only error that aborts a run, and only before any track is processed.
 */
export class ConfigurationError extends Error {
  constructor(public problems: string[]) {
    super(
      `Invalid configuration:\n${problems.map((p) => `  - ${p}`).join("\n")}`
    );
    this.name = "ConfigurationError";
  }
}

/** Network, timeout or HTTP failure while fetching for a query */
export class RetrievalError extends Error {
  constructor(
    message: string,
    public strategy: StrategyTag,
    public retryable: boolean,
    public status?: number
  ) {
    super(message);
    this.name = "RetrievalError";
  }
}

/** A response document did not have the shape an extraction path expected */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public documentUrl: string,
    public path: string
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

/** Cache storage is unavailable */
export class CacheError extends Error {
  constructor(
    message: string,
    public operation: "read" | "write" | "init",
    public cause?: unknown
  ) {
    super(message);
    this.name = "CacheError";
  }
}

/** Render any thrown value as a message */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
