/**
 * Core data model for catalog matching.
 * Values flow Planner -> Retrieval -> Extraction -> Scoring -> Adjudication.
 */

/** Retrieval strategy tags, in escalation order */
export type StrategyTag = "direct" | "engine" | "browser";

export const STRATEGY_ORDER: readonly StrategyTag[] = ["direct", "engine", "browser"];

/** A track from the local playlist. Never mutated after creation. */
export interface SourceTrack {
  readonly id: string;
  readonly title: string;
  /** Ordered, non-empty; the first entry is the primary artist */
  readonly artists: readonly string[];
  /** Remix/mix label, e.g. "Keinemusik Remix" */
  readonly remix?: string;
  /** Release-year hint */
  readonly year?: number;
}

/** A generated search string */
export interface Query {
  readonly text: string;
  /** Strategy this query is aimed at */
  readonly strategy: StrategyTag;
  /** Position in the planner sequence (0 = most specific) */
  readonly rank: number;
}

/** One fetched document inside a RawResponse */
export interface RawDocument {
  url: string;
  contentType: "html" | "json";
  body: string;
}

/** What a retrieval strategy returns for one Query */
export interface RawResponse {
  query: Query;
  strategy: StrategyTag;
  /** ISO timestamp of when the fetch started */
  fetchedAt: string;
  latencyMs: number;
  ok: boolean;
  /** Failure description when ok is false */
  error?: string;
  /** Whether a failure is worth one retry (timeouts, 5xx, 429) */
  retryable?: boolean;
  documents: RawDocument[];
}

/** A catalog listing extracted from a RawResponse */
export interface Candidate {
  catalogId: string;
  /** Normalized title with the mix label isolated out */
  title: string;
  /** Title as displayed by the catalog, including the mix */
  displayTitle: string;
  /** Normalized artist names */
  artists: string[];
  /** Normalized mix/remix label, if any */
  remix?: string;
  releaseDate?: string;
  label?: string;
  bpm?: number;
  key?: string;
  sourceUrl: string;
  /** Rank of the query that produced this candidate */
  queryRank: number;
}

export interface ScoreBreakdown {
  titleSimilarity: number;
  artistSimilarity: number;
  remixAdjustment: number;
  yearAdjustment: number;
}

export type ConfidenceLabel = "high" | "medium" | "low";

export interface ScoredCandidate {
  candidate: Candidate;
  /** Composite score in [0, 100] */
  score: number;
  breakdown: ScoreBreakdown;
  confidence: ConfidenceLabel;
}

/** Guard verdict for one scored candidate */
export type GuardVerdict =
  | { pass: true }
  | { pass: false; guard: GuardName; reason: string };

export type GuardName =
  | "title_sim_floor"
  | "title_token_coverage"
  | "remix_identity_conflict";

/** A scored candidate together with its guard verdict and acceptance */
export interface JudgedCandidate extends ScoredCandidate {
  verdict: GuardVerdict;
  accepted: boolean;
}

/** Terminal classification of a SourceTrack */
export type Disposition =
  | { kind: "matched"; candidate: JudgedCandidate }
  | { kind: "flagged"; candidates: JudgedCandidate[]; reasons: string[] }
  | { kind: "unmatched"; reason: string };

/** Persisted cache record */
export interface CacheEntry {
  key: CacheKey;
  response: RawResponse;
  /** Epoch milliseconds */
  createdAt: number;
}

export interface CacheKey {
  query: string;
  strategy: StrategyTag;
}
