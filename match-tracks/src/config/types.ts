import type { StrategyTag } from "../model/types.js";

/** Catalog being matched against */
export interface CatalogConfig {
  /** Catalog origin, e.g. "https://www.beatport.com" */
  baseUrl: string;
  /** Search page path; the query goes in the `q` parameter */
  searchPath: string;
  userAgent: string;
  /** Per-request timeout */
  timeoutMs: number;
}

/** Score cut-offs, all on the 0-100 composite scale */
export interface ThresholdConfig {
  /** Minimum composite score for a guard-passing candidate to be accepted */
  minAcceptScore: number;
  /** Candidates at or above this (but not accepted) go to manual review */
  reviewFloor: number;
  /** An accepted candidate at or above this stops further query ranks */
  highConfidenceScore: number;
}

/**
 * Composite score weights. Fixed for a run so scores are reproducible.
 * composite = title * titleSim + artist * artistSim + remix adj + year adj
 */
export interface ScoringWeights {
  title: number;
  artist: number;
  /** Maximum bonus when both sides carry the same remix label */
  remixBonus: number;
  /** Penalty when only one side carries a remix label */
  remixPenalty: number;
  /** Bonus for a release year equal to the source year hint */
  yearBonus: number;
}

export interface GuardConfig {
  /** Title similarity (0-100) below which a candidate is vetoed */
  titleSimFloor: number;
  /** Fraction (0-1) of significant source title tokens the candidate must contain */
  minTitleTokenCoverage: number;
  /** Remix labels with similarity at or above this are the same remix */
  remixLabelMatchThreshold: number;
}

export interface EscalationConfig {
  /** Remix tracks escalate while fewer candidates than this were found at a rank */
  minCandidates: number;
}

/** How mix/remix labels are recognised */
export interface RemixDetectionConfig {
  /** Words that mark a parenthetical as a mix label */
  mixKeywords: string[];
  /** Labels that mean "not a remix" (e.g. "original mix") */
  neutralLabels: string[];
}

export type EngineProviderName = "brave" | "serper" | "duckduckgo";

/** One third-party search backend */
export interface EngineConfig {
  provider: EngineProviderName;
  /** Required for brave and serper */
  apiKey?: string;
  /** Results requested per search (default: 10) */
  maxResults?: number;
}

export interface DirectStrategyConfig {
  enabled: boolean;
}

export interface EngineStrategyConfig {
  enabled: boolean;
  /** Backends in rotation order */
  engines: EngineConfig[];
  /** Prefix restricting results to catalog track pages */
  siteFilter: string;
  /** Track pages fetched per engine result set */
  maxPagesPerQuery: number;
  /** How long a failing backend is skipped */
  failureCooldownMs: number;
}

export interface BrowserStrategyConfig {
  enabled: boolean;
  /** Chromium/Chrome binary; the strategy is unavailable without one */
  executablePath?: string;
  /** Concurrent browser contexts */
  maxContexts: number;
  timeoutMs: number;
}

export interface StrategiesConfig {
  direct: DirectStrategyConfig;
  engine: EngineStrategyConfig;
  browser: BrowserStrategyConfig;
}

/** Per-strategy request throttling */
export interface RateLimitConfig {
  concurrency: number;
  /** Requests allowed per interval */
  intervalCap: number;
  intervalMs: number;
}

export interface RetryConfig {
  /** Delay before the single retry of a failed fetch */
  backoffMs: number;
}

export interface CacheConfig {
  enabled: boolean;
  /** Persist entries under this directory; memory-only when unset */
  directory?: string;
  ttlSeconds: number;
}

export interface LimitsConfig {
  /** Highest number of query ranks issued per track */
  maxRanks: number;
  /** Stop issuing ranks for a track after this long (0 = no budget) */
  perTrackTimeBudgetMs: number;
}

/** Top-level config file schema */
export interface MatchConfig {
  catalog: CatalogConfig;
  thresholds: ThresholdConfig;
  weights: ScoringWeights;
  guards: GuardConfig;
  escalation: EscalationConfig;
  remixDetection: RemixDetectionConfig;
  strategies: StrategiesConfig;
  rateLimits: Record<StrategyTag, RateLimitConfig>;
  retry: RetryConfig;
  /** Tracks processed in parallel */
  concurrency: number;
  cache: CacheConfig;
  limits: LimitsConfig;
}

/** Partial config as read from a file; each section is merged over defaults */
export interface MatchConfigOverride {
  catalog?: Partial<CatalogConfig>;
  thresholds?: Partial<ThresholdConfig>;
  weights?: Partial<ScoringWeights>;
  guards?: Partial<GuardConfig>;
  escalation?: Partial<EscalationConfig>;
  remixDetection?: Partial<RemixDetectionConfig>;
  strategies?: {
    direct?: Partial<DirectStrategyConfig>;
    engine?: Partial<EngineStrategyConfig>;
    browser?: Partial<BrowserStrategyConfig>;
  };
  rateLimits?: Partial<Record<StrategyTag, Partial<RateLimitConfig>>>;
  retry?: Partial<RetryConfig>;
  concurrency?: number;
  cache?: Partial<CacheConfig>;
  limits?: Partial<LimitsConfig>;
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** The frozen configuration threaded through a run */
export type RunConfig = DeepReadonly<MatchConfig>;

/** CLI flags */
export interface CliFlags {
  config?: string;
  output?: string;
  concurrency?: number;
  cache: boolean;
  debug: boolean;
}
