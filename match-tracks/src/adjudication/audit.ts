import type {
  Disposition,
  GuardVerdict,
  JudgedCandidate,
  ScoreBreakdown,
  ConfidenceLabel,
  SourceTrack,
  StrategyTag,
} from "../model/types.js";

/** One strategy call for one query */
export interface QueryRecord {
  trackId: string;
  rank: number;
  strategy: StrategyTag;
  text: string;
  fetchedAt: string;
  latencyMs: number;
  cacheHit: boolean;
  /** Fetch attempts (2 when retried, 0 on a cache hit) */
  attempts: number;
  ok: boolean;
  candidateCount: number;
  error?: string;
}

/** A scored candidate, linked to its track */
export interface ScoredRecord {
  trackId: string;
  queryRank: number;
  strategy: StrategyTag;
  catalogId: string;
  displayTitle: string;
  artists: string[];
  remix?: string;
  sourceUrl: string;
  score: number;
  breakdown: ScoreBreakdown;
  confidence: ConfidenceLabel;
  verdict: GuardVerdict;
  accepted: boolean;
}

export interface DispositionRecord {
  trackId: string;
  track: SourceTrack;
  disposition: Disposition;
  queriesIssued: number;
  escalations: number;
  elapsedMs: number;
}

export interface ReviewRecord {
  trackId: string;
  track: SourceTrack;
  candidates: JudgedCandidate[];
  reasons: string[];
}

export type ErrorKind = "retrieval" | "extraction" | "cache" | "internal";

export interface ErrorRecord {
  kind: ErrorKind;
  message: string;
  trackId?: string;
  rank?: number;
  strategy?: StrategyTag;
  documentUrl?: string;
}

export interface RunSummary {
  tracks: number;
  matched: number;
  flagged: number;
  unmatched: number;
  cancelled: number;
  queries: number;
  cacheHits: number;
  escalations: number;
  errors: number;
}

export interface AuditSnapshot {
  summary: RunSummary;
  dispositions: DispositionRecord[];
  scoredCandidates: ScoredRecord[];
  queries: QueryRecord[];
  reviews: ReviewRecord[];
  errors: ErrorRecord[];
}

/**
 * Append-only record of a run. Workers append concurrently; each track's
 * disposition is written exactly once.
 */
export class AuditTrail {
  private readonly dispositionRecords: DispositionRecord[] = [];
  private readonly scoredRecords: ScoredRecord[] = [];
  private readonly queryRecords: QueryRecord[] = [];
  private readonly reviewRecords: ReviewRecord[] = [];
  private readonly errorRecords: ErrorRecord[] = [];
  private readonly decided = new Set<string>();

  recordQuery(record: QueryRecord): void {
    this.queryRecords.push(record);
  }

  recordScored(trackId: string, strategy: StrategyTag, judged: JudgedCandidate): void {
    const { candidate } = judged;
    this.scoredRecords.push({
      trackId,
      queryRank: candidate.queryRank,
      strategy,
      catalogId: candidate.catalogId,
      displayTitle: candidate.displayTitle,
      artists: candidate.artists,
      remix: candidate.remix,
      sourceUrl: candidate.sourceUrl,
      score: judged.score,
      breakdown: judged.breakdown,
      confidence: judged.confidence,
      verdict: judged.verdict,
      accepted: judged.accepted,
    });
  }

  recordError(record: ErrorRecord): void {
    this.errorRecords.push(record);
  }

  /**
   * Write a track's final disposition; flagged tracks also go to the review
   * stream.
   * @throws Error if the track already has a disposition
   */
  recordDisposition(record: DispositionRecord): void {
    if (this.decided.has(record.trackId)) {
      throw new Error(`Track ${record.trackId} already has a disposition`);
    }
    this.decided.add(record.trackId);
    this.dispositionRecords.push(record);

    const { disposition } = record;
    if (disposition.kind === "flagged") {
      this.reviewRecords.push({
        trackId: record.trackId,
        track: record.track,
        candidates: disposition.candidates,
        reasons: disposition.reasons,
      });
    }
  }

  hasDisposition(trackId: string): boolean {
    return this.decided.has(trackId);
  }

  get dispositions(): readonly DispositionRecord[] {
    return this.dispositionRecords;
  }

  get scoredCandidates(): readonly ScoredRecord[] {
    return this.scoredRecords;
  }

  get queries(): readonly QueryRecord[] {
    return this.queryRecords;
  }

  get reviews(): readonly ReviewRecord[] {
    return this.reviewRecords;
  }

  get errors(): readonly ErrorRecord[] {
    return this.errorRecords;
  }

  summary(): RunSummary {
    const count = (kind: Disposition["kind"]): number =>
      this.dispositionRecords.filter((r) => r.disposition.kind === kind).length;
    return {
      tracks: this.dispositionRecords.length,
      matched: count("matched"),
      flagged: count("flagged"),
      unmatched: count("unmatched"),
      cancelled: this.dispositionRecords.filter(
        (r) => r.disposition.kind === "unmatched" && r.disposition.reason === "cancelled"
      ).length,
      queries: this.queryRecords.length,
      cacheHits: this.queryRecords.filter((q) => q.cacheHit).length,
      escalations: this.dispositionRecords.reduce((sum, r) => sum + r.escalations, 0),
      errors: this.errorRecords.length,
    };
  }

  /** Plain copy of every stream, for export */
  snapshot(): AuditSnapshot {
    return {
      summary: this.summary(),
      dispositions: [...this.dispositionRecords],
      scoredCandidates: [...this.scoredRecords],
      queries: [...this.queryRecords],
      reviews: [...this.reviewRecords],
      errors: [...this.errorRecords],
    };
  }
}
