import type { RunConfig } from "../config/types.js";
import type {
  Candidate,
  Disposition,
  JudgedCandidate,
  Query,
  RawResponse,
  SourceTrack,
} from "../model/types.js";
import { logger } from "../utils/logger.js";
import { planQueries } from "../planning/query-planner.js";
import type { ResponseCache } from "../cache/response-cache.js";
import type { RetrievalStrategy } from "../retrieval/strategy.js";
import { CANCELLED } from "../retrieval/http.js";
import { dedupeCandidates } from "../extraction/extractor.js";
import type { CandidateExtractor } from "../extraction/extractor.js";
import { scoreCandidate } from "../scoring/scorer.js";
import { judge } from "../scoring/guards.js";
import { isRemixTrack } from "../matching/mix-parser.js";
import type { AuditTrail, QueryRecord } from "./audit.js";

export type Phase = "planning" | "retrieving" | "extracting" | "scoring" | "deciding";

export const NO_RESULTS = "no results";
export const NO_ACCEPTABLE = "no acceptable candidates";

export interface AdjudicatorDeps {
  /** Strategies in escalation order */
  strategies: readonly RetrievalStrategy[];
  extractor: CandidateExtractor;
  audit: AuditTrail;
  cache?: ResponseCache;
  /** Wait before a retry; resolves early when the signal aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

/** Working state of one track's adjudication */
interface TrackState {
  track: SourceTrack;
  remix: boolean;
  queries: Query[];
  nextRank: number;
  query?: Query;
  /** Strategies available for the current rank, and the one in use */
  rankStrategies: RetrievalStrategy[];
  strategyIndex: number;
  response?: RawResponse;
  /** Query record of the latest response, written once its candidates are counted */
  record?: QueryRecord;
  /** Candidates extracted from the latest response, not yet scored */
  pending: Candidate[];
  /** Unique catalog ids found at the current rank */
  rankIds: Set<string>;
  /** Every judged candidate of the track, by catalog id */
  judged: Map<string, JudgedCandidate>;
  queriesIssued: number;
  escalations: number;
  startedAt: number;
  stop: boolean;
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * Choose among judged candidates: best accepted one, else the unvetoed ones
 * above the review floor, else unmatched.
 */
export function decide(judged: readonly JudgedCandidate[], config: RunConfig): Disposition {
  const order = (a: JudgedCandidate, b: JudgedCandidate): number =>
    b.score - a.score || a.candidate.queryRank - b.candidate.queryRank;

  const accepted = judged.filter((j) => j.accepted);
  if (accepted.length > 0) {
    // sort is stable, so equal score and rank keep first-seen order
    return { kind: "matched", candidate: [...accepted].sort(order)[0] };
  }

  const { minAcceptScore, reviewFloor } = config.thresholds;
  const review = judged.filter((j) => j.verdict.pass && j.score >= reviewFloor).sort(order);
  if (review.length > 0) {
    const reasons = review.map(
      (j) =>
        `${j.candidate.displayTitle} [${j.candidate.catalogId}] scored ${j.score}, below the acceptance threshold of ${minAcceptScore}`
    );
    for (const j of judged) {
      if (!j.verdict.pass) {
        reasons.push(
          `${j.candidate.displayTitle} [${j.candidate.catalogId}] vetoed by ${j.verdict.guard}: ${j.verdict.reason}`
        );
      }
    }
    return { kind: "flagged", candidates: review, reasons };
  }

  return { kind: "unmatched", reason: judged.length === 0 ? NO_RESULTS : NO_ACCEPTABLE };
}

/**
 * Drives one track through
 *   planning -> retrieving -> extracting -> scoring -> deciding
 * and records everything to the audit trail.
 *
 * Ranks are issued in ascending order. Within a rank the first available
 * strategy runs; remix tracks escalate to the next strategy while the rank
 * has fewer than `escalation.minCandidates` candidates, other tracks only
 * when the previous strategy failed. An accepted candidate at or above
 * `highConfidenceScore` ends the track early.
 */
export class Adjudicator {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly config: RunConfig,
    private readonly deps: AdjudicatorDeps
  ) {
    this.sleep = deps.sleep ?? delay;
    this.now = deps.now ?? Date.now;
  }

  async adjudicate(track: SourceTrack, signal?: AbortSignal): Promise<Disposition> {
    const state: TrackState = {
      track,
      remix: isRemixTrack(track, this.config.remixDetection),
      queries: [],
      nextRank: 0,
      rankStrategies: [],
      strategyIndex: 0,
      pending: [],
      rankIds: new Set(),
      judged: new Map(),
      queriesIssued: 0,
      escalations: 0,
      startedAt: this.now(),
      stop: false,
    };
    state.queries = planQueries(track, this.config);

    let phase: Phase = "planning";
    while (phase !== "deciding") {
      if (signal?.aborted) break;
      logger.debug(`[${track.id}] ${phase}`);
      switch (phase) {
        case "planning":
          phase = this.plan(state);
          break;
        case "retrieving":
          phase = await this.retrieve(state, signal);
          break;
        case "extracting":
          phase = this.extract(state);
          break;
        case "scoring":
          phase = this.score(state);
          break;
      }
    }

    // a response cut off by cancellation never reached extraction
    if (state.record) this.deps.audit.recordQuery(state.record);

    const disposition: Disposition = signal?.aborted
      ? { kind: "unmatched", reason: CANCELLED }
      : decide([...state.judged.values()], this.config);

    this.deps.audit.recordDisposition({
      trackId: track.id,
      track,
      disposition,
      queriesIssued: state.queriesIssued,
      escalations: state.escalations,
      elapsedMs: this.now() - state.startedAt,
    });
    return disposition;
  }

  /** Take the next rank, or finish when none remain or the budget is spent */
  private plan(state: TrackState): Phase {
    const budget = this.config.limits.perTrackTimeBudgetMs;
    if (state.stop || state.nextRank >= state.queries.length) return "deciding";
    if (budget > 0 && this.now() - state.startedAt >= budget) {
      logger.debug(`[${state.track.id}] time budget spent after ${state.nextRank} ranks`);
      return "deciding";
    }

    state.query = state.queries[state.nextRank];
    state.nextRank++;
    state.rankStrategies = this.deps.strategies.filter((s) => s.isAvailable());
    state.strategyIndex = 0;
    state.rankIds = new Set();
    return state.rankStrategies.length > 0 ? "retrieving" : "planning";
  }

  private async retrieve(state: TrackState, signal?: AbortSignal): Promise<Phase> {
    const strategy = state.rankStrategies[state.strategyIndex];
    const base = state.query;
    if (!strategy || !base) return "planning";

    const query: Query = { ...base, strategy: strategy.tag };
    const key = { query: query.text, strategy: strategy.tag };
    const cache = this.deps.cache;
    state.queriesIssued++;

    const cached = await cache?.get(key);
    let response: RawResponse;
    let attempts = 0;
    if (cached) {
      response = { ...cached, query };
    } else {
      response = await strategy.fetch(query, signal);
      attempts = 1;
      if (!response.ok && response.retryable && !signal?.aborted) {
        logger.debug(`[${state.track.id}] retrying ${strategy.tag} for rank ${query.rank}`);
        await this.sleep(this.config.retry.backoffMs, signal);
        response = await strategy.fetch(query, signal);
        attempts = 2;
      }
      if (response.ok) {
        await cache?.set(key, response);
      } else if (!signal?.aborted) {
        logger.warn(`[${state.track.id}] ${strategy.tag} failed for "${query.text}": ${response.error ?? "unknown error"}`);
        this.deps.audit.recordError({
          kind: "retrieval",
          message: response.error ?? "unknown error",
          trackId: state.track.id,
          rank: query.rank,
          strategy: strategy.tag,
        });
      }
    }

    state.response = response;
    state.record = {
      trackId: state.track.id,
      rank: query.rank,
      strategy: strategy.tag,
      text: query.text,
      fetchedAt: response.fetchedAt,
      latencyMs: response.latencyMs,
      cacheHit: cached !== undefined,
      attempts,
      ok: response.ok,
      candidateCount: 0,
      error: response.error,
    };
    return "extracting";
  }

  private extract(state: TrackState): Phase {
    const response = state.response;
    if (!response) return "scoring";

    const { candidates, failures } = this.deps.extractor.extract(response);
    for (const failure of failures) {
      this.deps.audit.recordError({
        kind: "extraction",
        message: failure.reason,
        trackId: state.track.id,
        rank: response.query.rank,
        strategy: response.strategy,
        documentUrl: failure.documentUrl,
      });
    }

    if (state.record) {
      this.deps.audit.recordQuery({ ...state.record, candidateCount: candidates.length });
      state.record = undefined;
    }
    state.pending = [];
    for (const candidate of dedupeCandidates(candidates)) {
      state.rankIds.add(candidate.catalogId);
      if (!state.judged.has(candidate.catalogId)) state.pending.push(candidate);
    }
    return "scoring";
  }

  /** Score and guard new candidates, then pick the next step */
  private score(state: TrackState): Phase {
    const strategy = state.response?.strategy ?? "direct";
    for (const candidate of state.pending) {
      const judged = judge(state.track, scoreCandidate(state.track, candidate, this.config), this.config);
      state.judged.set(candidate.catalogId, judged);
      this.deps.audit.recordScored(state.track.id, strategy, judged);
      if (judged.accepted && judged.score >= this.config.thresholds.highConfidenceScore) {
        logger.debug(`[${state.track.id}] early exit on ${candidate.catalogId} (${judged.score})`);
        state.stop = true;
      }
    }
    state.pending = [];
    if (state.stop) return "deciding";

    const nextIndex = state.strategyIndex + 1;
    if (nextIndex >= state.rankStrategies.length) return "planning";

    const failed = state.response?.ok === false;
    const underDelivered = state.rankIds.size < this.config.escalation.minCandidates;
    const escalate = state.remix ? underDelivered || failed : failed;
    if (!escalate) return "planning";

    state.strategyIndex = nextIndex;
    state.escalations++;
    logger.debug(
      `[${state.track.id}] escalating to ${state.rankStrategies[nextIndex].tag} at rank ${state.query?.rank ?? "?"} (${state.rankIds.size} candidates)`
    );
    return "retrieving";
  }
}
