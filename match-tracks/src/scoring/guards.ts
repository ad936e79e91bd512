import type { RunConfig } from "../config/types.js";
import type {
  GuardName,
  GuardVerdict,
  JudgedCandidate,
  ScoredCandidate,
  SourceTrack,
} from "../model/types.js";
import { cleanTitle, significantTokens, similarity } from "../matching/text.js";
import { effectiveRemixLabel, resolveSourceMix } from "../matching/mix-parser.js";

interface Guard {
  name: GuardName;
  /** Veto reason, or undefined to pass */
  check(track: SourceTrack, scored: ScoredCandidate, config: RunConfig): string | undefined;
}

/** Hard vetoes, in evaluation order */
export const GUARDS: readonly Guard[] = [
  {
    name: "title_sim_floor",
    check: (_track, scored, config) => {
      const sim = scored.breakdown.titleSimilarity;
      const floor = config.guards.titleSimFloor;
      return sim < floor ? `title similarity ${sim} is below the floor of ${floor}` : undefined;
    },
  },
  {
    name: "title_token_coverage",
    check: (track, scored, config) => {
      const { title } = resolveSourceMix(track, config.remixDetection);
      const tokens = significantTokens(title);
      if (tokens.length === 0) return undefined;
      const present = new Set(cleanTitle(scored.candidate.title).split(" "));
      const covered = tokens.filter((t) => present.has(t)).length;
      const minimum = config.guards.minTitleTokenCoverage;
      return covered / tokens.length < minimum
        ? `only ${covered} of ${tokens.length} significant title tokens present (minimum ${Math.round(minimum * 100)}%)`
        : undefined;
    },
  },
  {
    name: "remix_identity_conflict",
    check: (track, scored, config) => {
      const detection = config.remixDetection;
      const wanted = effectiveRemixLabel(resolveSourceMix(track, detection).label, detection);
      const found = effectiveRemixLabel(scored.candidate.remix, detection);
      if (!wanted || !found) return undefined;
      return similarity(wanted, found) < config.guards.remixLabelMatchThreshold
        ? `remix "${found}" is not the requested "${wanted}"`
        : undefined;
    },
  },
];

/**
 * Apply the guards in order; the first veto wins. Independent of the
 * composite score.
 */
export function guard(track: SourceTrack, scored: ScoredCandidate, config: RunConfig): GuardVerdict {
  for (const g of GUARDS) {
    const reason = g.check(track, scored, config);
    if (reason !== undefined) return { pass: false, guard: g.name, reason };
  }
  return { pass: true };
}

/**
 * Guard verdict plus acceptance: all guards pass and the score reaches the
 * acceptance threshold.
 */
export function judge(track: SourceTrack, scored: ScoredCandidate, config: RunConfig): JudgedCandidate {
  const verdict = guard(track, scored, config);
  return {
    ...scored,
    verdict,
    accepted: verdict.pass && scored.score >= config.thresholds.minAcceptScore,
  };
}
