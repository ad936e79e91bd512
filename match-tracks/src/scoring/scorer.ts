import type { RunConfig } from "../config/types.js";
import type {
  Candidate,
  ConfidenceLabel,
  ScoreBreakdown,
  ScoredCandidate,
  SourceTrack,
} from "../model/types.js";
import { artistSimilarity, cleanTitle, similarity } from "../matching/text.js";
import { effectiveRemixLabel, resolveSourceMix } from "../matching/mix-parser.js";

const HIGH_CONFIDENCE = 90;
const MEDIUM_CONFIDENCE = 75;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Four-digit year at the start of a date string */
export function yearOf(date: string | undefined): number | undefined {
  const match = date ? /^(\d{4})/.exec(date.trim()) : null;
  return match ? Number(match[1]) : undefined;
}

export function confidenceLabel(score: number): ConfidenceLabel {
  if (score >= HIGH_CONFIDENCE) return "high";
  if (score >= MEDIUM_CONFIDENCE) return "medium";
  return "low";
}

/**
 * Remix consistency: both labels present scales from -bonus (nothing alike)
 * to +bonus (identical); a label on one side only costs the penalty.
 * Neutral labels ("original mix") count as no label.
 */
export function remixAdjustment(
  sourceLabel: string | undefined,
  candidateLabel: string | undefined,
  weights: RunConfig["weights"]
): number {
  if (sourceLabel && candidateLabel) {
    const sim = similarity(sourceLabel, candidateLabel);
    return round2(weights.remixBonus * ((2 * sim) / 100 - 1));
  }
  if (sourceLabel || candidateLabel) return -weights.remixPenalty;
  return 0;
}

/**
 * Bonus for a release year matching the source hint: full bonus for the same
 * year, at most 1 for a year apart.
 */
export function yearAdjustment(
  hint: number | undefined,
  releaseDate: string | undefined,
  yearBonus: number
): number {
  const year = yearOf(releaseDate);
  if (hint === undefined || year === undefined) return 0;
  const diff = Math.abs(hint - year);
  if (diff === 0) return yearBonus;
  if (diff === 1) return Math.min(1, yearBonus);
  return 0;
}

/**
 * Composite score of a candidate against a source track, in [0, 100].
 *
 * composite = w.title * titleSim + w.artist * artistSim + remix adj + year adj
 *
 * Pure: depends only on the two values and the run's weights.
 */
export function scoreCandidate(
  track: SourceTrack,
  candidate: Candidate,
  config: RunConfig
): ScoredCandidate {
  const { weights, remixDetection } = config;
  const source = resolveSourceMix(track, remixDetection);

  const breakdown: ScoreBreakdown = {
    titleSimilarity: similarity(cleanTitle(source.title), cleanTitle(candidate.title)),
    artistSimilarity: artistSimilarity(track.artists, candidate.artists),
    remixAdjustment: remixAdjustment(
      effectiveRemixLabel(source.label, remixDetection),
      effectiveRemixLabel(candidate.remix, remixDetection),
      weights
    ),
    yearAdjustment: yearAdjustment(track.year, candidate.releaseDate, weights.yearBonus),
  };

  const raw =
    weights.title * breakdown.titleSimilarity +
    weights.artist * breakdown.artistSimilarity +
    breakdown.remixAdjustment +
    breakdown.yearAdjustment;
  const score = round2(Math.min(100, Math.max(0, raw)));

  return { candidate, score, breakdown, confidence: confidenceLabel(score) };
}
