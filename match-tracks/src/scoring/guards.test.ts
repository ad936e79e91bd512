import { describe, it, expect } from "vitest";
import { guard, judge } from "./guards.js";
import { scoreCandidate } from "./scorer.js";
import { resolveConfig } from "../config/config.js";
import type { Candidate, ScoredCandidate, SourceTrack } from "../model/types.js";

const config = resolveConfig({});

const track: SourceTrack = {
  id: "1",
  title: "Never Sleep Again",
  artists: ["Example Artist"],
  remix: "Keinemusik Remix",
};

function candidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    catalogId: "123",
    title: "never sleep again",
    displayTitle: "Never Sleep Again",
    artists: ["example artist"],
    remix: "keinemusik remix",
    sourceUrl: "https://www.beatport.com/track/never-sleep-again/123",
    queryRank: 0,
    ...overrides,
  };
}

function scored(c: Candidate, titleSimilarity: number, score = 95): ScoredCandidate {
  return {
    candidate: c,
    score,
    breakdown: { titleSimilarity, artistSimilarity: 100, remixAdjustment: 0, yearAdjustment: 0 },
    confidence: "high",
  };
}

describe("guard", () => {
  it("passes the right remix", () => {
    expect(guard(track, scoreCandidate(track, candidate(), config), config)).toEqual({ pass: true });
  });

  it("vetoes a title below the similarity floor regardless of score", () => {
    expect(guard(track, scored(candidate(), 10, 100), config)).toEqual({
      pass: false,
      guard: "title_sim_floor",
      reason: "title similarity 10 is below the floor of 15",
    });
  });

  it("vetoes a title missing most significant tokens", () => {
    expect(guard(track, scored(candidate({ title: "sleep" }), 60), config)).toEqual({
      pass: false,
      guard: "title_token_coverage",
      reason: "only 1 of 3 significant title tokens present (minimum 50%)",
    });
  });

  it("skips token coverage when the title has no significant tokens", () => {
    const short: SourceTrack = { id: "2", title: "On", artists: ["Example Artist"] };
    expect(guard(short, scored(candidate({ title: "on", remix: undefined }), 100), config)).toEqual({
      pass: true,
    });
  });

  it("vetoes a different remix of the same song", () => {
    const verdict = guard(track, scored(candidate({ remix: "other remix" }), 100), config);
    expect(verdict).toEqual({
      pass: false,
      guard: "remix_identity_conflict",
      reason: 'remix "other remix" is not the requested "keinemusik remix"',
    });
  });

  it("does not treat a neutral candidate label as a conflict", () => {
    expect(guard(track, scored(candidate({ remix: "original mix" }), 100), config)).toEqual({
      pass: true,
    });
  });

  it("reports the first veto only", () => {
    const verdict = guard(track, scored(candidate({ title: "zzz", remix: "other remix" }), 5), config);
    expect(verdict.pass === false && verdict.guard).toBe("title_sim_floor");
  });
});

describe("judge", () => {
  it("accepts a guarded candidate above the threshold", () => {
    const judged = judge(track, scoreCandidate(track, candidate(), config), config);
    expect(judged.accepted).toBe(true);
  });

  it("keeps a below-threshold candidate unaccepted but unvetoed", () => {
    const judged = judge(track, scoreCandidate(track, candidate({ remix: undefined }), config), config);
    expect(judged.verdict).toEqual({ pass: true });
    expect(judged.score).toBe(75);
    expect(judged.accepted).toBe(false);
  });

  it("never accepts a vetoed candidate", () => {
    const judged = judge(track, scored(candidate({ remix: "other remix" }), 100, 100), config);
    expect(judged.accepted).toBe(false);
  });
});
