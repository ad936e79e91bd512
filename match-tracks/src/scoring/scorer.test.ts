import { describe, it, expect } from "vitest";
import {
  confidenceLabel,
  remixAdjustment,
  scoreCandidate,
  yearAdjustment,
  yearOf,
} from "./scorer.js";
import { resolveConfig } from "../config/config.js";
import type { Candidate, SourceTrack } from "../model/types.js";

const config = resolveConfig({});

const remixTrack: SourceTrack = {
  id: "1",
  title: "Never Sleep Again",
  artists: ["Example Artist"],
  remix: "Keinemusik Remix",
};

const plainTrack: SourceTrack = { id: "2", title: "Never Sleep Again", artists: ["Example Artist"] };

function candidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    catalogId: "123",
    title: "never sleep again",
    displayTitle: "Never Sleep Again",
    artists: ["example artist"],
    sourceUrl: "https://www.beatport.com/track/never-sleep-again/123",
    queryRank: 0,
    ...overrides,
  };
}

describe("scoreCandidate", () => {
  it("gives a perfect non-remix match 90", () => {
    const scored = scoreCandidate(plainTrack, candidate(), config);
    expect(scored.score).toBe(90);
    expect(scored.confidence).toBe("high");
    expect(scored.breakdown).toEqual({
      titleSimilarity: 100,
      artistSimilarity: 100,
      remixAdjustment: 0,
      yearAdjustment: 0,
    });
  });

  it("caps a matching remix at 100", () => {
    const scored = scoreCandidate(remixTrack, candidate({ remix: "keinemusik remix" }), config);
    expect(scored.breakdown.remixAdjustment).toBe(15);
    expect(scored.score).toBe(100);
  });

  it("penalizes a candidate without the requested remix label", () => {
    const scored = scoreCandidate(remixTrack, candidate(), config);
    expect(scored.breakdown.remixAdjustment).toBe(-15);
    expect(scored.score).toBe(75);
    expect(scored.confidence).toBe("medium");
  });

  it("treats a neutral candidate label as no label", () => {
    const scored = scoreCandidate(plainTrack, candidate({ remix: "original mix" }), config);
    expect(scored.score).toBe(90);
  });

  it("adds the year bonus", () => {
    const track = { ...plainTrack, year: 2023 };
    expect(scoreCandidate(track, candidate({ releaseDate: "2023-05-12" }), config).score).toBe(92);
    expect(scoreCandidate(track, candidate({ releaseDate: "2022-05-12" }), config).score).toBe(91);
    expect(scoreCandidate(track, candidate({ releaseDate: "2019-05-12" }), config).score).toBe(90);
  });

  it("is deterministic", () => {
    const c = candidate({ remix: "other remix", artists: ["someone else"] });
    expect(scoreCandidate(remixTrack, c, config)).toEqual(scoreCandidate(remixTrack, c, config));
  });

  it("stays within 0 and 100", () => {
    const scored = scoreCandidate(
      remixTrack,
      candidate({ title: "zzz", artists: ["qqq"], remix: "yyy" }),
      config
    );
    expect(scored.score).toBeGreaterThanOrEqual(0);
    expect(scored.score).toBeLessThanOrEqual(100);
  });
});

describe("remixAdjustment", () => {
  it("is 0 without labels", () => {
    expect(remixAdjustment(undefined, undefined, config.weights)).toBe(0);
  });

  it("penalizes a one-sided label", () => {
    expect(remixAdjustment(undefined, "someone remix", config.weights)).toBe(-15);
  });

  it("is the full bonus for identical labels", () => {
    expect(remixAdjustment("a remix", "a remix", config.weights)).toBe(15);
  });
});

describe("yearOf", () => {
  it("reads a leading year", () => {
    expect(yearOf("2023-05-12")).toBe(2023);
  });

  it("ignores other formats", () => {
    expect(yearOf("May 2023")).toBeUndefined();
  });
});

describe("yearAdjustment", () => {
  it("is 0 without a hint", () => {
    expect(yearAdjustment(undefined, "2023-01-01", 2)).toBe(0);
  });
});

describe("confidenceLabel", () => {
  it("labels by score band", () => {
    expect([confidenceLabel(95), confidenceLabel(80), confidenceLabel(60)]).toEqual([
      "high",
      "medium",
      "low",
    ]);
  });
});
