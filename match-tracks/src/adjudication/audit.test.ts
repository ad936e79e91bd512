import { describe, it, expect } from "vitest";
import { AuditTrail } from "./audit.js";
import type { JudgedCandidate, SourceTrack } from "../model/types.js";

const track: SourceTrack = { id: "7", title: "Hold On", artists: ["Example Artist"] };

const judged: JudgedCandidate = {
  candidate: {
    catalogId: "42",
    title: "hold on",
    displayTitle: "Hold On (Original Mix)",
    artists: ["example artist"],
    sourceUrl: "https://www.beatport.com/track/hold-on/42",
    queryRank: 1,
  },
  score: 76.5,
  breakdown: { titleSimilarity: 100, artistSimilarity: 62, remixAdjustment: 0, yearAdjustment: 0 },
  confidence: "medium",
  verdict: { pass: true },
  accepted: false,
};

describe("AuditTrail", () => {
  it("writes a disposition once per track", () => {
    const audit = new AuditTrail();
    const record = {
      trackId: "7",
      track,
      disposition: { kind: "unmatched" as const, reason: "no results" },
      queriesIssued: 0,
      escalations: 0,
      elapsedMs: 3,
    };

    audit.recordDisposition(record);

    expect(audit.hasDisposition("7")).toBe(true);
    expect(() => audit.recordDisposition(record)).toThrow("Track 7 already has a disposition");
    expect(audit.dispositions).toHaveLength(1);
  });

  it("sends flagged tracks to the review stream", () => {
    const audit = new AuditTrail();
    audit.recordDisposition({
      trackId: "7",
      track,
      disposition: { kind: "flagged", candidates: [judged], reasons: ["needs a look"] },
      queriesIssued: 2,
      escalations: 1,
      elapsedMs: 10,
    });

    expect(audit.reviews).toEqual([
      { trackId: "7", track, candidates: [judged], reasons: ["needs a look"] },
    ]);
  });

  it("flattens scored candidates with their strategy", () => {
    const audit = new AuditTrail();
    audit.recordScored("7", "engine", judged);

    expect(audit.scoredCandidates[0]).toMatchObject({
      trackId: "7",
      queryRank: 1,
      strategy: "engine",
      catalogId: "42",
      score: 76.5,
      confidence: "medium",
      accepted: false,
    });
  });

  it("summarizes every stream", () => {
    const audit = new AuditTrail();
    const query = {
      trackId: "7",
      rank: 0,
      strategy: "direct" as const,
      text: "Hold On Example Artist",
      fetchedAt: "2026-01-01T00:00:00.000Z",
      latencyMs: 12,
      attempts: 1,
      ok: true,
      candidateCount: 1,
    };
    audit.recordQuery({ ...query, cacheHit: false });
    audit.recordQuery({ ...query, rank: 1, cacheHit: true, attempts: 0 });
    audit.recordError({ kind: "cache", message: "Cache write failed: disk full" });
    audit.recordDisposition({
      trackId: "7",
      track,
      disposition: { kind: "matched", candidate: { ...judged, score: 91, accepted: true } },
      queriesIssued: 2,
      escalations: 1,
      elapsedMs: 40,
    });
    audit.recordDisposition({
      trackId: "8",
      track: { ...track, id: "8" },
      disposition: { kind: "unmatched", reason: "cancelled" },
      queriesIssued: 0,
      escalations: 0,
      elapsedMs: 0,
    });

    expect(audit.summary()).toEqual({
      tracks: 2,
      matched: 1,
      flagged: 0,
      unmatched: 1,
      cancelled: 1,
      queries: 2,
      cacheHits: 1,
      escalations: 1,
      errors: 1,
    });
    expect(audit.snapshot().queries).toHaveLength(2);
  });
});
