import { describe, it, expect, beforeAll, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { formatDispositionLine, formatSummary, writeAuditFile } from "./report.js";
import { AuditTrail } from "../adjudication/audit.js";
import type { DispositionRecord } from "../adjudication/audit.js";
import type { JudgedCandidate, SourceTrack } from "../model/types.js";
import { logger } from "../utils/logger.js";

const track: SourceTrack = {
  id: "1",
  title: "Never Sleep Again",
  artists: ["Example Artist"],
  remix: "Keinemusik Remix",
};

const judged: JudgedCandidate = {
  candidate: {
    catalogId: "100",
    title: "never sleep again",
    displayTitle: "Never Sleep Again (Keinemusik Remix)",
    artists: ["example artist"],
    remix: "keinemusik remix",
    sourceUrl: "https://www.beatport.com/track/never-sleep-again/100",
    queryRank: 0,
  },
  score: 100,
  breakdown: { titleSimilarity: 100, artistSimilarity: 100, remixAdjustment: 15, yearAdjustment: 0 },
  confidence: "high",
  verdict: { pass: true },
  accepted: true,
};

function record(disposition: DispositionRecord["disposition"]): DispositionRecord {
  return { trackId: "1", track, disposition, queriesIssued: 1, escalations: 0, elapsedMs: 4 };
}

beforeAll(() => {
  logger.setQuiet(true);
});

describe("formatDispositionLine", () => {
  it("formats a match", () => {
    expect(formatDispositionLine(record({ kind: "matched", candidate: judged }))).toBe(
      "MATCHED    Example Artist - Never Sleep Again (Keinemusik Remix) -> Never Sleep Again (Keinemusik Remix) [100] 100 (high) https://www.beatport.com/track/never-sleep-again/100"
    );
  });

  it("formats a review", () => {
    expect(
      formatDispositionLine(
        record({ kind: "flagged", candidates: [{ ...judged, score: 75, accepted: false }], reasons: [] })
      )
    ).toBe("REVIEW     Example Artist - Never Sleep Again (Keinemusik Remix) -> 1 candidate(s), best 75");
  });

  it("formats an unmatched track", () => {
    expect(formatDispositionLine(record({ kind: "unmatched", reason: "no results" }))).toBe(
      "UNMATCHED  Example Artist - Never Sleep Again (Keinemusik Remix): no results"
    );
  });
});

describe("formatSummary", () => {
  it("lists the counts", () => {
    const audit = new AuditTrail();
    audit.recordDisposition(record({ kind: "unmatched", reason: "cancelled" }));
    expect(formatSummary(audit.summary())).toContain("  Unmatched:    1 (1 cancelled)");
  });
});

describe("writeAuditFile", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("writes every stream", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "match-tracks-report-"));
    const file = path.join(dir, "nested", "audit.json");
    const audit = new AuditTrail();
    audit.recordDisposition(record({ kind: "matched", candidate: judged }));

    await writeAuditFile(file, audit);

    const written = JSON.parse(await fs.readFile(file, "utf-8")) as Record<string, unknown>;
    expect(Object.keys(written).sort()).toEqual([
      "dispositions",
      "errors",
      "queries",
      "reviews",
      "scoredCandidates",
      "summary",
      "timestamp",
    ]);
    expect(written.summary).toMatchObject({ tracks: 1, matched: 1 });
  });
});
