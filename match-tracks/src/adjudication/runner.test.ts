import { describe, it, expect, beforeAll } from "vitest";
import { runTracks } from "./runner.js";
import { Adjudicator } from "./adjudicator.js";
import { AuditTrail } from "./audit.js";
import { resolveConfig } from "../config/config.js";
import { CandidateExtractor } from "../extraction/extractor.js";
import type { RetrievalStrategy } from "../retrieval/strategy.js";
import type { Query, RawResponse, SourceTrack } from "../model/types.js";
import { logger } from "../utils/logger.js";

/** Direct strategy that returns nothing, or throws for one title */
class EmptyStrategy implements RetrievalStrategy {
  readonly tag = "direct" as const;
  readonly description = "empty";

  isAvailable(): boolean {
    return true;
  }

  async fetch(query: Query): Promise<RawResponse> {
    if (query.text.startsWith("Broken")) {
      throw new Error("stub exploded");
    }
    return {
      query,
      strategy: "direct",
      fetchedAt: "2026-01-01T00:00:00.000Z",
      latencyMs: 1,
      ok: true,
      documents: [],
    };
  }
}

const tracks: SourceTrack[] = [
  { id: "1", title: "First Light", artists: ["Example Artist"] },
  { id: "2", title: "Broken Record", artists: ["Example Artist"] },
  { id: "3", title: "Third Time", artists: ["Example Artist"] },
];

beforeAll(() => {
  logger.setQuiet(true);
});

describe("runTracks", () => {
  it("keeps input order and isolates a failing track", async () => {
    const config = resolveConfig({});
    const audit = new AuditTrail();
    const adjudicator = new Adjudicator(config, {
      strategies: [new EmptyStrategy()],
      extractor: new CandidateExtractor(config),
      audit,
    });

    const outcomes = await runTracks(tracks, adjudicator, audit, { concurrency: 2 });

    expect(outcomes.map((o) => [o.track.id, o.disposition])).toEqual([
      ["1", { kind: "unmatched", reason: "no results" }],
      ["2", { kind: "unmatched", reason: "internal error: stub exploded" }],
      ["3", { kind: "unmatched", reason: "no results" }],
    ]);
    expect(audit.dispositions).toHaveLength(3);
    expect(audit.errors).toEqual([{ kind: "internal", message: "stub exploded", trackId: "2" }]);
  });
});
