import pLimit from "p-limit";
import type { Disposition, SourceTrack } from "../model/types.js";
import { errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { Adjudicator } from "./adjudicator.js";
import type { AuditTrail } from "./audit.js";

export interface RunOptions {
  /** Tracks adjudicated at once */
  concurrency: number;
  signal?: AbortSignal;
}

export interface TrackOutcome {
  track: SourceTrack;
  disposition: Disposition;
}

function describe(disposition: Disposition): string {
  switch (disposition.kind) {
    case "matched":
      return `matched ${disposition.candidate.candidate.catalogId} (${disposition.candidate.score})`;
    case "flagged":
      return `flagged with ${disposition.candidates.length} candidate(s)`;
    case "unmatched":
      return `unmatched: ${disposition.reason}`;
  }
}

/**
 * Adjudicate every track through a bounded pool. A track that throws is
 * recorded as an internal error and left unmatched; the others carry on.
 * Outcomes come back in input order.
 */
export async function runTracks(
  tracks: readonly SourceTrack[],
  adjudicator: Adjudicator,
  audit: AuditTrail,
  options: RunOptions
): Promise<TrackOutcome[]> {
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency)));
  let done = 0;

  const runOne = async (track: SourceTrack): Promise<TrackOutcome> => {
    let disposition: Disposition;
    try {
      disposition = await adjudicator.adjudicate(track, options.signal);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Track ${track.id} failed: ${message}`);
      audit.recordError({ kind: "internal", message, trackId: track.id });
      disposition = { kind: "unmatched", reason: `internal error: ${message}` };
      if (!audit.hasDisposition(track.id)) {
        audit.recordDisposition({
          trackId: track.id,
          track,
          disposition,
          queriesIssued: 0,
          escalations: 0,
          elapsedMs: 0,
        });
      }
    }

    done++;
    logger.info(`[${done}/${tracks.length}] ${track.artists.join(", ")} - ${track.title}: ${describe(disposition)}`);
    return { track, disposition };
  };

  return Promise.all(tracks.map((track) => limit(() => runOne(track))));
}
