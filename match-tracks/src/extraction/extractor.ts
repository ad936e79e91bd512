import type { RunConfig } from "../config/types.js";
import type { Candidate, RawResponse } from "../model/types.js";
import { ExtractionError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { ExtractionFailure, ExtractionPath } from "./types.js";
import { embeddedStatePath } from "./embedded-state.js";
import { linkedDataPath } from "./linked-data.js";
import { structuredMarkupPath } from "./structured-markup.js";

/** Extraction paths in priority order */
export const DEFAULT_PATHS: readonly ExtractionPath[] = [
  embeddedStatePath,
  linkedDataPath,
  structuredMarkupPath,
];

export interface ExtractionResult {
  candidates: Candidate[];
  failures: ExtractionFailure[];
}

/**
 * Turns raw responses into candidates. Never throws: a document no path can
 * read yields nothing and a recorded failure.
 */
export class CandidateExtractor {
  constructor(
    private readonly config: RunConfig,
    private readonly paths: readonly ExtractionPath[] = DEFAULT_PATHS
  ) {}

  /**
   * Lazily yield candidates from every document of a response. For each
   * document the first applicable path that produces candidates wins.
   * Failures are appended to `failures`.
   */
  *candidates(response: RawResponse, failures: ExtractionFailure[] = []): Generator<Candidate> {
    const context = {
      baseUrl: this.config.catalog.baseUrl,
      queryRank: response.query.rank,
      remixDetection: this.config.remixDetection,
    };

    for (const doc of response.documents) {
      const applicable = this.paths.filter((path) => path.applies(doc));
      if (applicable.length === 0) {
        if (doc.body.trim()) {
          failures.push({ documentUrl: doc.url, path: "none", reason: "No extraction path applies" });
          logger.debug(`No extraction path applies to ${doc.url}`);
        }
        continue;
      }

      for (const path of applicable) {
        let produced = 0;
        try {
          for (const candidate of path.extract(doc, context)) {
            produced++;
            yield candidate;
          }
        } catch (error) {
          const reason = error instanceof ExtractionError ? error.message : `Unexpected: ${errorMessage(error)}`;
          failures.push({ documentUrl: doc.url, path: path.kind, reason });
          logger.warn(`Extraction (${path.kind}) failed for ${doc.url}: ${reason}`);
        }
        if (produced > 0) break;
      }
    }
  }

  /** Materialize all candidates of a response */
  extract(response: RawResponse): ExtractionResult {
    const failures: ExtractionFailure[] = [];
    const candidates = [...this.candidates(response, failures)];
    return { candidates, failures };
  }
}

/**
 * One candidate per catalog id, keeping the one from the lowest query rank
 * (first seen on ties). Order of first appearance is kept.
 */
export function dedupeCandidates(candidates: Iterable<Candidate>): Candidate[] {
  const byId = new Map<string, Candidate>();
  for (const candidate of candidates) {
    const existing = byId.get(candidate.catalogId);
    if (!existing || candidate.queryRank < existing.queryRank) {
      byId.set(candidate.catalogId, candidate);
    }
  }
  return [...byId.values()];
}
