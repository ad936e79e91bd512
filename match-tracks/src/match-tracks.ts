import type { CliFlags, MatchConfigOverride } from "./config/types.js";
import { loadConfig } from "./config/config.js";
import { createResponseCache } from "./cache/response-cache.js";
import { createStrategies } from "./retrieval/index.js";
import { CandidateExtractor } from "./extraction/extractor.js";
import { Adjudicator } from "./adjudication/adjudicator.js";
import { AuditTrail } from "./adjudication/audit.js";
import { runTracks } from "./adjudication/runner.js";
import { loadSourceTracks } from "./input/source-tracks.js";
import { printReport, writeAuditFile } from "./output/report.js";
import { errorMessage } from "./errors.js";
import { logger } from "./utils/logger.js";

export interface MatchTracksOptions extends CliFlags {
  /** Cancels the run cooperatively */
  signal?: AbortSignal;
}

function cliOverride(flags: CliFlags): MatchConfigOverride {
  const override: MatchConfigOverride = {};
  if (flags.concurrency !== undefined) override.concurrency = flags.concurrency;
  if (!flags.cache) override.cache = { enabled: false };
  return override;
}

/**
 * Main entry point: load tracks, adjudicate each against the catalog, print
 * the report and optionally write the audit file.
 *
 * @throws ConfigurationError before any track is processed
 */
export async function matchTracks(tracksPath: string, options: MatchTracksOptions): Promise<AuditTrail> {
  if (options.debug) {
    logger.setDebug(true);
  }

  const config = await loadConfig(options.config, cliOverride(options));
  const tracks = await loadSourceTracks(tracksPath);
  const audit = new AuditTrail();

  const cache = await createResponseCache(config.cache, {
    onError: (error) => audit.recordError({ kind: "cache", message: error.message }),
  });
  const strategies = createStrategies(config);
  const available = strategies.filter((s) => s.isAvailable()).map((s) => s.tag);
  logger.info(`Strategies: ${available.length > 0 ? available.join(", ") : "none available"}`);

  const adjudicator = new Adjudicator(config, {
    strategies,
    cache,
    extractor: new CandidateExtractor(config),
    audit,
  });

  try {
    await runTracks(tracks, adjudicator, audit, {
      concurrency: config.concurrency,
      signal: options.signal,
    });
  } finally {
    for (const strategy of strategies) {
      try {
        await strategy.close?.();
      } catch (error) {
        logger.warn(`Closing ${strategy.tag} failed: ${errorMessage(error)}`);
      }
    }
  }

  printReport(audit, tracks.map((t) => t.id));
  if (options.output) {
    await writeAuditFile(options.output, audit);
  }
  if (options.signal?.aborted) {
    logger.warn("Run cancelled; unfinished tracks were left unmatched");
  } else {
    logger.success("Matching complete!");
  }
  return audit;
}

export { loadConfig, resolveConfig } from "./config/config.js";
export { loadSourceTracks } from "./input/source-tracks.js";
export { AuditTrail } from "./adjudication/audit.js";
export type { SourceTrack, Disposition, Candidate, JudgedCandidate } from "./model/types.js";
