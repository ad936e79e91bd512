import * as fs from "node:fs/promises";
import * as path from "node:path";
import chalk from "chalk";
import type { AuditTrail, DispositionRecord, RunSummary } from "../adjudication/audit.js";
import { logger } from "../utils/logger.js";

function trackLabel(record: DispositionRecord): string {
  const { track } = record;
  const remix = track.remix ? ` (${track.remix})` : "";
  return `${track.artists.join(", ")} - ${track.title}${remix}`;
}

/**
 * One line per track, plain text (no colour)
 */
export function formatDispositionLine(record: DispositionRecord): string {
  const { disposition } = record;
  switch (disposition.kind) {
    case "matched": {
      const { candidate, score, confidence } = disposition.candidate;
      return `MATCHED    ${trackLabel(record)} -> ${candidate.displayTitle} [${candidate.catalogId}] ${score} (${confidence}) ${candidate.sourceUrl}`;
    }
    case "flagged":
      return `REVIEW     ${trackLabel(record)} -> ${disposition.candidates.length} candidate(s), best ${disposition.candidates[0]?.score ?? 0}`;
    case "unmatched":
      return `UNMATCHED  ${trackLabel(record)}: ${disposition.reason}`;
  }
}

export function formatSummary(summary: RunSummary): string[] {
  return [
    `  Tracks:       ${summary.tracks}`,
    `  Matched:      ${summary.matched}`,
    `  For review:   ${summary.flagged}`,
    `  Unmatched:    ${summary.unmatched} (${summary.cancelled} cancelled)`,
    `  Queries:      ${summary.queries} (${summary.cacheHits} from cache)`,
    `  Escalations:  ${summary.escalations}`,
    `  Errors:       ${summary.errors}`,
  ];
}

/**
 * Print every disposition in input order, then the run summary
 */
export function printReport(audit: AuditTrail, order: readonly string[] = []): void {
  const position = new Map(order.map((id, i) => [id, i]));
  const records = [...audit.dispositions].sort(
    (a, b) => (position.get(a.trackId) ?? Infinity) - (position.get(b.trackId) ?? Infinity)
  );

  const colour = (record: DispositionRecord, line: string): string => {
    switch (record.disposition.kind) {
      case "matched":
        return chalk.green(line);
      case "flagged":
        return chalk.yellow(line);
      case "unmatched":
        return chalk.red(line);
    }
  };

  console.log();
  console.log(chalk.bold.cyan("=".repeat(70)));
  console.log(chalk.bold.cyan("MATCH RESULTS"));
  console.log(chalk.bold.cyan("=".repeat(70)));
  for (const record of records) {
    console.log(colour(record, formatDispositionLine(record)));
    if (record.disposition.kind === "flagged") {
      for (const reason of record.disposition.reasons) {
        console.log(chalk.gray(`             ${reason}`));
      }
    }
  }
  console.log();
  console.log(chalk.bold.cyan("SUMMARY"));
  console.log(chalk.cyan("-".repeat(70)));
  for (const line of formatSummary(audit.summary())) {
    console.log(line);
  }
  console.log(chalk.bold.cyan("=".repeat(70)));
}

/**
 * Write the audit streams and summary as pretty JSON
 */
export async function writeAuditFile(filePath: string, audit: AuditTrail): Promise<void> {
  const output = {
    timestamp: new Date().toISOString(),
    ...audit.snapshot(),
  };
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(output, null, 2), "utf-8");
  logger.info(`Audit written to ${filePath}`);
}
