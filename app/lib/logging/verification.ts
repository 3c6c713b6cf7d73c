import { join } from "path";

import { formatMatchLine } from "../tracks/report";
import type { TrackMatchObserver } from "../tracks/types";
import type {
  VerificationBatchReport,
  VerificationOutcome,
} from "../verification/types";
import { writeJsonlCapped } from "./jsonl";

export const VERIFICATION_LOG_FILE = "verification.jsonl";

/**
 * Observer that prints extraction and matching progress to the console
 */
export function createConsoleObserver(): TrackMatchObserver {
  return {
    onStrategyApplied({ source, strategy, added, total }) {
      if (added.length === 0) return;
      console.log(
        `[TRACK EXTRACT] ${source}/${strategy}: +${added.length} (total ${total})`,
        added,
      );
    },
    onNormalized({ metadata, catalog }) {
      console.log("[TRACK MATCH] Normalized metadata tracks:", metadata);
      console.log("[TRACK MATCH] Normalized OCLC tracks:", catalog);
    },
    onTrackMatched({ index, match }) {
      console.log(`[TRACK MATCH]   ${formatMatchLine(index, match)}`);
    },
    onBonusApplied({ percent }) {
      console.log(
        `[TRACK MATCH] Applying multi-part track bonus: final similarity ${percent.toFixed(2)}%`,
      );
    },
  };
}

function summarizeOutcome(outcome: VerificationOutcome): unknown {
  switch (outcome.status) {
    case "skipped":
      return { row: outcome.row, status: outcome.status, reason: outcome.reason };
    case "failed":
      return { row: outcome.row, status: outcome.status, error: outcome.error };
    case "insufficient-data":
      return {
        row: outcome.row,
        status: outcome.status,
        metadataTracks: outcome.metadataTracks.length,
        catalogTracks: outcome.catalogTracks.length,
      };
    case "verified":
      return {
        row: outcome.row,
        status: outcome.status,
        similarity: Number(outcome.similarity.percent.toFixed(2)),
        matchingTracks: outcome.matchingTracks,
        metadataTracks: outcome.metadataTracks.length,
        adjusted: outcome.adjusted,
      };
  }
}

/**
 * Logs a batch run to a capped JSONL file.
 * Keeps only the last 3 runs to avoid growing without bound.
 */
export async function logVerificationRun(params: {
  logsDir: string;
  inputPath: string;
  outputPath: string;
  report: VerificationBatchReport;
  maxSamples?: number;
}): Promise<void> {
  const { logsDir, inputPath, outputPath, report, maxSamples = 20 } = params;
  try {
    // Skipped rows are the bulk of most runs and say little
    const interesting = report.outcomes.filter((o) => o.status !== "skipped");
    const entry = {
      timestamp: new Date().toISOString(),
      inputPath,
      outputPath,
      counts: report.counts,
      samples: interesting.slice(0, maxSamples).map(summarizeOutcome),
    };
    await writeJsonlCapped({
      filePath: join(logsDir, VERIFICATION_LOG_FILE),
      entry,
      maxEntries: 3,
    });
  } catch (error) {
    // Don't throw - logging failures shouldn't break the run
    console.error("Failed to log verification run:", error);
  }
}
