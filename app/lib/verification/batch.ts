/**
 * batch.ts
 *
 * Runs records through verifyRecord one at a time. A record that throws is
 * reported as failed and the batch moves on.
 */

import { verifyRecord, type VerifyRecordOptions } from "./verifyRecord";
import type {
  CatalogVerificationRecord,
  VerificationBatchReport,
  VerificationCounts,
  VerificationOutcome,
} from "./types";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function verifyRecordSafely(
  record: CatalogVerificationRecord,
  options: VerifyRecordOptions = {},
): VerificationOutcome {
  try {
    return verifyRecord(record, options);
  } catch (error) {
    const message = errorMessage(error);
    return {
      status: "failed",
      row: record.row ?? null,
      error: message,
      summary: `Error: ${message}`,
    };
  }
}

export function countOutcomes(
  outcomes: readonly VerificationOutcome[],
): VerificationCounts {
  const counts: VerificationCounts = {
    total: outcomes.length,
    processed: 0,
    adjusted: 0,
    skipped: 0,
    insufficient: 0,
    failed: 0,
  };

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "skipped":
        counts.skipped++;
        break;
      case "failed":
        counts.failed++;
        break;
      case "insufficient-data":
        counts.processed++;
        counts.insufficient++;
        break;
      case "verified":
        counts.processed++;
        if (outcome.adjusted) counts.adjusted++;
        break;
    }
  }

  return counts;
}

export function runVerificationBatch(
  records: readonly CatalogVerificationRecord[],
  options: VerifyRecordOptions & {
    onOutcome?: (outcome: VerificationOutcome) => void;
  } = {},
): VerificationBatchReport {
  const { onOutcome, ...verifyOptions } = options;
  const outcomes: VerificationOutcome[] = [];

  for (const record of records) {
    const outcome = verifyRecordSafely(record, verifyOptions);
    onOutcome?.(outcome);
    outcomes.push(outcome);
  }

  return { outcomes, counts: countOutcomes(outcomes) };
}
