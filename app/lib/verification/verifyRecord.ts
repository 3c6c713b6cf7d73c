/**
 * verifyRecord.ts
 *
 * Record-level track verification.
 *
 * Flow:
 * 1. Eligibility (fields present, confidence >= threshold, explanation
 *    mentions tracks)
 * 2. Extract metadata and catalog track lists
 * 3. Either list empty -> insufficient data
 * 4. Score the lists; match every raw metadata track for the counts and note
 * 5. Similarity below 80% -> reduce confidence and append a review note
 */

import {
  extractCatalogTracks,
  extractMetadataTracks,
  formatTrackComparison,
  matchTrack,
  scoreTrackLists,
  type TrackMatchObserver,
} from "../tracks";
import { DEFAULT_MIN_CONFIDENCE, evaluateRecordEligibility } from "./eligibility";
import type { CatalogVerificationRecord, VerificationOutcome } from "./types";

/**
 * Records scoring below this percentage get their confidence reduced
 */
export const SIMILARITY_THRESHOLD = 80;

export const DEFAULT_REDUCED_CONFIDENCE = 80;

export interface VerifyRecordOptions {
  minConfidence?: number;
  reducedConfidence?: number;
  observer?: TrackMatchObserver;
}

export function buildReviewNote(
  similarityPercent: number,
  comparisonLines: readonly string[],
): string {
  let note =
    "\n\n[AUTOMATIC REVIEW: Confidence reduced due to track listing mismatch. " +
    `Track similarity is only ${similarityPercent.toFixed(2)}%, below ${SIMILARITY_THRESHOLD}% threshold. ` +
    "Please verify manually.]";
  note += "\n\nTrack comparison:";
  for (const line of comparisonLines) {
    note += `\n${line}`;
  }
  return note;
}

export function verifyRecord(
  record: CatalogVerificationRecord,
  options: VerifyRecordOptions = {},
): VerificationOutcome {
  const {
    minConfidence = DEFAULT_MIN_CONFIDENCE,
    reducedConfidence = DEFAULT_REDUCED_CONFIDENCE,
    observer,
  } = options;
  const row = record.row ?? null;

  const eligibility = evaluateRecordEligibility(record, minConfidence);
  if (!eligibility.eligible) {
    return { status: "skipped", row, reason: eligibility.reason };
  }

  const catalogId = String(record.catalogId ?? "");
  const metadataTracks = extractMetadataTracks(record.metadataText, observer);
  const catalogTracks = extractCatalogTracks(
    record.catalogText,
    catalogId,
    observer,
  );

  const counts =
    `Metadata tracks: ${metadataTracks.length}\n` +
    `OCLC tracks: ${catalogTracks.length}`;

  if (metadataTracks.length === 0 || catalogTracks.length === 0) {
    return {
      status: "insufficient-data",
      row,
      metadataTracks,
      catalogTracks,
      summary: `${counts}\nSkipped: insufficient track data`,
    };
  }

  const similarity = scoreTrackLists(metadataTracks, catalogTracks, observer);
  const trackMatches = metadataTracks.map((t) => matchTrack(t, catalogTracks));
  const matchingTracks = trackMatches.filter((m) => m.matched).length;

  let summary =
    `${counts}\n` +
    `Matching tracks: ${matchingTracks}/${metadataTracks.length}\n` +
    `Similarity: ${similarity.percent.toFixed(2)}%`;

  const previousConfidence = eligibility.confidence;
  let explanation = record.explanation ?? "";
  let confidence = previousConfidence;
  const adjusted = similarity.percent < SIMILARITY_THRESHOLD;

  if (adjusted) {
    confidence = reducedConfidence;
    explanation += buildReviewNote(
      similarity.percent,
      formatTrackComparison(trackMatches),
    );
    summary += `\nAction: Reduced confidence from ${previousConfidence}% to ${confidence}%`;
  } else {
    summary += "\nAction: None (similarity is acceptable)";
  }

  return {
    status: "verified",
    row,
    metadataTracks,
    catalogTracks,
    similarity,
    trackMatches,
    matchingTracks,
    adjusted,
    previousConfidence,
    confidence,
    explanation,
    summary,
  };
}
