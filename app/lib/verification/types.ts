/**
 * types.ts
 *
 * Types for record-level track verification.
 */

import type { SimilarityResult, TrackList, TrackMatch } from "../tracks/types";

/**
 * One candidate record as supplied by the batch driver.
 * Every field may be missing; eligibility decides what is usable.
 */
export interface CatalogVerificationRecord {
  row?: number;
  metadataText?: string | null;
  catalogText?: string | null;
  catalogId?: string | null;
  confidence?: number | string | null;
  explanation?: string | null;
}

export type SkipReason =
  | "missing-fields"
  | "invalid-confidence"
  | "below-threshold"
  | "no-track-terms";

export type Eligibility =
  | { eligible: true; confidence: number }
  | { eligible: false; reason: SkipReason };

export type VerificationOutcome =
  | {
      status: "skipped";
      row: number | null;
      reason: SkipReason;
    }
  | {
      status: "insufficient-data";
      row: number | null;
      metadataTracks: TrackList;
      catalogTracks: TrackList;
      summary: string;
    }
  | {
      status: "verified";
      row: number | null;
      metadataTracks: TrackList;
      catalogTracks: TrackList;
      similarity: SimilarityResult;
      trackMatches: TrackMatch[]; // one per raw metadata track
      matchingTracks: number;
      adjusted: boolean;
      previousConfidence: number;
      confidence: number;
      explanation: string;
      summary: string;
    }
  | {
      status: "failed";
      row: number | null;
      error: string;
      summary: string;
    };

export interface VerificationCounts {
  total: number;
  processed: number; // eligible records, verified or not
  adjusted: number;
  skipped: number;
  insufficient: number;
  failed: number;
}

export interface VerificationBatchReport {
  outcomes: VerificationOutcome[];
  counts: VerificationCounts;
}
