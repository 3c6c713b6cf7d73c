/**
 * eligibility.ts
 *
 * Decides whether a record is worth a track-list check: it must carry both
 * blobs, a catalog id, a high enough confidence, and an explanation that
 * actually leaned on the track listing.
 */

import type { CatalogVerificationRecord, Eligibility } from "./types";

export const DEFAULT_MIN_CONFIDENCE = 85;

const TRACK_RELATED_TERMS = ["track", "content", "song", "listing"];

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === "string") return value.length > 0;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  return true;
}

/**
 * Numeric confidence from a number or numeric string, else null
 */
export function parseConfidence(value: number | string): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function mentionsTracks(explanation: string): boolean {
  const lower = explanation.toLowerCase();
  return TRACK_RELATED_TERMS.some((term) => lower.includes(term));
}

export function evaluateRecordEligibility(
  record: CatalogVerificationRecord,
  minConfidence: number = DEFAULT_MIN_CONFIDENCE,
): Eligibility {
  const { metadataText, catalogText, catalogId, confidence, explanation } =
    record;

  if (
    !isPresent(metadataText) ||
    !isPresent(catalogText) ||
    !isPresent(catalogId) ||
    !isPresent(explanation) ||
    confidence === null ||
    confidence === undefined ||
    !isPresent(confidence)
  ) {
    return { eligible: false, reason: "missing-fields" };
  }

  const parsed = parseConfidence(confidence);
  if (parsed === null) {
    return { eligible: false, reason: "invalid-confidence" };
  }
  if (parsed < minConfidence) {
    return { eligible: false, reason: "below-threshold" };
  }

  if (!explanation || !mentionsTracks(explanation)) {
    return { eligible: false, reason: "no-track-terms" };
  }

  return { eligible: true, confidence: parsed };
}
