import type { CatalogVerificationRecord } from "../types";

export const METADATA_TEXT = [
  "Title: Example Album",
  "Contents: - tracks: [",
  '  {"number": 1, "title": "Morning Light"},',
  '  {"number": 2, "title": "River Song"},',
  '  {"number": 3, "title": "Night Drive"}',
  "]",
].join("\n");

export const MATCHING_CATALOG = [
  "Record 1:",
  "OCLC Number: 12345",
  "Content: Morning light -- River song (4:01) -- Night drive.",
].join("\n");

export const MISMATCHED_CATALOG = [
  "Record 1:",
  "OCLC Number: 12345",
  "Content: Morning Light -- Completely Different -- Another Thing",
].join("\n");

export function makeRecord(
  overrides: Partial<CatalogVerificationRecord> = {},
): CatalogVerificationRecord {
  return {
    row: 2,
    metadataText: METADATA_TEXT,
    catalogText: MATCHING_CATALOG,
    catalogId: "12345",
    confidence: 92,
    explanation: "Matched on track listing and label.",
    ...overrides,
  };
}
