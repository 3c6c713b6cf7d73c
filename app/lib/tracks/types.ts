/**
 * types.ts
 *
 * Type definitions for track-list extraction and similarity scoring.
 */

/**
 * Free-text blob as it arrives from a record. Absent or empty means "no data".
 */
export type RawText = string | null | undefined;

/**
 * Ordered track titles, deduplicated on insertion
 */
export type TrackList = string[];

/**
 * A main title plus the "Part N" / "Movement N" entries that directly follow it
 */
export interface MultiPartGroup {
  mainTitle: string;
  parts: string[];
}

/**
 * One comparison unit after multi-part consolidation
 */
export type ConsolidatedEntry =
  | { kind: "track"; title: string }
  | { kind: "multi-part"; title: string; mainTitle: string; parts: string[] };

/**
 * How a track was matched against its counterpart
 */
export type MatchTag =
  | "exact"
  | "substring"
  | "word-overlap"
  | "multi-part"
  | "none";

export interface TrackMatch {
  sourceTitle: string;
  matchedTitle: string | null;
  score: number; // 0-1
  tag: MatchTag;
  matched: boolean; // score >= MATCH_THRESHOLD
}

export interface SimilarityResult {
  percent: number; // 0-100
  rawPercent: number; // before the multi-part bonus
  trace: TrackMatch[];
  multiPartGroups: MultiPartGroup[];
  bonusApplied: boolean;
}

/**
 * Optional hooks for tracing extraction and scoring.
 * The core never logs on its own; callers pass an observer to see progress.
 */
export interface TrackMatchObserver {
  onStrategyApplied?(event: {
    source: "metadata" | "catalog";
    strategy: string;
    added: string[];
    total: number;
  }): void;
  onNormalized?(event: { metadata: string[]; catalog: string[] }): void;
  onTrackMatched?(event: { index: number; match: TrackMatch }): void;
  onBonusApplied?(event: { rawPercent: number; percent: number }): void;
}
