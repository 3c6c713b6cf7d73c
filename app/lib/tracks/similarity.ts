/**
 * similarity.ts
 *
 * Order-insensitive, partial-credit comparison of two track lists.
 *
 * Flow:
 * 1. Empty guard: either list empty -> 0
 * 2. Fold "Part N" runs of the metadata list into multi-part entries
 * 3. Best catalog counterpart per entry (matchTrack)
 * 4. Sum the scores of entries at or above MATCH_THRESHOLD, divide by the
 *    entry count
 * 5. Multi-part bonus: +10 points, capped at 80, when a group exists and the
 *    score is below 80
 */

import {
  MULTI_PART_STRATEGIES,
  TRACK_STRATEGIES,
  scorePair,
  tagFor,
} from "./matchStrategies";
import { consolidateMultiPart } from "./multiPart";
import { normalizeTrackTitle } from "./normalizeTitle";
import type {
  ConsolidatedEntry,
  SimilarityResult,
  TrackMatch,
  TrackMatchObserver,
} from "./types";

export const MATCH_THRESHOLD = 0.8;

export const MULTI_PART_BONUS = 10;
export const MULTI_PART_BONUS_CAP = 80;

interface Candidate {
  title: string;
  normalized: string;
}

function toCandidates(titles: readonly string[]): Candidate[] {
  return titles.map((title) => ({
    title,
    normalized: normalizeTrackTitle(title),
  }));
}

function matchAgainst(
  entry: ConsolidatedEntry,
  candidates: readonly Candidate[],
): TrackMatch {
  const source = normalizeTrackTitle(
    entry.kind === "multi-part" ? entry.mainTitle : entry.title,
  );
  const strategies =
    entry.kind === "multi-part" ? MULTI_PART_STRATEGIES : TRACK_STRATEGIES;

  let best: TrackMatch = {
    sourceTitle: entry.title,
    matchedTitle: null,
    score: 0,
    tag: "none",
    matched: false,
  };

  for (const candidate of candidates) {
    const pair = scorePair(source, candidate.normalized, strategies);
    // Strictly greater: the earliest candidate wins a tie
    if (pair.score > best.score) {
      best = {
        sourceTitle: entry.title,
        matchedTitle: candidate.title,
        score: pair.score,
        tag: tagFor(pair, source, candidate.normalized),
        matched: pair.score >= MATCH_THRESHOLD,
      };
    }
  }

  return best;
}

/**
 * Best catalog counterpart for one metadata entry.
 *
 * A plain string is matched as a standalone track; pass a multi-part entry
 * from consolidateMultiPart to match on its main title instead.
 */
export function matchTrack(
  entry: ConsolidatedEntry | string,
  catalogTracks: readonly string[],
): TrackMatch {
  const consolidated: ConsolidatedEntry =
    typeof entry === "string" ? { kind: "track", title: entry } : entry;
  return matchAgainst(consolidated, toCandidates(catalogTracks));
}

function emptyResult(): SimilarityResult {
  return {
    percent: 0,
    rawPercent: 0,
    trace: [],
    multiPartGroups: [],
    bonusApplied: false,
  };
}

/**
 * Compare a metadata track list with a catalog track list
 */
export function scoreTrackLists(
  metadataTracks: readonly string[],
  catalogTracks: readonly string[],
  observer?: TrackMatchObserver,
): SimilarityResult {
  if (metadataTracks.length === 0 || catalogTracks.length === 0) {
    return emptyResult();
  }

  const { entries, groups } = consolidateMultiPart([...metadataTracks]);
  const candidates = toCandidates(catalogTracks);

  observer?.onNormalized?.({
    metadata: entries.map((e) => normalizeTrackTitle(e.title)),
    catalog: candidates.map((c) => c.normalized),
  });

  const trace = entries.map((entry, index) => {
    const match = matchAgainst(entry, candidates);
    observer?.onTrackMatched?.({ index, match });
    return match;
  });

  if (entries.length === 0) return emptyResult();

  // Entries below the threshold contribute nothing
  const matchedScore = trace
    .filter((m) => m.matched)
    .reduce((sum, m) => sum + m.score, 0);
  const rawPercent = (matchedScore / entries.length) * 100;

  if (groups.length > 0 && rawPercent < MULTI_PART_BONUS_CAP) {
    const percent = Math.min(
      MULTI_PART_BONUS_CAP,
      rawPercent + MULTI_PART_BONUS,
    );
    observer?.onBonusApplied?.({ rawPercent, percent });
    return {
      percent,
      rawPercent,
      trace,
      multiPartGroups: groups,
      bonusApplied: true,
    };
  }

  return {
    percent: rawPercent,
    rawPercent,
    trace,
    multiPartGroups: groups,
    bonusApplied: false,
  };
}

/**
 * Percentage only, for callers that do not need the trace
 */
export function calculateTrackSimilarity(
  metadataTracks: readonly string[],
  catalogTracks: readonly string[],
): number {
  return scoreTrackLists(metadataTracks, catalogTracks).percent;
}
