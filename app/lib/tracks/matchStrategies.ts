/**
 * matchStrategies.ts
 *
 * Pairwise scoring rules for two normalized titles.
 *
 * The rules overlap (a title contained in another usually shares most of its
 * words too), so they are kept as an explicitly ordered list: the first rule
 * that applies to a pair decides its score.
 */

import { sequenceRatio } from "./sequenceRatio";
import type { MatchTag } from "./types";

export type MatchStrategyName =
  | "word-overlap"
  | "substring"
  | "multi-part"
  | "ratio";

export interface MatchStrategy {
  name: MatchStrategyName;
  /**
   * Score in [0, 1], or null when the rule does not apply to this pair
   */
  score(source: string, candidate: string): number | null;
}

export interface PairScore {
  score: number;
  strategy: MatchStrategyName;
}

const WORD_OVERLAP_SHARE = 0.6;
const WORD_OVERLAP_FLOOR = 0.8;
const SUBSTRING_FLOOR = 0.85;
const MULTI_PART_CONTAINMENT_SCORE = 0.95;

function wordSet(value: string): Set<string> {
  return new Set(value.split(/\s+/).filter(Boolean));
}

function containsEither(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

export const wordOverlapStrategy: MatchStrategy = {
  name: "word-overlap",
  score(source, candidate) {
    const sourceWords = wordSet(source);
    const candidateWords = wordSet(candidate);
    const common = Array.from(sourceWords).filter((w) =>
      candidateWords.has(w),
    ).length;

    const shorter = Math.min(sourceWords.size, candidateWords.size);
    const required = Math.max(1, Math.floor(shorter * WORD_OVERLAP_SHARE));
    if (shorter === 0 || common < required) return null;

    return Math.max(WORD_OVERLAP_FLOOR, common / shorter);
  },
};

export const substringStrategy: MatchStrategy = {
  name: "substring",
  score(source, candidate) {
    if (!containsEither(source, candidate)) return null;
    return Math.max(SUBSTRING_FLOOR, sequenceRatio(source, candidate));
  },
};

export const multiPartStrategy: MatchStrategy = {
  name: "multi-part",
  score(mainTitle, candidate) {
    return containsEither(mainTitle, candidate)
      ? MULTI_PART_CONTAINMENT_SCORE
      : null;
  },
};

export const ratioStrategy: MatchStrategy = {
  name: "ratio",
  score: (source, candidate) => sequenceRatio(source, candidate),
};

/**
 * Rules for a plain track, in precedence order
 */
export const TRACK_STRATEGIES: readonly MatchStrategy[] = [
  wordOverlapStrategy,
  substringStrategy,
  ratioStrategy,
];

/**
 * Rules for a multi-part entry, applied to its main title
 */
export const MULTI_PART_STRATEGIES: readonly MatchStrategy[] = [
  multiPartStrategy,
  ratioStrategy,
];

export function scorePair(
  source: string,
  candidate: string,
  strategies: readonly MatchStrategy[],
): PairScore {
  for (const strategy of strategies) {
    const score = strategy.score(source, candidate);
    if (score !== null) return { score, strategy: strategy.name };
  }
  return { score: 0, strategy: "ratio" };
}

/**
 * Report tag for a winning pair
 */
export function tagFor(
  pair: PairScore,
  source: string,
  candidate: string,
): MatchTag {
  if (pair.strategy === "multi-part") return "multi-part";
  if (source === candidate) return "exact";
  if (pair.strategy === "ratio") return "none";
  return pair.strategy;
}
