/**
 * sentinels.ts
 *
 * Noise filters shared by the metadata and catalog extractors.
 */

import type { TrackList } from "./types";

/**
 * Placeholder values that stand for "no data" rather than a title
 */
const SENTINEL_VALUES = new Set(["not visible", "n/a", "unavailable", "none"]);

/**
 * Field names that leak into title slots when a blob is half-structured
 */
const FIELD_NAME_ECHOES = new Set([
  "number",
  "title",
  "titletransliteration",
  "composer",
  "lyricist",
  "duration",
  "isrc",
  "not applicable",
  "not visible",
]);

const MAX_TITLE_WORDS = 8;

export function isSentinelValue(value: string): boolean {
  return SENTINEL_VALUES.has(value.toLowerCase());
}

export function isFieldNameEcho(value: string): boolean {
  return FIELD_NAME_ECHOES.has(value.toLowerCase());
}

/**
 * Descriptive asides ("Note: ...", "Contains bonus material") and long
 * sentences are almost never track titles.
 */
export function looksLikeAnnotation(value: string): boolean {
  const lower = value.toLowerCase();
  return (
    lower.includes("note") ||
    lower.startsWith("contains") ||
    value.split(/\s+/).filter(Boolean).length > MAX_TITLE_WORDS
  );
}

/**
 * Ordered accumulator for one extraction pass.
 * Trims candidates, drops empty and sentinel values, dedupes by exact string.
 */
export class TrackListBuilder {
  private readonly tracks: string[] = [];
  private readonly seen = new Set<string>();

  get size(): number {
    return this.tracks.length;
  }

  /**
   * Returns true when the candidate was added
   */
  add(candidate: string): boolean {
    const title = candidate.trim();
    if (!title || isSentinelValue(title) || this.seen.has(title)) {
      return false;
    }
    this.seen.add(title);
    this.tracks.push(title);
    return true;
  }

  addAll(candidates: Iterable<string>): string[] {
    const added: string[] = [];
    for (const candidate of candidates) {
      if (this.add(candidate)) added.push(candidate.trim());
    }
    return added;
  }

  toList(): TrackList {
    return [...this.tracks];
  }
}
