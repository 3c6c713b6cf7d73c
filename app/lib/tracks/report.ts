/**
 * report.ts
 *
 * Human-readable lines for match traces and track comparison notes.
 */

import type { TrackMatch } from "./types";

/**
 * "3. Intro (with 2 parts) => ✓(multi-part) Intro (0.95)"
 */
export function formatMatchLine(index: number, match: TrackMatch): string {
  const prefix = `${index + 1}. ${match.sourceTitle} => `;

  if (match.matched) {
    const tag = match.tag === "none" ? "" : `(${match.tag})`;
    return `${prefix}✓${tag} ${match.matchedTitle ?? ""} (${match.score.toFixed(2)})`;
  }
  if (match.matchedTitle === null) {
    return `${prefix}✗ No match`;
  }
  return `${prefix}✗ ${match.matchedTitle} (${match.score.toFixed(2)})`;
}

/**
 * "2. Song B ✗ Song Z (0.40)", one line per metadata track
 */
export function formatTrackComparison(matches: readonly TrackMatch[]): string[] {
  return matches.map((m, i) => {
    const status = m.matched ? "✓" : "✗";
    const counterpart = m.matchedTitle ?? "No match";
    return `${i + 1}. ${m.sourceTitle} ${status} ${counterpart} (${m.score.toFixed(2)})`;
  });
}
