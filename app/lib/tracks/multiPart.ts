/**
 * multiPart.ts
 *
 * Folds "Part N" / "Movement N" runs into the title they belong to, so a
 * four-movement work counts as one comparison unit instead of five.
 *
 * Only the entry immediately before a run can own it: a main title followed by
 * other tracks before its parts is not grouped.
 */

import type { ConsolidatedEntry, MultiPartGroup } from "./types";

const PART_PATTERN = /^(?:Part|Movement)\s*(?:\d+|[IVX]+)$/i;

export function isPartTitle(title: string): boolean {
  return PART_PATTERN.test(title);
}

export function multiPartTitle(mainTitle: string, partCount: number): string {
  return `${mainTitle} (with ${partCount} parts)`;
}

export interface Consolidation {
  entries: ConsolidatedEntry[];
  groups: MultiPartGroup[];
}

/**
 * Replace each main title + part run with one synthetic multi-part entry.
 * Lists without part runs come back unchanged, one "track" entry per title.
 */
export function consolidateMultiPart(tracks: string[]): Consolidation {
  const entries: ConsolidatedEntry[] = [];
  const groups: MultiPartGroup[] = [];

  let i = 0;
  while (i < tracks.length) {
    const title = tracks[i];
    i++;

    if (isPartTitle(title)) {
      entries.push({ kind: "track", title });
      continue;
    }

    const parts: string[] = [];
    while (i < tracks.length && isPartTitle(tracks[i])) {
      parts.push(tracks[i]);
      i++;
    }

    if (parts.length === 0) {
      entries.push({ kind: "track", title });
    } else {
      groups.push({ mainTitle: title, parts });
      entries.push({
        kind: "multi-part",
        title: multiPartTitle(title, parts.length),
        mainTitle: title,
        parts,
      });
    }
  }

  return { entries, groups };
}
