/**
 * catalogTracks.ts
 *
 * Pulls the track list of one catalog record out of a dump that may hold
 * several records ("Record 1: ... OCLC Number: 12345 ... Content: ...").
 */

import { TrackListBuilder } from "./sentinels";
import type { RawText, TrackList, TrackMatchObserver } from "./types";

const RECORD_SEPARATOR = String.raw`Record \d+:|-{40}`;

const CONTENT_PATTERNS = [
  /Content:\s*([\s\S]*?)(?:\n\s*[A-Z][a-z]+:|$)/,
  /Description:[\s\S]*?Content:\s*([\s\S]*?)(?:\n\s*[A-Z][a-z]+:|$)/,
];

const SEGMENT_DELIMITERS = ["\n", ";", ","] as const;

const DELIMITER_NAMES: Record<(typeof SEGMENT_DELIMITERS)[number], string> = {
  "\n": "newline-delimited",
  ";": "semicolon-delimited",
  ",": "comma-delimited",
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Isolate the text of the record whose identifier line matches `catalogId`,
 * up to the next record separator or the end of the dump.
 */
export function findCatalogRecord(
  dump: string,
  catalogId: string,
): string | null {
  const id = catalogId.trim();
  if (!id) return null;

  const pattern = new RegExp(
    String.raw`OCLC Number:\s*${escapeRegExp(id)}(?!\w)[\s\S]*?(?=${RECORD_SEPARATOR}|$)`,
  );
  return dump.match(pattern)?.[0] ?? null;
}

/**
 * The Content field of a record, optionally nested after Description
 */
export function findContentField(record: string): string | null {
  for (const pattern of CONTENT_PATTERNS) {
    const match = record.match(pattern);
    if (match) {
      const content = (match[1] ?? "").trim();
      return content || null;
    }
  }
  return null;
}

/**
 * Strip trailing period, performer credits and a duration from one segment
 */
function cleanSegment(segment: string): string {
  let title = segment.trim();
  if (title.endsWith(".")) {
    title = title.slice(0, -1).trim();
  }
  return title
    .replace(/\s*\/\s*[^(]+/g, "")
    .replace(/\s*\(\d+[:.]\d+\)\.?$/, "");
}

/**
 * Segments in the " -- " convention can also carry an unrelated trailing
 * parenthetical ("(bonus track)") after the duration.
 */
function cleanDashSegment(segment: string): string {
  return cleanSegment(segment).replace(/\s*\([^)]*\)$/, "");
}

function splitContentField(
  content: string,
  observer?: TrackMatchObserver,
): TrackList {
  const tracks = new TrackListBuilder();

  if (content.includes(" -- ")) {
    const added = tracks.addAll(content.split(" -- ").map(cleanDashSegment));
    observer?.onStrategyApplied?.({
      source: "catalog",
      strategy: "dash-delimited",
      added,
      total: tracks.size,
    });
    return tracks.toList();
  }

  for (const delimiter of SEGMENT_DELIMITERS) {
    if (tracks.size > 0 || !content.includes(delimiter)) continue;
    const added = tracks.addAll(content.split(delimiter).map(cleanSegment));
    observer?.onStrategyApplied?.({
      source: "catalog",
      strategy: DELIMITER_NAMES[delimiter],
      added,
      total: tracks.size,
    });
  }

  return tracks.toList();
}

/**
 * Extract the track list of the record identified by `catalogId`.
 * Never throws; a missing record or content field gives an empty list.
 */
export function extractCatalogTracks(
  catalogText: RawText,
  catalogId: string,
  observer?: TrackMatchObserver,
): TrackList {
  if (!catalogText) return [];

  const record = findCatalogRecord(catalogText, catalogId);
  if (!record) return [];

  const content = findContentField(record);
  const tracks = content ? splitContentField(content, observer) : [];
  if (tracks.length > 0) return tracks;

  // Last resort: "<title> (m:ss)" runs anywhere in the record
  const fallback = new TrackListBuilder();
  const added = fallback.addAll(
    Array.from(
      record.matchAll(/([^-()]+?)\s*\(\d+[:.]\d+\)/g),
      (m) => m[1] ?? "",
    ),
  );
  observer?.onStrategyApplied?.({
    source: "catalog",
    strategy: "timed-title-scan",
    added,
    total: fallback.size,
  });
  return fallback.toList();
}
