/**
 * metadataTracks.ts
 *
 * Pulls an ordered track list out of a self-reported metadata blob.
 *
 * The blob is usually half-structured ("Contents: - tracks: [ {...} ]") but
 * often drifts into loose JSON fragments or plain prose. Extraction runs an
 * ordered list of strategies, from strictest to loosest, and stops as soon as
 * enough titles have been found.
 *
 * Flow:
 * 1. contents-section: structured entries inside the Contents/tracks array
 * 2. numbered-quoted-title / numbered-bare-title / title-with-duration /
 *    quoted-title: title fields anywhere in the text
 * 3. labeled-section: "Track listing:" style prose, split on ordinals,
 *    quotes and (m:ss) durations
 * 4. Post-filters: field-name echoes, then annotation-like rows
 */

import {
  TrackListBuilder,
  isFieldNameEcho,
  looksLikeAnnotation,
} from "./sentinels";
import type { RawText, TrackList, TrackMatchObserver } from "./types";

/**
 * A strategy is considered sufficient once this many titles are known
 */
export const SUFFICIENT_TRACK_COUNT = 3;

export interface TrackExtractionStrategy {
  name: string;
  extract(text: string): string[];
}

function captureAll(text: string, pattern: RegExp): string[] {
  return Array.from(text.matchAll(pattern), (m) => m[1] ?? "");
}

function stripTrailingCommas(value: string): string {
  return value.trim().replace(/,+$/, "");
}

/**
 * Removes one pair of wrapping quotes and a trailing comma from a loose value
 */
function unquoteLooseValue(value: string): string {
  let title = value.trim();
  if (title.startsWith('"') && title.endsWith('"')) {
    title = title.slice(1, -1);
  }
  if (title.endsWith(",")) {
    title = title.slice(0, -1);
  }
  return title;
}

const contentsSectionStrategy: TrackExtractionStrategy = {
  name: "contents-section",
  extract(text) {
    const section = text.match(/Contents:\s*-\s*tracks:\s*\[([\s\S]*?)\]/);
    if (!section) return [];
    const body = section[1] ?? "";

    const entries = captureAll(
      body,
      /\{\s*"number":\s*\d+,\s*"title":\s*"([^"]+)"/g,
    );
    const titles = new TrackListBuilder();
    titles.addAll(entries);
    if (titles.size > 0) return titles.toList();

    // Entries without the number/title object shape
    return captureAll(body, /"title":\s*([^,\n]+)/g).map(unquoteLooseValue);
  },
};

function titleFieldStrategy(
  name: string,
  pattern: RegExp,
): TrackExtractionStrategy {
  return {
    name,
    extract: (text) => captureAll(text, pattern).map(stripTrailingCommas),
  };
}

const labeledSectionStrategy: TrackExtractionStrategy = {
  name: "labeled-section",
  extract(text) {
    const sections = captureAll(
      text,
      /(?:Track\s+list(?:ing)?|Contents|Tracks):\s*([\s\S]*?)(?:\n\s*\w+:|$)/gi,
    );

    const candidates: string[] = [];
    for (const section of sections) {
      candidates.push(
        ...captureAll(section, /(?:\d+[.)]\s*|"\s*)([^"\n(]+)(?:"|\n|\(|$)/g),
        ...captureAll(section, /([^,;]+)\s*\(\d+:\d+\)/g),
      );
    }
    return candidates;
  },
};

/**
 * Strategies in the order they are tried
 */
export const METADATA_STRATEGIES: readonly TrackExtractionStrategy[] = [
  contentsSectionStrategy,
  titleFieldStrategy(
    "numbered-quoted-title",
    /"number":\s*\d+,\s*"title":\s*"([^"]+)"/g,
  ),
  titleFieldStrategy(
    "numbered-bare-title",
    /"number":\s*\d+,\s*"title":\s*([^,\n]+),/g,
  ),
  titleFieldStrategy(
    "title-with-duration",
    /"title":\s*"([^"]+)"[^}]*?"duration":\s*(\d+:\d+)/g,
  ),
  titleFieldStrategy("quoted-title", /"title":\s*"([^"]+)"/g),
  labeledSectionStrategy,
];

/**
 * Runs strategies in order until the list is sufficient.
 * The sufficiency check uses the unfiltered count; post-filters run last.
 */
export function runExtractionStrategies(
  text: string,
  strategies: readonly TrackExtractionStrategy[],
  observer?: TrackMatchObserver,
): TrackList {
  const tracks = new TrackListBuilder();

  for (const strategy of strategies) {
    if (tracks.size >= SUFFICIENT_TRACK_COUNT) break;
    const added = tracks.addAll(strategy.extract(text));
    observer?.onStrategyApplied?.({
      source: "metadata",
      strategy: strategy.name,
      added,
      total: tracks.size,
    });
  }

  return tracks.toList();
}

/**
 * Extract the track list from a metadata blob.
 * Never throws; absent or unrecognizable text gives an empty list.
 */
export function extractMetadataTracks(
  metadata: RawText,
  observer?: TrackMatchObserver,
): TrackList {
  if (!metadata) return [];

  return runExtractionStrategies(metadata, METADATA_STRATEGIES, observer)
    .filter((t) => !isFieldNameEcho(t))
    .filter((t) => !looksLikeAnnotation(t));
}
