/**
 * Track-list verification core
 *
 * Extraction, normalization and scoring. Everything here is pure and
 * synchronous; pass a TrackMatchObserver to trace progress.
 */

export { extractMetadataTracks, METADATA_STRATEGIES } from "./metadataTracks";
export { extractCatalogTracks } from "./catalogTracks";
export { normalizeTrackTitle } from "./normalizeTitle";
export { sequenceRatio } from "./sequenceRatio";
export { consolidateMultiPart } from "./multiPart";
export {
  MATCH_THRESHOLD,
  calculateTrackSimilarity,
  matchTrack,
  scoreTrackLists,
} from "./similarity";
export { formatMatchLine, formatTrackComparison } from "./report";
export type {
  ConsolidatedEntry,
  MatchTag,
  MultiPartGroup,
  RawText,
  SimilarityResult,
  TrackList,
  TrackMatch,
  TrackMatchObserver,
} from "./types";
