/**
 * normalizeTitle.ts
 *
 * Canonical comparison form of a track title. Used only for matching,
 * never for display.
 */

function normalizeOnce(title: string): string {
  let norm = title.toLowerCase();

  // Library-catalog convention: "The Wind" files as "wind, the"
  if (norm.startsWith("the ")) {
    norm = norm.slice(4) + ", the";
  }

  norm = norm.replaceAll(" is a ", " is ").replaceAll(" is the ", " is ");

  // Substring removal, so "credit" loses its "edit" too
  norm = norm
    .replaceAll("(stripped)", "")
    .replaceAll("(edit)", "")
    .replaceAll("stripped", "")
    .replaceAll("edit", "");

  return norm
    .replace(/\s*\(with [^)]+\)/g, "")
    .replace(/\s*\([^)]+\)/g, "")
    .replace(/[^\p{L}\p{N}_\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Normalize a track title for comparison.
 *
 * The step sequence is applied until the output stops changing, so the
 * result is always a fixed point of this function.
 *
 * @example
 * normalizeTrackTitle("The Wind (Live)") // "wind the"
 */
export function normalizeTrackTitle(title: string): string {
  // Every changing pass shortens the string or rotates away one leading
  // "the", so the number of passes is bounded by the input length.
  let current = title;
  for (let pass = 0; pass <= title.length; pass++) {
    const next = normalizeOnce(current);
    if (next === current) return next;
    current = next;
  }
  return current;
}
