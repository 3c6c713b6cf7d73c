import { describe, expect, test } from "vitest";

import { formatMatchLine, formatTrackComparison } from "../report";
import type { TrackMatch } from "../types";

const multiPart: TrackMatch = {
  sourceTitle: "Intro (with 2 parts)",
  matchedTitle: "Intro",
  score: 0.95,
  tag: "multi-part",
  matched: true,
};

const miss: TrackMatch = {
  sourceTitle: "Zephyr",
  matchedTitle: "Alpha",
  score: 4 / 11,
  tag: "none",
  matched: false,
};

describe("formatMatchLine", () => {
  test("marks matches with their tag", () => {
    expect(formatMatchLine(2, multiPart)).toBe(
      "3. Intro (with 2 parts) => ✓(multi-part) Intro (0.95)",
    );
  });

  test("omits the tag for a plain ratio match", () => {
    const ratioMatch: TrackMatch = {
      sourceTitle: "Colour",
      matchedTitle: "Color",
      score: 10 / 11,
      tag: "none",
      matched: true,
    };
    expect(formatMatchLine(0, ratioMatch)).toBe("1. Colour => ✓ Color (0.91)");
  });

  test("shows the closest miss or no match", () => {
    expect(formatMatchLine(0, miss)).toBe("1. Zephyr => ✗ Alpha (0.36)");
    expect(
      formatMatchLine(0, {
        sourceTitle: "xyz",
        matchedTitle: null,
        score: 0,
        tag: "none",
        matched: false,
      }),
    ).toBe("1. xyz => ✗ No match");
  });
});

describe("formatTrackComparison", () => {
  test("produces one numbered line per track", () => {
    expect(formatTrackComparison([multiPart, miss])).toEqual([
      "1. Intro (with 2 parts) ✓ Intro (0.95)",
      "2. Zephyr ✗ Alpha (0.36)",
    ]);
  });
});
