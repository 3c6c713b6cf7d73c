import { describe, expect, test } from "vitest";

import { consolidateMultiPart, isPartTitle } from "../multiPart";

describe("isPartTitle", () => {
  test("recognizes numbered and roman-numeral parts and movements", () => {
    expect(isPartTitle("Part 1")).toBe(true);
    expect(isPartTitle("part iv")).toBe(true);
    expect(isPartTitle("Movement 10")).toBe(true);
    expect(isPartTitle("MovementII")).toBe(true);
  });

  test("rejects titles that only start like a part", () => {
    expect(isPartTitle("Partita")).toBe(false);
    expect(isPartTitle("Part")).toBe(false);
    expect(isPartTitle("Part 1: Dawn")).toBe(false);
  });
});

describe("consolidateMultiPart", () => {
  test("folds a run of parts into its main title", () => {
    const { entries, groups } = consolidateMultiPart(["Intro", "Part 1", "Part 2"]);

    expect(entries).toEqual([
      {
        kind: "multi-part",
        title: "Intro (with 2 parts)",
        mainTitle: "Intro",
        parts: ["Part 1", "Part 2"],
      },
    ]);
    expect(groups).toEqual([{ mainTitle: "Intro", parts: ["Part 1", "Part 2"] }]);
  });

  test("keeps the main title's position among other tracks", () => {
    const { entries } = consolidateMultiPart([
      "Overture",
      "Symphony",
      "Movement I",
      "Movement II",
      "Finale",
      "Part 3",
    ]);

    expect(entries.map((e) => e.title)).toEqual([
      "Overture",
      "Symphony (with 2 parts)",
      "Finale (with 1 parts)",
    ]);
  });

  test("leaves leading parts standalone", () => {
    const { entries, groups } = consolidateMultiPart(["Part 1", "Song"]);

    expect(entries).toEqual([
      { kind: "track", title: "Part 1" },
      { kind: "track", title: "Song" },
    ]);
    expect(groups).toEqual([]);
  });

  test("only the entry directly before a run owns it", () => {
    const { entries } = consolidateMultiPart(["Sonata", "Interlude", "Part 1"]);

    expect(entries.map((e) => e.title)).toEqual([
      "Sonata",
      "Interlude (with 1 parts)",
    ]);
  });
});
