import { describe, expect, it } from "vitest";

import { buildReviewNote, verifyRecord } from "../verifyRecord";
import { MISMATCHED_CATALOG, makeRecord } from "./fixtures";

describe("verifyRecord", () => {
  it("leaves confidence alone when the listings agree", () => {
    const outcome = verifyRecord(makeRecord());

    if (outcome.status !== "verified") {
      throw new Error(`Expected verified outcome, got: ${outcome.status}`);
    }
    expect(outcome.metadataTracks).toEqual([
      "Morning Light",
      "River Song",
      "Night Drive",
    ]);
    expect(outcome.catalogTracks).toEqual([
      "Morning light",
      "River song",
      "Night drive",
    ]);
    expect(outcome.adjusted).toBe(false);
    expect(outcome.confidence).toBe(92);
    expect(outcome.explanation).toBe("Matched on track listing and label.");
    expect(outcome.summary).toBe(
      [
        "Metadata tracks: 3",
        "OCLC tracks: 3",
        "Matching tracks: 3/3",
        "Similarity: 100.00%",
        "Action: None (similarity is acceptable)",
      ].join("\n"),
    );
  });

  it("reduces confidence and appends a comparison note on a mismatch", () => {
    const outcome = verifyRecord(makeRecord({ catalogText: MISMATCHED_CATALOG }));

    if (outcome.status !== "verified") {
      throw new Error(`Expected verified outcome, got: ${outcome.status}`);
    }
    expect(outcome.adjusted).toBe(true);
    expect(outcome.previousConfidence).toBe(92);
    expect(outcome.confidence).toBe(80);
    expect(outcome.matchingTracks).toBe(1);
    expect(outcome.summary).toBe(
      [
        "Metadata tracks: 3",
        "OCLC tracks: 3",
        "Matching tracks: 1/3",
        "Similarity: 33.33%",
        "Action: Reduced confidence from 92% to 80%",
      ].join("\n"),
    );

    const lines = outcome.explanation.split("\n");
    expect(lines.slice(0, 5)).toEqual([
      "Matched on track listing and label.",
      "",
      "[AUTOMATIC REVIEW: Confidence reduced due to track listing mismatch. Track similarity is only 33.33%, below 80% threshold. Please verify manually.]",
      "",
      "Track comparison:",
    ]);
    expect(lines[5]).toBe("1. Morning Light ✓ Morning Light (1.00)");
    expect(lines[6]).toMatch(/^2\. River Song ✗ /);
    expect(lines[7]).toMatch(/^3\. Night Drive ✗ /);
    expect(lines).toHaveLength(8);
  });

  it("honours a custom reduced confidence", () => {
    const outcome = verifyRecord(makeRecord({ catalogText: MISMATCHED_CATALOG }), {
      reducedConfidence: 70,
    });

    expect(outcome).toMatchObject({ status: "verified", confidence: 70 });
  });

  it("reports insufficient data when the catalog record is missing", () => {
    const outcome = verifyRecord(makeRecord({ catalogId: "99999" }));

    expect(outcome).toEqual({
      status: "insufficient-data",
      row: 2,
      metadataTracks: ["Morning Light", "River Song", "Night Drive"],
      catalogTracks: [],
      summary: "Metadata tracks: 3\nOCLC tracks: 0\nSkipped: insufficient track data",
    });
  });

  it("skips records that are not eligible", () => {
    expect(verifyRecord(makeRecord({ confidence: 70 }))).toEqual({
      status: "skipped",
      row: 2,
      reason: "below-threshold",
    });
    expect(
      verifyRecord(makeRecord({ explanation: "Label and year agree." })),
    ).toMatchObject({ status: "skipped", reason: "no-track-terms" });
  });

  it("counts part entries individually in the per-track matches", () => {
    const outcome = verifyRecord(
      makeRecord({
        metadataText: [
          '{"number": 1, "title": "Intro"}',
          '{"number": 2, "title": "Part 1"}',
          '{"number": 3, "title": "Part 2"}',
        ].join("\n"),
        catalogText: "OCLC Number: 12345\nContent: Intro -- Outro",
      }),
    );

    if (outcome.status !== "verified") {
      throw new Error(`Expected verified outcome, got: ${outcome.status}`);
    }
    expect(outcome.similarity.percent).toBeCloseTo(95, 10);
    expect(outcome.trackMatches.map((m) => m.sourceTitle)).toEqual([
      "Intro",
      "Part 1",
      "Part 2",
    ]);
    expect(outcome.matchingTracks).toBe(1);
    expect(outcome.adjusted).toBe(false);
  });
});

describe("buildReviewNote", () => {
  it("lists every comparison line after the header", () => {
    expect(buildReviewNote(50, ["1. A ✓ A (1.00)", "2. B ✗ No match (0.00)"])).toBe(
      "\n\n[AUTOMATIC REVIEW: Confidence reduced due to track listing mismatch. " +
        "Track similarity is only 50.00%, below 80% threshold. Please verify manually.]" +
        "\n\nTrack comparison:\n1. A ✓ A (1.00)\n2. B ✗ No match (0.00)",
    );
  });
});
