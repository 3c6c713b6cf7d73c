import { describe, expect, test } from "vitest";

import {
  evaluateRecordEligibility,
  mentionsTracks,
  parseConfidence,
} from "../eligibility";
import { makeRecord } from "./fixtures";

describe("evaluateRecordEligibility", () => {
  test("accepts a complete, confident, track-related record", () => {
    expect(evaluateRecordEligibility(makeRecord())).toEqual({
      eligible: true,
      confidence: 92,
    });
  });

  test("requires every field", () => {
    for (const field of [
      "metadataText",
      "catalogText",
      "catalogId",
      "confidence",
      "explanation",
    ] as const) {
      expect(evaluateRecordEligibility(makeRecord({ [field]: null }))).toEqual({
        eligible: false,
        reason: "missing-fields",
      });
    }
    expect(evaluateRecordEligibility(makeRecord({ metadataText: "" }))).toEqual({
      eligible: false,
      reason: "missing-fields",
    });
  });

  test("treats a zero confidence as missing", () => {
    expect(evaluateRecordEligibility(makeRecord({ confidence: 0 }))).toEqual({
      eligible: false,
      reason: "missing-fields",
    });
  });

  test("parses numeric strings and rejects anything else", () => {
    expect(evaluateRecordEligibility(makeRecord({ confidence: " 90 " }))).toEqual({
      eligible: true,
      confidence: 90,
    });
    expect(evaluateRecordEligibility(makeRecord({ confidence: "high" }))).toEqual({
      eligible: false,
      reason: "invalid-confidence",
    });
  });

  test("applies the confidence threshold", () => {
    expect(evaluateRecordEligibility(makeRecord({ confidence: 84.9 }))).toEqual({
      eligible: false,
      reason: "below-threshold",
    });
    expect(
      evaluateRecordEligibility(makeRecord({ confidence: 84.9 }), 80),
    ).toEqual({ eligible: true, confidence: 84.9 });
  });

  test("requires the explanation to mention tracks", () => {
    expect(
      evaluateRecordEligibility(makeRecord({ explanation: "Cover art matches." })),
    ).toEqual({ eligible: false, reason: "no-track-terms" });
  });
});

describe("parseConfidence", () => {
  test("handles numbers and numeric strings", () => {
    expect(parseConfidence(95)).toBe(95);
    expect(parseConfidence("87.5")).toBe(87.5);
    expect(parseConfidence("")).toBeNull();
    expect(parseConfidence("90%")).toBeNull();
    expect(parseConfidence(Number.NaN)).toBeNull();
  });
});

describe("mentionsTracks", () => {
  test("matches track-related terms case-insensitively", () => {
    expect(mentionsTracks("SONG titles line up")).toBe(true);
    expect(mentionsTracks("Content notes agree")).toBe(true);
    expect(mentionsTracks("Same label and year")).toBe(false);
  });
});
