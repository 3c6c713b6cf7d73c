/**
 * input.ts
 *
 * Validates a JSON batch of records handed to the verifier.
 */

import { z } from "zod";

import type { CatalogVerificationRecord } from "./types";

const RecordSchema = z.object({
  row: z.number().int().positive().optional(),
  metadataText: z.string().nullish(),
  catalogText: z.string().nullish(),
  // Spreadsheet exports often turn identifiers into numbers
  catalogId: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (typeof v === "number" ? String(v) : v)),
  confidence: z.union([z.number(), z.string()]).nullish(),
  explanation: z.string().nullish(),
});

const BatchSchema = z.array(RecordSchema);

/**
 * Parse raw JSON into records, numbering rows from 1 where the input
 * does not carry its own row numbers.
 */
export function parseVerificationInput(
  raw: unknown,
): CatalogVerificationRecord[] {
  const parsed = BatchSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid verification input: ${details}`);
  }

  return parsed.data.map((record, index) => ({
    ...record,
    row: record.row ?? index + 1,
  }));
}
