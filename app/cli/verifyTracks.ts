#!/usr/bin/env node

import dotenv from "dotenv";
dotenv.config();

import { readFile, writeFile } from "fs/promises";
import { dirname, join, resolve } from "path";

import { loadConfig } from "../lib/config";
import { logVerificationRun, createConsoleObserver } from "../lib/logging/verification";
import { runVerificationBatch } from "../lib/verification/batch";
import { parseVerificationInput } from "../lib/verification/input";
import type { VerificationOutcome } from "../lib/verification/types";

function usage(): string {
  return "Usage: verify-tracks <input.json> [output.json] [--debug]";
}

function defaultOutputPath(inputPath: string): string {
  const date = new Date().toISOString().slice(0, 10);
  return join(dirname(inputPath), `track-verification-${date}.json`);
}

function describeOutcome(outcome: VerificationOutcome): string {
  const row = outcome.row ?? "?";
  switch (outcome.status) {
    case "skipped":
      return `Skipping row ${row}: ${outcome.reason}`;
    case "failed":
      return `Error processing row ${row}: ${outcome.error}`;
    case "insufficient-data":
      return `Row ${row}: insufficient track data (metadata ${outcome.metadataTracks.length}, OCLC ${outcome.catalogTracks.length})`;
    case "verified":
      return `Row ${row}: similarity ${outcome.similarity.percent.toFixed(2)}%${
        outcome.adjusted
          ? `, confidence ${outcome.previousConfidence}% -> ${outcome.confidence}%`
          : ""
      }`;
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const positional = args.filter((a) => !a.startsWith("--"));
  const [inputArg, outputArg] = positional;
  if (!inputArg) {
    throw new Error(usage());
  }

  const config = loadConfig();
  const debug = config.debug || args.includes("--debug");

  const inputPath = resolve(inputArg);
  const outputPath = outputArg ? resolve(outputArg) : defaultOutputPath(inputPath);

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(inputPath, "utf8"));
  } catch (error) {
    throw new Error(
      `Could not read ${inputPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const records = parseVerificationInput(raw);

  console.log(`[TRACK VERIFY] Processing ${records.length} records from ${inputPath}`);
  console.log(
    `[TRACK VERIFY] Checking records with confidence >= ${config.minConfidence}% that mention tracks`,
  );

  const report = runVerificationBatch(records, {
    minConfidence: config.minConfidence,
    reducedConfidence: config.reducedConfidence,
    observer: debug ? createConsoleObserver() : undefined,
    onOutcome: (outcome) => {
      const line = describeOutcome(outcome);
      if (outcome.status === "failed") {
        console.error(`[TRACK VERIFY] ${line}`);
      } else if (debug || outcome.status !== "skipped") {
        console.log(`[TRACK VERIFY] ${line}`);
      }
    },
  });

  await writeFile(outputPath, JSON.stringify(report, null, 2) + "\n", "utf8");
  await logVerificationRun({
    logsDir: config.logsDir,
    inputPath,
    outputPath,
    report,
  });

  const { counts } = report;
  console.log(`\n[TRACK VERIFY] Results saved to ${outputPath}`);
  console.log("Summary:");
  console.log(`  - Processed: ${counts.processed} records`);
  console.log(`  - Adjusted: ${counts.adjusted} records due to low track similarity`);
  console.log(`  - Insufficient track data: ${counts.insufficient} records`);
  console.log(`  - Skipped: ${counts.skipped} records`);
  console.log(`  - Failed: ${counts.failed} records`);
}

main().catch((error: unknown) => {
  console.error(
    "[TRACK VERIFY]",
    error instanceof Error ? error.message : error,
  );
  process.exitCode = 1;
});
