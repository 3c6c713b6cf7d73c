import { join } from "path";
import { z } from "zod";

import { DEFAULT_MIN_CONFIDENCE } from "./verification/eligibility";
import { DEFAULT_REDUCED_CONFIDENCE } from "./verification/verifyRecord";

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => v === "1" || v?.toLowerCase() === "true");

const EnvSchema = z.object({
  TRACK_VERIFY_MIN_CONFIDENCE: z.coerce
    .number()
    .min(0)
    .max(100)
    .default(DEFAULT_MIN_CONFIDENCE),
  TRACK_VERIFY_REDUCED_CONFIDENCE: z.coerce
    .number()
    .min(0)
    .max(100)
    .default(DEFAULT_REDUCED_CONFIDENCE),
  TRACK_VERIFY_LOGS_DIR: z.string().min(1).optional(),
  TRACK_VERIFY_DEBUG: booleanFlag,
});

export interface VerificationConfig {
  minConfidence: number;
  reducedConfidence: number;
  logsDir: string;
  debug: boolean;
}

/**
 * Reads verification settings from the environment.
 * Throws when a variable is set to an unusable value.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): VerificationConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid track verification settings: ${details}`);
  }

  const vars = parsed.data;
  return {
    minConfidence: vars.TRACK_VERIFY_MIN_CONFIDENCE,
    reducedConfidence: vars.TRACK_VERIFY_REDUCED_CONFIDENCE,
    logsDir: vars.TRACK_VERIFY_LOGS_DIR ?? join(process.cwd(), "logs"),
    debug: vars.TRACK_VERIFY_DEBUG,
  };
}
