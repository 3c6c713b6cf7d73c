import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Ensures the directory for a log file exists.
 */
export async function ensureLogsDir(logsDir: string): Promise<void> {
  await mkdir(logsDir, { recursive: true });
}

export async function readJsonlLines(filePath: string): Promise<string[]> {
  try {
    const raw = await readFile(filePath, "utf8");
    return raw
      .split("\n")
      .map((l) => l.trim())
      .filter(Boolean);
  } catch (error) {
    if (errorCode(error) === "ENOENT") return [];
    throw error;
  }
}

/**
 * Writes a JSONL file capped to the last N entries.
 *
 * NOTE: each entry is stored as single-line JSON so the file can be capped
 * by line count.
 */
export async function writeJsonlCapped(params: {
  filePath: string;
  entry: unknown;
  maxEntries?: number;
}): Promise<void> {
  const { filePath, entry, maxEntries = 3 } = params;
  await ensureLogsDir(dirname(filePath));

  const existing = await readJsonlLines(filePath);
  const keep = Math.max(0, maxEntries - 1);
  const next = [
    ...existing.slice(Math.max(0, existing.length - keep)),
    JSON.stringify(entry),
  ];
  await writeFile(filePath, next.join("\n") + "\n", { flag: "w" });
}
