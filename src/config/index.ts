import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { ZodError } from "zod";
import { extractionJobSchema } from "./schema";
import type { ExtractionJob } from "./schema";

/**
 * Renders zod issues one per line, as `  - <path>: <message>`.
 * Issues on the object itself (unknown keys) are reported against `(root)`.
 */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("\n");
}

export function loadJob(jobPath: string): ExtractionJob {
  let raw: string;
  try {
    raw = readFileSync(jobPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read job file at ${jobPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${jobPath}: ${message}`);
  }

  const result = extractionJobSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `invalid extraction job in ${jobPath}:\n${formatIssues(result.error)}`,
    );
  }

  return result.data;
}

export {
  extractorOptionsSchema,
  extractionJobSchema,
  selectorMapSchema,
} from "./schema";
export type {
  ExtractionJob,
  ExtractorOptions,
  ExtractorOptionsInput,
} from "./schema";
