// pattern: Imperative Shell
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type pino from "pino";
import { loadJob } from "./config";
import type { ExtractionJob } from "./config";
import { createLogger } from "./logger";
import { createTextExtractor } from "./extraction";
import type { SelectorMap } from "./extraction";

export const USAGE = "usage: css-text-extract <job.yaml> <page.html>\n";

export const EXIT_OK = 0;
export const EXIT_EXTRACTION_FAILED = 1;
export const EXIT_BAD_INPUT = 2;

/**
 * Streams and environment the CLI runs against. Log lines go to `stderr`,
 * the result mapping to `stdout`.
 */
export type CliIo = {
  readonly stdout: { readonly write: (text: string) => unknown };
  readonly stderr: pino.DestinationStream;
  readonly env: Readonly<Record<string, string | undefined>>;
};

/**
 * Runs one extraction job against one HTML file and prints the results as JSON.
 *
 * Paths come from the arguments, falling back to `JOB_PATH` and `HTML_PATH`.
 * Results are printed even when some selectors failed.
 *
 * @returns Process exit code: 0 on success, 1 when a selector failed, 2 on usage or input errors
 */
export function runCli(argv: ReadonlyArray<string>, io: CliIo): number {
  const logger = createLogger(io.env["LOG_LEVEL"] ?? "info", io.stderr);

  const jobPath = argv[0] ?? io.env["JOB_PATH"];
  const htmlPath = argv[1] ?? io.env["HTML_PATH"];

  if (!jobPath || !htmlPath) {
    io.stderr.write(USAGE);
    return EXIT_BAD_INPUT;
  }

  let job: ExtractionJob;
  try {
    job = loadJob(resolve(jobPath));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "job file error",
    );
    return EXIT_BAD_INPUT;
  }

  let html: string;
  try {
    html = readFileSync(resolve(htmlPath), "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.fatal({ htmlPath, error: message }, "failed to read html file");
    return EXIT_BAD_INPUT;
  }

  const extractor = createTextExtractor(job.options, { logger });
  const selectors: SelectorMap = { ...job.selectors };

  const results = extractor.extract(selectors, html);

  io.stdout.write(`${JSON.stringify(extractor.lastResults(), null, 2)}\n`);

  if (results === null) {
    logger.error({ error: extractor.error() }, "extraction finished with errors");
    return EXIT_EXTRACTION_FAILED;
  }

  logger.info({ names: Object.keys(results).length }, "extraction complete");
  return EXIT_OK;
}
