// pattern: functional-core
import { extractorOptionsSchema, formatIssues, selectorMapSchema } from "../config";
import type { ExtractorOptionsInput } from "../config";
import { createLogger } from "../logger";
import { parseHtml } from "./dom";
import { collectMatches, normalizeElement } from "./strategies";
import type {
  ExtractErrorKind,
  ExtractorDeps,
  ResultSink,
  ResultValue,
  SelectorMap,
  TextExtractor,
} from "./types";

const NOT_FOUND = "NOT FOUND";

function byName([a]: [string, string], [b]: [string, string]): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Creates an extractor that pulls named text fragments out of HTML documents
 * using CSS selectors.
 *
 * The extractor keeps the error and the results of its most recent `extract()`
 * call, so one instance must not be shared between concurrent callers.
 *
 * @param options - `separator` (default `"\n"`, `null` keeps arrays) and `ignoreNotFound` (default `true`)
 * @param deps - Optional logger, HTML parser and per-element/per-selector strategies
 * @throws Error when `options` holds unknown keys or values of the wrong type
 */
export function createTextExtractor(
  options: ExtractorOptionsInput = {},
  deps: ExtractorDeps = {},
): TextExtractor {
  const parsed = extractorOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new Error(`invalid extractor options:\n${formatIssues(parsed.error)}`);
  }

  let currentSeparator = parsed.data.separator;
  let currentIgnoreNotFound = parsed.data.ignoreNotFound;
  let lastError: string | null = null;
  let lastResults: SelectorMap | null = null;

  const logger = deps.logger ?? createLogger("silent");
  const parseDom = deps.parseHtml ?? parseHtml;
  const normalize = deps.normalizeElement ?? normalizeElement;
  const collect = deps.collectMatches ?? collectMatches;

  const reject = (kind: ExtractErrorKind, message: string): null => {
    lastError = message;
    logger.warn({ kind, error: message }, "extraction rejected");
    return null;
  };

  const extract = <K extends string>(
    selectors: SelectorMap<K>,
    html: string,
    target?: ResultSink<K> | null,
  ): SelectorMap<K> | null => {
    lastError = null;
    lastResults = null;

    const checked = selectorMapSchema.safeParse(selectors);
    if (!checked.success) {
      return reject(
        "InvalidInput",
        "First argument to extract() must be an object mapping names to selector strings",
      );
    }

    if (typeof html !== "string") {
      return reject(
        "InvalidInput",
        "Second argument to extract() must be an HTML string",
      );
    }

    const entries = Object.entries(checked.data).sort(byName);

    const methods = new Map<string, (value: ResultValue) => unknown>();
    if (target !== undefined && target !== null) {
      if (typeof target !== "object") {
        return reject(
          "InvalidTarget",
          "Third argument to extract() must be an object",
        );
      }

      for (const [name] of entries) {
        const method: unknown = Reflect.get(target, name);
        if (typeof method !== "function") {
          return reject(
            "MissingCapability",
            `The target object does not implement the ${name}() method requested in the first argument`,
          );
        }
        methods.set(name, (value) => Reflect.apply(method, target, [value]));
      }
    }

    const dom = parseDom(html);
    const map: SelectorMap = selectors;
    const resolved: Array<[string, ResultValue]> = [];
    let failedCount = 0;

    const recordFailure = (
      name: string,
      selector: string,
      kind: ExtractErrorKind,
      message: string,
    ): void => {
      lastError = `ERROR: [${name}]: ${message}`;
      failedCount += 1;
      map[name] = `ERROR: ${message}`;
      resolved.push([name, `ERROR: ${message}`]);
      logger.warn({ name, selector, kind, error: message }, "selector failed");
    };

    for (const [name, selector] of entries) {
      let texts: ReadonlyArray<string>;
      try {
        texts = collect(dom, selector, normalize);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        recordFailure(name, selector, "SelectorQueryError", message.replace(/\n$/, ""));
        continue;
      }

      logger.debug({ name, selector, matches: texts.length }, "selector matched");

      if (texts.length === 0 && !currentIgnoreNotFound) {
        recordFailure(name, selector, "SelectorNotFound", NOT_FOUND);
        continue;
      }

      const value: ResultValue =
        currentSeparator === null ? [...texts] : texts.join(currentSeparator);
      map[name] = value;
      resolved.push([name, value]);
    }

    for (const [name, value] of resolved) {
      methods.get(name)?.(value);
    }

    lastResults = map;

    logger.debug(
      { names: entries.length, failed: failedCount },
      "extraction complete",
    );

    return failedCount > 0 ? null : selectors;
  };

  return {
    extract,
    error: () => lastError,
    lastResults: () => lastResults,
    separator: (...value) => {
      if (value.length === 1) {
        currentSeparator = value[0] ?? null;
      }
      return currentSeparator;
    },
    ignoreNotFound: (...value) => {
      if (value.length === 1) {
        currentIgnoreNotFound = value[0];
      }
      return currentIgnoreNotFound;
    },
  };
}
