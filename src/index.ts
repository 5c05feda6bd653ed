export {
  createTextExtractor,
  parseHtml,
  normalizeElement,
  collectMatches,
} from "./extraction";
export type {
  CollectMatchesFn,
  DomHandle,
  ElementHandle,
  ExtractErrorKind,
  ExtractorDeps,
  NormalizeElementFn,
  ParseHtmlFn,
  ResultSink,
  ResultValue,
  SelectorMap,
  TextExtractor,
} from "./extraction";
export {
  loadJob,
  extractorOptionsSchema,
  extractionJobSchema,
  selectorMapSchema,
} from "./config";
export type {
  ExtractionJob,
  ExtractorOptions,
  ExtractorOptionsInput,
} from "./config";
export { createLogger } from "./logger";
export { runCli } from "./cli";
export type { CliIo } from "./cli";
