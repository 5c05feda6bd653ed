export { createTextExtractor } from "./extractor";
export { parseHtml } from "./dom";
export { normalizeElement, collectMatches } from "./strategies";
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
} from "./types";
