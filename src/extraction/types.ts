import type { Logger } from "pino";

export type ResultValue = string | Array<string>;

/**
 * Name→selector mapping handed to `extract()`. The same object is mutated in
 * place, each selector string being replaced by its result.
 */
export type SelectorMap<K extends string = string> = Record<K, ResultValue>;

/**
 * Receiver for extracted values: one single-argument method per selector name.
 */
export type ResultSink<K extends string = string> = {
  readonly [P in K]: (value: ResultValue) => unknown;
};

export type ElementHandle = {
  readonly tag: () => string;
  readonly attr: (name: string) => string | undefined;
  readonly text: () => string;
};

export type DomHandle = {
  /** Throws when the selector cannot be parsed. */
  readonly query: (selector: string) => ReadonlyArray<ElementHandle>;
};

export type ParseHtmlFn = (html: string) => DomHandle;

export type NormalizeElementFn = (element: ElementHandle) => string;

export type CollectMatchesFn = (
  dom: DomHandle,
  selector: string,
  normalize: NormalizeElementFn,
) => ReadonlyArray<string>;

export type ExtractErrorKind =
  | "InvalidInput"
  | "InvalidTarget"
  | "MissingCapability"
  | "SelectorNotFound"
  | "SelectorQueryError";

export type ExtractorDeps = {
  readonly logger?: Logger;
  readonly parseHtml?: ParseHtmlFn;
  readonly normalizeElement?: NormalizeElementFn;
  readonly collectMatches?: CollectMatchesFn;
};

export type TextExtractor = {
  readonly extract: <K extends string>(
    selectors: SelectorMap<K>,
    html: string,
    target?: ResultSink<K> | null,
  ) => SelectorMap<K> | null;
  readonly error: () => string | null;
  readonly lastResults: () => SelectorMap | null;
  readonly separator: (...value: [] | [string | null]) => string | null;
  readonly ignoreNotFound: (...value: [] | [boolean]) => boolean;
};
