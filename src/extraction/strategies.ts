// pattern: functional-core
import type {
  CollectMatchesFn,
  ElementHandle,
  NormalizeElementFn,
} from "./types";

/**
 * Converts a matched element into its representative text.
 *
 * - `img` and `input[type=image]` yield their `alt` attribute
 * - any other `input` yields its `value` attribute
 * - everything else yields the full text of the element and its descendants
 *
 * Missing attributes yield an empty string.
 */
export const normalizeElement: NormalizeElementFn = (
  element: ElementHandle,
) => {
  const tag = element.tag();

  if (tag === "img" || (tag === "input" && element.attr("type") === "image")) {
    return element.attr("alt") ?? "";
  }

  if (tag === "input") {
    return element.attr("value") ?? "";
  }

  return element.text();
};

/**
 * Runs a selector against the document and normalizes every match.
 * Errors from the query propagate to the caller.
 */
export const collectMatches: CollectMatchesFn = (dom, selector, normalize) =>
  dom.query(selector).map((element) => normalize(element));
