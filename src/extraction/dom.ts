// pattern: functional-core
import * as cheerio from "cheerio";
import type { DomHandle } from "./types";

// A lone token without combinators, classes, ids, pseudos or attributes is a
// tag name; names the selector engine cannot parse (e.g. `BLARG!`) match nothing.
const BARE_TAG = /^[^,.#:[ >~+]+$/;

/**
 * Parses an HTML document with cheerio and exposes the minimal query surface
 * the extractor needs. Matches come back in document order. Selectors are
 * always run against the document, never parsed as markup.
 */
export function parseHtml(html: string): DomHandle {
  const $ = cheerio.load(html);

  const find = (selector: string) => {
    try {
      return $.root().find(selector).toArray();
    } catch (err) {
      if (BARE_TAG.test(selector.trim())) return [];
      throw err;
    }
  };

  return {
    query: (selector) =>
      find(selector).map((node) => {
        const el = $(node);
        return {
          tag: () => (el.prop("tagName") ?? "").toLowerCase(),
          attr: (name: string) => el.attr(name),
          text: () => el.text(),
        };
      }),
  };
}
