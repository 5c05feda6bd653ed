import { describe, it, expect } from "vitest";
import { normalizeElement, collectMatches } from "./strategies";
import { parseHtml } from "./dom";
import type { ElementHandle } from "./types";

function element(
  tag: string,
  attrs: Record<string, string> = {},
  text = "",
): ElementHandle {
  return {
    tag: () => tag,
    attr: (name) => attrs[name],
    text: () => text,
  };
}

describe("normalizeElement", () => {
  it("should use the alt attribute of images", () => {
    expect(normalizeElement(element("img", { alt: "Logo", src: "logo.png" }))).toBe("Logo");
  });

  it("should return an empty string for images without alt", () => {
    expect(normalizeElement(element("img", { src: "logo.png" }))).toBe("");
  });

  it("should use the alt attribute of image inputs", () => {
    expect(normalizeElement(element("input", { type: "image", alt: "Go", value: "ignored" }))).toBe("Go");
  });

  it("should use the value attribute of other inputs", () => {
    expect(normalizeElement(element("input", { type: "text", value: "typed" }))).toBe("typed");
  });

  it("should return an empty string for inputs without value", () => {
    expect(normalizeElement(element("input", { type: "checkbox" }))).toBe("");
  });

  it("should use the text of any other element", () => {
    expect(normalizeElement(element("span", { alt: "unused" }, "Hello"))).toBe("Hello");
  });
});

describe("collectMatches", () => {
  it("should normalize every match of a parsed document", () => {
    const dom = parseHtml(
      '<form><input type="image" alt="Submit"><input name="q" value="cats"></form><img alt="Cat">',
    );

    const texts = collectMatches(dom, "input, img", normalizeElement);

    expect(texts).toEqual(["Submit", "cats", "Cat"]);
  });

  it("should propagate query errors", () => {
    const dom = parseHtml("<p>one</p>");

    expect(() => collectMatches(dom, ":nosuchpseudo", normalizeElement)).toThrow();
  });
});
