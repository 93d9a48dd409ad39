import { describe, it, expect } from "vitest";
import { SelectorRegistry } from "../src/extraction/SelectorRegistry.js";
import { GENERIC_SELECTORS } from "../src/constants.js";

describe("SelectorRegistry", () => {
  it("lists domain selectors before the generic ones", () => {
    const registry = new SelectorRegistry();
    expect(registry.selectorsFor("blog.csdn.net")).toEqual([
      "div.blog-content-box",
      "div#content_views",
      "div.article_content",
      "article.post",
      "article.post-block",
      "article.article",
      "div.post-body",
      "div#article-container",
      "div.entry-content",
      "div.post-content",
      "main article",
    ]);
  });

  it("returns only the generic list for unknown or empty domains", () => {
    const registry = new SelectorRegistry();
    expect(registry.selectorsFor("example.org")).toEqual([...GENERIC_SELECTORS]);
    expect(registry.selectorsFor("")).toEqual([...GENERIC_SELECTORS]);
  });

  it("concatenates every matching suffix in registration order", () => {
    const registry = new SelectorRegistry(
      [
        ["example.com", ["div.a"]],
        ["other.net", ["div.x"]],
        ["blog.example.com", ["div.b"]],
      ],
      ["article"]
    );
    expect(registry.selectorsFor("blog.example.com")).toEqual(["div.a", "div.b", "article"]);
  });

  it("rejects unparseable selectors at construction", () => {
    expect(() => new SelectorRegistry([["example.com", ["div > p"]]], [])).toThrow(TypeError);
    expect(() => new SelectorRegistry([], ["ul li:first-child"])).toThrow(TypeError);
  });
});
