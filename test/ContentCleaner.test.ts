import { describe, it, expect } from "vitest";
import { HtmlDocument } from "../src/dom/HtmlDocument.js";
import { ContentCleaner } from "../src/extraction/ContentCleaner.js";
import { selectOne } from "../src/extraction/selectors.js";
import type { ElementLike } from "../src/dom/ElementLike.js";

function contentOf(html: string): ElementLike {
  const node = selectOne(new HtmlDocument(html).root, "div#c");
  if (!node) throw new Error("fixture has no div#c");
  return node;
}

describe("ContentCleaner", () => {
  it("removes share boxes with their descendants", () => {
    const node = contentOf(
      '<div id="c"><p>Body text</p><div class="article-share-box"><a href="#">Share</a><span>x</span></div></div>'
    );

    new ContentCleaner().clean(node);

    expect(node.toHtml()).toBe('<div id="c"><p>Body text</p></div>');
  });

  it("removes unwanted tags", () => {
    const node = contentOf("<div id=\"c\"><nav>menu</nav><p>Text</p><footer>footer</footer><style>p{}</style></div>");

    new ContentCleaner().clean(node);

    expect(node.descendants().map((el) => el.tagName)).toEqual(["p"]);
  });

  it("removes meta, comment and advert panels by class keyword", () => {
    const node = contentOf(
      '<div id="c"><div class="post-meta">2024-01-01</div><p>Body</p><section class="comment-list">c</section>' +
        '<p class="ad-banner">buy</p></div>'
    );

    new ContentCleaner().clean(node);

    expect(node.toHtml()).toBe('<div id="c"><p>Body</p></div>');
  });

  it("collapses empty wrappers but keeps image holders", () => {
    const node = contentOf(
      '<div id="c"><div><span> </span></div><div><img src="a.png"></div><p>Text</p></div>'
    );

    new ContentCleaner().clean(node);

    expect(node.children().map((el) => el.tagName)).toEqual(["div", "p"]);
    expect(node.descendants().some((el) => el.tagName === "span")).toBe(false);
    expect(node.descendants().some((el) => el.tagName === "img")).toBe(true);
  });

  it("is idempotent", () => {
    const node = contentOf(
      '<div id="c"><div><div class="share"><span>s</span></div></div><aside>a</aside>' +
        '<div><span></span><p>Kept</p></div><div class="related">r</div></div>'
    );
    const cleaner = new ContentCleaner();

    cleaner.clean(node);
    const once = node.toHtml();
    cleaner.clean(node);

    expect(node.toHtml()).toBe(once);
    expect(once).toBe('<div id="c"><div><p>Kept</p></div></div>');
  });
});
