import { describe, it, expect } from "vitest";
import { HtmlDocument } from "../src/dom/HtmlDocument.js";
import { CodeBlockNormalizer, cleanCodeText, detectLanguage } from "../src/extraction/CodeBlockNormalizer.js";
import { selectAll, selectOne } from "../src/extraction/selectors.js";
import type { ElementLike } from "../src/dom/ElementLike.js";

function normalize(html: string): ElementLike {
  const doc = new HtmlDocument(html);
  const node = selectOne(doc.root, "div#post");
  if (!node) throw new Error("fixture has no div#post");
  new CodeBlockNormalizer().normalize(node, doc);
  return node;
}

describe("cleanCodeText", () => {
  it("right-trims lines and strips surrounding blank lines", () => {
    expect(cleanCodeText("\n\n  a  \r\n\tb\t\n\n")).toBe("  a\n\tb");
  });
});

describe("detectLanguage", () => {
  it("reads language- and lang- prefixed classes", () => {
    const doc = new HtmlDocument('<div class="highlight language-rust"></div><pre class="x lang-go"></pre><pre></pre>');
    const [div, pre, plain] = doc.root.children();
    expect(detectLanguage(div)).toBe("rust");
    expect(detectLanguage(pre)).toBe("go");
    expect(detectLanguage(plain)).toBe("");
  });
});

describe("CodeBlockNormalizer", () => {
  it("joins per-line spans and drops the gutter", () => {
    const node = normalize(
      '<div id="post"><figure class="highlight shell"><table><tr>' +
        '<td class="gutter"><pre><span class="line">1</span><br><span class="line">2</span><br><span class="line">3</span></pre></td>' +
        '<td class="code"><pre><span class="line">a</span><br><span class="line">  b</span><br><span class="line">c  </span></pre></td>' +
        "</tr></table></figure></div>"
    );

    expect(selectOne(node, "code")?.getText()).toBe("a\n  b\nc");
    expect(selectOne(node, "figure")?.toHtml()).toBe(
      '<figure class="highlight shell"><pre><code>a\n  b\nc</code></pre></figure>'
    );
  });

  it("tags the code element with the wrapper language", () => {
    const node = normalize(
      '<div id="post"><div class="highlight language-js"><pre><code><span class="line">let x = 1;</span></code></pre></div></div>'
    );

    expect(selectOne(node, "div.highlight")?.toHtml()).toBe(
      '<div class="highlight language-js"><pre><code class="language-js">let x = 1;</code></pre></div>'
    );
  });

  it("flattens a nested wrapper together with its outer wrapper", () => {
    const node = normalize(
      '<div id="post"><div class="highlight language-js">' +
        '<div class="highlight language-py"><pre><code>x = 1</code></pre></div>' +
        "</div></div>"
    );

    expect(selectAll(node, "pre")).toHaveLength(1);
    expect(selectAll(node, "code")).toHaveLength(1);
    expect(node.toHtml()).toBe(
      '<div id="post"><div class="highlight language-js"><pre><code class="language-js">x = 1</code></pre></div></div>'
    );
  });

  it("uses the wrapper itself when there is no .code container", () => {
    const node = normalize('<div id="post"><div class="codeblock"><span class="gutter">1</span>plain code</div></div>');

    expect(node.toHtml()).toBe('<div id="post"><div class="codeblock"><pre><code>plain code</code></pre></div></div>');
  });

  it("wraps bare <pre> text in <code>", () => {
    const node = normalize('<div id="post"><pre>x\n\n</pre></div>');

    expect(selectOne(node, "pre")?.toHtml()).toBe("<pre><code>x</code></pre>");
  });

  it("turns <br> into newlines inside existing <code>", () => {
    const node = normalize('<div id="post"><pre><code>line1<br>line2   \n</code></pre></div>');

    expect(selectOne(node, "code")?.getText()).toBe("line1\nline2");
  });

  it("keeps code text literal", () => {
    const node = normalize('<div id="post"><pre><code class="language-c">if (a &lt; b) { return; }</code></pre></div>');

    expect(selectOne(node, "pre")?.toHtml()).toBe(
      '<pre><code class="language-c">if (a &lt; b) { return; }</code></pre>'
    );
    expect(selectOne(node, "code")?.getText()).toBe("if (a < b) { return; }");
  });
});
