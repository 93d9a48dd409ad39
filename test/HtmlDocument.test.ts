import { describe, it, expect } from "vitest";
import { HtmlDocument } from "../src/dom/HtmlDocument.js";
import { selectOne } from "../src/extraction/selectors.js";

describe("HtmlDocument", () => {
  it("reads the trimmed <title>", () => {
    const doc = new HtmlDocument("<html><head><title>  A Post  </title></head><body><h1>Heading</h1></body></html>");
    expect(doc.title()).toBe("A Post");
  });

  it("falls back to the first <h1>, then to an empty string", () => {
    expect(new HtmlDocument("<body><h1> First <em>one</em> </h1><h1>Second</h1></body>").title()).toBe("Firstone");
    expect(new HtmlDocument("<body><p>No title</p></body>").title()).toBe("");
  });

  it("extracts text with separator, strip and collapse policies", () => {
    const doc = new HtmlDocument("<div id=\"t\"><p>  one  </p><p>two\n\n three</p></div>");
    const el = selectOne(doc.root, "div#t");
    expect(el?.getText()).toBe("  one  two\n\n three");
    expect(el?.getText({ strip: true })).toBe("onetwo\n\n three");
    expect(el?.getText({ separator: " ", strip: true, collapseWhitespace: true })).toBe("one two three");
  });

  it("stores text set through setText literally", () => {
    const doc = new HtmlDocument("<pre id=\"p\"></pre>");
    const pre = selectOne(doc.root, "pre");
    pre?.setText("if (a < b && c > d) {}");
    expect(pre?.getText()).toBe("if (a < b && c > d) {}");
    expect(pre?.toHtml()).toBe('<pre id="p">if (a &lt; b &amp;&amp; c &gt; d) {}</pre>');
  });

  it("creates detached elements that can be appended", () => {
    const doc = new HtmlDocument("<div id=\"host\"></div>");
    const code = doc.createElement("code");
    code.setAttribute("class", "language-ts");
    code.setText("x");
    selectOne(doc.root, "div#host")?.append(code);
    expect(selectOne(doc.root, "div#host")?.toHtml()).toBe('<div id="host"><code class="language-ts">x</code></div>');
  });

  it("rejects invalid tag names", () => {
    const doc = new HtmlDocument("<div></div>");
    expect(() => doc.createElement("<script>")).toThrow(TypeError);
  });

  it("detaches cleared children from their parent", () => {
    const doc = new HtmlDocument('<div id="o"><span id="i">x</span>tail</div>');
    const outer = selectOne(doc.root, "div#o");
    const inner = selectOne(doc.root, "span#i");
    if (!outer || !inner) throw new Error("fixture is missing elements");

    outer.clear();

    expect(outer.toHtml()).toBe('<div id="o"></div>');
    expect(inner.parent()).toBeNull();
    expect(outer.contains(inner)).toBe(false);
  });

  it("replaces an element with literal text and detaches it", () => {
    const doc = new HtmlDocument('<p id="p">a<br>b</p>');
    const p = selectOne(doc.root, "p#p");
    const br = selectOne(doc.root, "br");
    if (!p || !br) throw new Error("fixture is missing elements");

    br.replaceWithText("\n");

    expect(p.getText()).toBe("a\nb");
    expect(p.toHtml()).toBe('<p id="p">a\nb</p>');
    expect(br.parent()).toBeNull();
    expect(p.contains(br)).toBe(false);
  });

  it("tracks containment through parents", () => {
    const doc = new HtmlDocument("<div id=\"outer\"><span id=\"inner\">x</span></div><p>y</p>");
    const outer = selectOne(doc.root, "div#outer");
    const inner = selectOne(doc.root, "span#inner");
    const p = selectOne(doc.root, "p");
    expect(outer && inner && outer.contains(inner)).toBe(true);
    expect(outer && p && outer.contains(p)).toBe(false);
  });
});
