import { parse, HTMLElement as NHPHTMLElement, TextNode as NHPTextNode } from "node-html-parser";
import type { Node as NHPNode } from "node-html-parser";
import type { DocumentLike, ElementLike, TextOptions } from "./ElementLike.js";

// <pre> is parsed as markup: its <code> and <span class="line"> children are read by the normalizer.
const PARSE_OPTIONS = {
  comment: false,
  blockTextElements: { script: true, style: true, noscript: true },
};

const REGEX_TAG_NAME = /^[a-z][a-z0-9-]*$/i;

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function collectText(node: NHPNode, out: string[]): void {
  for (const child of node.childNodes) {
    if (child instanceof NHPTextNode) {
      out.push(child.text);
    } else if (child instanceof NHPHTMLElement) {
      collectText(child, out);
    }
  }
}

function collectElements(node: NHPHTMLElement, out: HtmlElement[]): void {
  for (const child of node.childNodes) {
    if (child instanceof NHPHTMLElement) {
      out.push(new HtmlElement(child));
      collectElements(child, out);
    }
  }
}

/**
 * {@link ElementLike} over a node-html-parser element.
 * Wrappers are cheap and not unique: two wrappers of the same node compare through {@link contains}.
 */
export class HtmlElement implements ElementLike {
  constructor(readonly node: NHPHTMLElement) {}

  get tagName(): string {
    return this.node.rawTagName ? this.node.rawTagName.toLowerCase() : "";
  }

  getAttribute(name: string): string | undefined {
    return this.node.getAttribute(name);
  }

  setAttribute(name: string, value: string): void {
    this.node.setAttribute(name, value);
  }

  classTokens(): string[] {
    return (this.getAttribute("class") || "").split(/\s+/).filter(Boolean);
  }

  parent(): ElementLike | null {
    const parentNode = this.node.parentNode;
    return parentNode ? new HtmlElement(parentNode) : null;
  }

  children(): ElementLike[] {
    return this.node.childNodes
      .filter((child): child is NHPHTMLElement => child instanceof NHPHTMLElement)
      .map((child) => new HtmlElement(child));
  }

  descendants(): ElementLike[] {
    const out: HtmlElement[] = [];
    collectElements(this.node, out);
    return out;
  }

  contains(other: ElementLike): boolean {
    if (!(other instanceof HtmlElement)) return false;
    let current: NHPHTMLElement | null = other.node;
    while (current) {
      if (current === this.node) return true;
      current = current.parentNode;
    }
    return false;
  }

  getText(options: TextOptions = {}): string {
    const { separator = "", strip = false, collapseWhitespace = false } = options;
    let parts: string[] = [];
    collectText(this.node, parts);
    if (strip) {
      parts = parts.map((part) => part.trim()).filter((part) => part.length > 0);
    }
    const text = parts.join(separator);
    return collapseWhitespace ? text.replace(/\s+/g, " ").trim() : text;
  }

  setText(text: string): void {
    this.clear();
    this.node.appendChild(new NHPTextNode(escapeHtml(text), this.node));
  }

  append(child: ElementLike): void {
    if (!(child instanceof HtmlElement)) {
      throw new TypeError("HtmlElement: can only append elements created by an HtmlDocument");
    }
    this.node.appendChild(child.node);
  }

  clear(): void {
    for (const child of [...this.node.childNodes]) {
      child.remove();
    }
  }

  remove(): void {
    this.node.remove();
  }

  replaceWithText(text: string): void {
    const parentNode = this.node.parentNode;
    if (!parentNode) return;
    const textNode = new NHPTextNode(escapeHtml(text), parentNode);
    parentNode.childNodes = parentNode.childNodes.map((child) => (child === this.node ? textNode : child));
    // already swapped out; remove() only clears the parent pointer
    this.node.remove();
  }

  toHtml(): string {
    return this.node.toString();
  }
}

/**
 * A parsed HTML page exposed through {@link DocumentLike}.
 */
export class HtmlDocument implements DocumentLike {
  readonly root: HtmlElement;

  constructor(html: string) {
    this.root = new HtmlElement(parse(html, PARSE_OPTIONS));
  }

  createElement(tagName: string): HtmlElement {
    if (!REGEX_TAG_NAME.test(tagName)) {
      throw new TypeError(`HtmlDocument: invalid tag name "${tagName}"`);
    }
    const element = parse(`<${tagName}></${tagName}>`, PARSE_OPTIONS).querySelector(tagName);
    if (!element) {
      throw new Error(`HtmlDocument: could not create <${tagName}>`);
    }
    element.remove();
    return new HtmlElement(element);
  }

  /** Trimmed `<title>` text, else the first `<h1>` text, else "". */
  title(): string {
    const elements = this.root.descendants();
    const titleText = elements.find((el) => el.tagName === "title")?.getText().trim();
    if (titleText) return titleText;
    const heading = elements.find((el) => el.tagName === "h1");
    return heading ? heading.getText({ strip: true }) : "";
  }
}
