/**
 * Text extraction policy for {@link ElementLike.getText}.
 */
export interface TextOptions {
  /** Inserted between the texts of consecutive text nodes. Default: "" */
  separator?: string;
  /** Trim every text node and drop the ones left empty. Default: false */
  strip?: boolean;
  /** Collapse every whitespace run of the joined result into a single space. Default: false */
  collapseWhitespace?: boolean;
}

/**
 * The capabilities the extraction engine needs from an element.
 * Every core component works through this interface only, so any tree can be plugged in.
 */
export interface ElementLike {
  /** Lower-cased tag name; "" for a document root. */
  readonly tagName: string;

  getAttribute(name: string): string | undefined;
  setAttribute(name: string, value: string): void;
  /** Whitespace-separated tokens of the class attribute. */
  classTokens(): string[];

  parent(): ElementLike | null;
  /** Element children in document order. */
  children(): ElementLike[];
  /** Every element below this one in document order (pre-order), excluding itself. */
  descendants(): ElementLike[];
  /** True when `other` is this element or sits anywhere below it. */
  contains(other: ElementLike): boolean;

  getText(options?: TextOptions): string;
  /** Replaces all children with a single text node holding `text` literally. */
  setText(text: string): void;
  append(child: ElementLike): void;
  /** Detaches all children. */
  clear(): void;
  /** Detaches this element (and its subtree) from its parent. */
  remove(): void;
  /** Swaps this element for a text node holding `text` literally. */
  replaceWithText(text: string): void;

  toHtml(): string;
}

/**
 * A parsed document: its root plus a factory for elements that can be appended into it.
 */
export interface DocumentLike {
  readonly root: ElementLike;
  createElement(tagName: string): ElementLike;
}
