import type { ElementLike } from "../dom/ElementLike.js";

/**
 * The closed set of selector forms the registry uses.
 * `tag-class`/`tag-id` may omit the tag; `descendant` is the CSS descendant combinator.
 */
export type Selector =
  | { kind: "tag"; tag: string }
  | { kind: "tag-class"; tag: string | null; className: string }
  | { kind: "tag-id"; tag: string | null; id: string }
  | { kind: "descendant"; ancestor: Selector; target: Selector };

const REGEX_COMPOUND = /^([a-z][a-z0-9]*)?(?:([.#])([\w-]+))?$/i;

function parseCompound(part: string, source: string): Selector {
  const match = REGEX_COMPOUND.exec(part);
  if (!match || (!match[1] && !match[2])) {
    throw new TypeError(`Unsupported selector "${source}"`);
  }
  const tag = match[1] ? match[1].toLowerCase() : null;
  if (match[2] === ".") return { kind: "tag-class", tag, className: match[3] };
  if (match[2] === "#") return { kind: "tag-id", tag, id: match[3] };
  return { kind: "tag", tag: tag || "" };
}

/**
 * Parses `tag`, `tag.class`, `tag#id` (tag optional for the last two) and whitespace-separated
 * chains of those, e.g. `main article`.
 * @throws {TypeError} For anything outside that grammar.
 */
export function parseSelector(source: string): Selector {
  const parts = source.trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0) {
    throw new TypeError("Empty selector");
  }
  return parts
    .map((part) => parseCompound(part, source))
    .reduce((ancestor, target) => ({ kind: "descendant", ancestor, target }));
}

export function matchesSelector(element: ElementLike, selector: Selector): boolean {
  switch (selector.kind) {
    case "tag":
      return element.tagName === selector.tag;
    case "tag-class":
      return (
        (selector.tag === null || element.tagName === selector.tag) &&
        element.classTokens().includes(selector.className)
      );
    case "tag-id":
      return (selector.tag === null || element.tagName === selector.tag) && element.getAttribute("id") === selector.id;
    case "descendant": {
      if (!matchesSelector(element, selector.target)) return false;
      for (let ancestor = element.parent(); ancestor; ancestor = ancestor.parent()) {
        if (matchesSelector(ancestor, selector.ancestor)) return true;
      }
      return false;
    }
  }
}

/**
 * First element below `root` (document order) matching the selector, or null.
 */
export function selectOne(root: ElementLike, selector: Selector | string): ElementLike | null {
  const parsed = typeof selector === "string" ? parseSelector(selector) : selector;
  return root.descendants().find((element) => matchesSelector(element, parsed)) ?? null;
}

/**
 * Every element below `root` matching the selector, in document order.
 */
export function selectAll(root: ElementLike, selector: Selector | string): ElementLike[] {
  const parsed = typeof selector === "string" ? parseSelector(selector) : selector;
  return root.descendants().filter((element) => matchesSelector(element, parsed));
}
