import type { ElementLike } from "../dom/ElementLike.js";
import { UNWANTED_CLASS_KEYWORDS, UNWANTED_TAGS } from "../constants.js";

export function isUnwantedTag(element: ElementLike): boolean {
  return UNWANTED_TAGS.includes(element.tagName);
}

export function hasUnwantedClass(element: ElementLike): boolean {
  const classAttr = element.classTokens().join(" ").toLowerCase();
  return classAttr.length > 0 && UNWANTED_CLASS_KEYWORDS.some((keyword) => classAttr.includes(keyword));
}

/** Length of the element's text, space-joined and whitespace-collapsed. */
export function textLength(element: ElementLike): number {
  return element.getText({ separator: " ", strip: true, collapseWhitespace: true }).length;
}

export function removeUnwantedTags(root: ElementLike): void {
  for (const element of root.descendants()) {
    if (isUnwantedTag(element)) {
      element.remove();
    }
  }
}
