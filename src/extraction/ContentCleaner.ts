import type { ElementLike } from "../dom/ElementLike.js";
import { EMPTY_SHELL_TAGS } from "../constants.js";
import { hasUnwantedClass, removeUnwantedTags } from "./noise.js";

/**
 * Strips navigation, share/comment/ad panels and empty wrapper shells from a content node, in place.
 */
export class ContentCleaner {
  clean(node: ElementLike): void {
    removeUnwantedTags(node);

    // Children before parents: a wrapper emptied by its children's removal is judged on what is left.
    const elements = node.descendants().reverse();
    for (const element of elements) {
      if (!node.contains(element)) continue;

      if (hasUnwantedClass(element)) {
        element.remove();
      } else if (this.isEmptyShell(element)) {
        element.remove();
      }
    }
  }

  private isEmptyShell(element: ElementLike): boolean {
    if (!EMPTY_SHELL_TAGS.includes(element.tagName)) return false;
    if (element.getText({ strip: true }).length > 0) return false;
    return !element.descendants().some((descendant) => descendant.tagName === "img");
  }
}
