import type { DocumentLike, ElementLike } from "../dom/ElementLike.js";
import {
  CODE_BLOCK_LANG_PREFIXES,
  CODE_CONTAINER_CLASS,
  CODE_GUTTER_CLASS,
  CODE_LINE_CLASS,
  CODE_WRAPPER_CLASSES,
} from "../constants.js";

function hasClass(element: ElementLike, className: string): boolean {
  return element.classTokens().includes(className);
}

/**
 * Language token from the first `language-*` / `lang-*` class, or "".
 */
export function detectLanguage(element: ElementLike): string {
  for (const cls of element.classTokens()) {
    for (const prefix of CODE_BLOCK_LANG_PREFIXES) {
      if (cls.startsWith(prefix)) {
        return cls.substring(prefix.length);
      }
    }
  }
  return "";
}

/**
 * Right-trims every line and drops leading/trailing blank lines; indentation is left alone.
 */
export function cleanCodeText(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/^\n+|\n+$/g, "");
}

/**
 * Text of a code container with line structure restored. Mutates: `<br>` becomes a newline.
 * Per-line elements (`.line`) are joined with newlines so gutter text or missing breaks cannot merge lines.
 */
export function extractCodeText(container: ElementLike): string {
  for (const br of container.descendants().filter((el) => el.tagName === "br")) {
    br.replaceWithText("\n");
  }
  const lines = container.descendants().filter((el) => hasClass(el, CODE_LINE_CLASS));
  if (lines.length > 0) {
    return lines.map((line) => line.getText()).join("\n");
  }
  return container.getText();
}

/**
 * Rewrites highlighter markup (Hexo/Hugo style gutters, per-line spans, `<br>` separated code)
 * into a single `<pre><code class="language-x">` form.
 */
export class CodeBlockNormalizer {
  normalize(node: ElementLike, document: DocumentLike): void {
    const wrappers = node
      .descendants()
      .filter((el) => CODE_WRAPPER_CLASSES.some((cls) => hasClass(el, cls)));

    const rewritten: ElementLike[] = [];
    for (const wrapper of wrappers) {
      // nested wrapper already flattened together with its outer wrapper
      if (!node.contains(wrapper)) continue;
      this.rewriteWrapper(wrapper, document);
      rewritten.push(wrapper);
    }

    for (const pre of node.descendants().filter((el) => el.tagName === "pre")) {
      if (rewritten.some((wrapper) => wrapper.contains(pre))) continue;
      this.normalizePre(pre, document);
    }
  }

  private rewriteWrapper(wrapper: ElementLike, document: DocumentLike): void {
    for (const gutter of wrapper.descendants().filter((el) => hasClass(el, CODE_GUTTER_CLASS))) {
      gutter.remove();
    }
    const language = detectLanguage(wrapper);
    const container = wrapper.descendants().find((el) => hasClass(el, CODE_CONTAINER_CLASS)) ?? wrapper;
    const text = cleanCodeText(extractCodeText(container));

    const pre = document.createElement("pre");
    const code = document.createElement("code");
    if (language) {
      code.setAttribute("class", `language-${language}`);
    }
    code.setText(text);
    pre.append(code);
    wrapper.clear();
    wrapper.append(pre);
  }

  private normalizePre(pre: ElementLike, document: DocumentLike): void {
    const code = pre.descendants().find((el) => el.tagName === "code");
    if (code) {
      code.setText(cleanCodeText(extractCodeText(code)));
      return;
    }
    const text = cleanCodeText(extractCodeText(pre));
    const created = document.createElement("code");
    created.setText(text);
    pre.clear();
    pre.append(created);
  }
}
