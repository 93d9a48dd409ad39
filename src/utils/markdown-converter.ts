import TurndownService from "turndown";
import { gfm } from "turndown-plugin-gfm";
import { CODE_BLOCK_LANG_PREFIXES } from "../constants.js";

// --- Constants ---

// Elements that never carry article text
const REMOVED_TAGS: Array<keyof HTMLElementTagNameMap> = [
  "script",
  "style",
  "noscript",
  "iframe",
  "button",
  "input",
  "select",
  "textarea",
  "form",
  "canvas",
];

// Postprocessing
const POSTPROCESSING_MAX_CONSECUTIVE_BLANK_LINES = 1; // Keep paragraphs separate

const TURNDOWN_NODE_ELEMENT_TYPE = 1;
// list items indent their fences
const REGEX_FENCE_MARKER = /^\s*(`{3,})/;

// --- Helpers ---

function isElement(node: Node): node is HTMLElement {
  return node.nodeType === TURNDOWN_NODE_ELEMENT_TYPE;
}

function firstCodeChild(element: HTMLElement): HTMLElement | null {
  for (const child of Array.from(element.childNodes)) {
    if (isElement(child) && child.nodeName === "CODE") return child;
  }
  return null;
}

/**
 * Language of a code block from a `language-*` / `lang-*` class on its `<code>`, then on the `<pre>`.
 */
function codeLanguage(pre: HTMLElement): string {
  const code = firstCodeChild(pre);
  const classes = `${code?.getAttribute("class") || ""} ${pre.getAttribute("class") || ""}`.split(/\s+/).filter(Boolean);
  for (const cls of classes) {
    for (const prefix of CODE_BLOCK_LANG_PREFIXES) {
      if (cls.startsWith(prefix)) {
        return cls.substring(prefix.length);
      }
    }
  }
  return "";
}

// --- Class Definition ---

/**
 * HTML to GitHub flavoured Markdown, tuned for the `<pre><code class="language-x">` blocks the
 * extractor produces.
 */
export class MarkdownConverter {
  private turndownService: TurndownService;

  constructor() {
    this.turndownService = new TurndownService({
      headingStyle: "atx",
      codeBlockStyle: "fenced",
      bulletListMarker: "-",
      strongDelimiter: "**",
      emDelimiter: "*",
      hr: "---",
    });

    this.turndownService.use(gfm);

    // Setup conversion rules
    this.setupPrioritizedRules();
  }

  // --- Public Method ---

  /**
   * Converts HTML string to Markdown.
   * @param html The HTML string to convert.
   * @returns The converted Markdown string.
   */
  public convert(html: string): string {
    const markdown = this.turndownService.turndown(html);
    return this.postprocessMarkdown(markdown);
  }

  // --- Turndown Rule Setup ---

  private setupPrioritizedRules(): void {
    this.addRemovalRules();
    this.addBlockRules();
    this.addInlineRules();
  }

  private addRemovalRules(): void {
    this.turndownService.addRule("remove-unwanted", {
      filter: REMOVED_TAGS,
      replacement: () => "",
    });
  }

  private addBlockRules(): void {
    // Article structure
    this.turndownService.addRule("article", {
      filter: ["article", "section"],
      replacement: (content: string) => `\n\n${content}\n\n`, // Add separation
    });

    // Blockquotes
    this.turndownService.addRule("blockquote", {
      filter: "blockquote",
      replacement: (content: string) => {
        // Trim leading/trailing newlines from content and add > prefix correctly
        const trimmedContent = content.trim();
        return "\n\n> " + trimmedContent.replace(/\n/g, "\n> ") + "\n\n";
      },
    });

    // Code Blocks: every <pre> is fenced, its text taken verbatim
    this.turndownService.addRule("code-block", {
      filter: "pre",
      replacement: (_content: string, node: Node) => {
        if (!isElement(node)) return "";
        const language = codeLanguage(node);
        const code = (node.textContent || "").replace(/^\n+|\n+$/g, "");

        // A fence longer than any backtick run inside the code
        const longestRun = Math.max(0, ...(code.match(/`+/g) || []).map((run) => run.length));
        const fence = "`".repeat(Math.max(3, longestRun + 1));

        return `\n\n${fence}${language}\n${code}\n${fence}\n\n`;
      },
    });
  }

  private addInlineRules(): void {
    // Links - Ensure proper formatting and title preservation
    this.turndownService.addRule("link", {
      filter: (node: HTMLElement): boolean => node.nodeName === "A" && !!node.getAttribute("href"),
      replacement: (content: string, node: Node) => {
        if (!isElement(node)) return content;
        const href = node.getAttribute("href") || "";
        const title = node.getAttribute("title");
        // Use content if available and not just whitespace, otherwise use href as text
        const text = content.trim() ? content.trim() : href;
        return title ? `[${text}](${href} "${title}")` : `[${text}](${href})`;
      },
    });

    // Images
    this.turndownService.addRule("image", {
      filter: (node: HTMLElement): boolean => node.nodeName === "IMG" && !!node.getAttribute("src"),
      replacement: (_content: string, node: Node) => {
        if (!isElement(node)) return "";
        const src = node.getAttribute("src") || "";
        const alt = node.getAttribute("alt") || "";
        const title = node.getAttribute("title");
        return title ? `![${alt}](${src} "${title}")` : `![${alt}](${src})`;
      },
    });

    // Inline Code
    this.turndownService.addRule("inlineCode", {
      filter: (node: HTMLElement): boolean => node.nodeName === "CODE" && node.parentNode?.nodeName !== "PRE",
      replacement: (content: string) => {
        // Ensure content is trimmed and handle potential backticks inside
        const trimmed = content.trim();
        if (!trimmed) return ""; // Don't render empty code tags

        // Determine delimiter based on content
        let delimiter = "`";
        if (trimmed.includes("`")) {
          delimiter = "``";
          // If content starts or ends with backtick, add space when using ``
          if (trimmed.startsWith("`") || trimmed.endsWith("`")) {
            return `${delimiter} ${trimmed} ${delimiter}`;
          }
        }
        return delimiter + trimmed + delimiter;
      },
    });
  }

  // --- Markdown Postprocessing ---

  /**
   * Collapses blank-line runs outside fenced code blocks and trims the result.
   */
  private postprocessMarkdown(markdown: string): string {
    const lines: string[] = [];
    let fence: string | null = null;
    let blankRun = 0;

    for (const line of markdown.split("\n")) {
      if (fence) {
        lines.push(line);
        if (line.trim() === fence) fence = null;
        continue;
      }

      const marker = REGEX_FENCE_MARKER.exec(line);
      if (marker) {
        fence = marker[1];
      }

      if (line.trim() === "") {
        blankRun++;
        if (blankRun > POSTPROCESSING_MAX_CONSECUTIVE_BLANK_LINES) continue;
        lines.push("");
      } else {
        blankRun = 0;
        lines.push(line);
      }
    }

    return lines.join("\n").trim();
  }
}
