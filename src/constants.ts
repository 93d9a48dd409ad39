// --- Extraction thresholds (empirical, tunable through ContentExtractorOptions) ---

/** A selector match must carry more collapsed text than this to be accepted. */
export const MIN_SELECTOR_TEXT_LENGTH = 150;
/** Heuristic candidates scoring below this are not trusted. */
export const MIN_HEURISTIC_SCORE = 200;
export const PARAGRAPH_WEIGHT = 50;
export const HEADING_WEIGHT = 30;

// --- Noise ---

export const UNWANTED_TAGS: ReadonlyArray<string> = [
  "header",
  "nav",
  "aside",
  "footer",
  "form",
  "noscript",
  "script",
  "style",
  "iframe",
];

// Matched as substrings of the joined, lower-cased class attribute
export const UNWANTED_CLASS_KEYWORDS: ReadonlyArray<string> = [
  "share",
  "comment",
  "recommend",
  "related",
  "sidebar",
  "advert",
  "ad-",
  "reward",
  "meta",
  "profile",
];

export const CANDIDATE_TAGS: ReadonlyArray<string> = ["article", "div", "main"];
export const LIST_TAGS: ReadonlyArray<string> = ["ul", "ol"];
export const HEADING_TAGS: ReadonlyArray<string> = ["h1", "h2", "h3", "h4", "h5", "h6"];
export const EMPTY_SHELL_TAGS: ReadonlyArray<string> = ["div", "span"];

// --- Selector registry data ---

export const DOMAIN_SPECIFIC_SELECTORS: ReadonlyArray<readonly [string, ReadonlyArray<string>]> = [
  ["csdn.net", ["div.blog-content-box", "div#content_views", "div.article_content"]],
];

export const GENERIC_SELECTORS: ReadonlyArray<string> = [
  "article.post",
  "article.post-block",
  "article.article",
  "div.post-body",
  "div#article-container",
  "div.entry-content",
  "div.post-content",
  "main article",
];

// --- Code blocks ---

export const CODE_WRAPPER_CLASSES: ReadonlyArray<string> = ["highlight", "codeblock"];
export const CODE_GUTTER_CLASS = "gutter";
export const CODE_CONTAINER_CLASS = "code";
export const CODE_LINE_CLASS = "line";
export const CODE_BLOCK_LANG_PREFIXES: ReadonlyArray<string> = ["language-", "lang-"];

// --- Fetching ---

export const DEFAULT_HTTP_TIMEOUT = 15000;

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36";

export const COMMON_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9,zh-CN;q=0.8",
};

// Bytes inspected for a <meta charset> declaration when the header has none
export const CHARSET_SNIFF_BYTES = 4096;

// Regex
export const REGEX_CONTENT_TYPE_CHARSET = /charset\s*=\s*["']?([\w.:-]+)/i;
export const REGEX_META_CHARSET = /<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i;
export const REGEX_TITLE_TAG = /<title[^>]*>([^<]+)<\/title>/i;

// --- Output ---

export const DEFAULT_OUTPUT_DIR = "example";
export const DEFAULT_CONCURRENCY = 2;
