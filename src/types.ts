import type { ElementLike } from "./dom/ElementLike.js";

/**
 * Provenance of an extracted node: the selector that matched, or the heuristic fallback.
 */
export type ExtractionMethod = `selector:${string}` | "heuristic";

/**
 * Result of locating an article inside a document.
 */
export interface ExtractionResult {
  /** The content node, cleaned and with code blocks normalized. Still attached to its document. */
  element: ElementLike;
  method: ExtractionMethod;
}

/**
 * A scored container considered by the heuristic fallback.
 */
export interface Candidate {
  element: ElementLike;
  score: number;
}

/**
 * Defines the structure for the result of fetching HTML content.
 */
export interface HTMLFetchResult {
  /** The decoded HTML. */
  content: string;
  /** The `<title>` of the page, if available. */
  title: string | null;
  /** The final URL after any redirects. */
  url: string;
  /** The HTTP status code of the final response. */
  statusCode: number;
}

/**
 * Configuration options for the FetchEngine.
 */
export interface FetchEngineOptions {
  /** Request timeout in milliseconds. Default: 15000 */
  timeout?: number;
  /** Overrides the default desktop browser User-Agent. */
  userAgent?: string;
  /** Optional headers to include in the request. */
  headers?: Record<string, string>;
}

/**
 * Anything able to download a page; FetchEngine is the default.
 */
export interface HtmlFetcher {
  fetchHTML(url: string): Promise<HTMLFetchResult>;
}

/**
 * An article converted to HTML and Markdown.
 */
export interface ArticleResult {
  /** The URL the article was requested from. */
  url: string;
  /** Page title ("" when the page has none). */
  title: string;
  slug: string;
  /** The content node serialized, always wrapped in an `<article>` element. */
  html: string;
  markdown: string;
  method: ExtractionMethod;
  /** Length of the content text with every text node trimmed. */
  approximateCharacters: number;
}
