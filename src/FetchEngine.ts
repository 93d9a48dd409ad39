import type { FetchEngineOptions, HTMLFetchResult, HtmlFetcher } from "./types.js";
import {
  CHARSET_SNIFF_BYTES,
  COMMON_HEADERS,
  DEFAULT_HTTP_TIMEOUT,
  REGEX_CONTENT_TYPE_CHARSET,
  REGEX_META_CHARSET,
  REGEX_TITLE_TAG,
} from "./constants.js";
import { FetchEngineHttpError, FetchError } from "./errors.js";

type ResolvedFetchEngineOptions = Required<Omit<FetchEngineOptions, "userAgent">> &
  Pick<FetchEngineOptions, "userAgent">;

/**
 * FetchEngine - A lightweight engine for fetching HTML content using the standard `fetch` API.
 *
 * Blog pages are served as static HTML, so no JavaScript is executed.
 * It does not support retries, caching, or proxies.
 */
export class FetchEngine implements HtmlFetcher {
  private readonly options: ResolvedFetchEngineOptions;

  private static readonly DEFAULT_OPTIONS: ResolvedFetchEngineOptions = {
    timeout: DEFAULT_HTTP_TIMEOUT,
    headers: {},
  };

  /**
   * Creates an instance of FetchEngine.
   * @param options Configuration options for the FetchEngine.
   */
  constructor(options: FetchEngineOptions = {}) {
    this.options = { ...FetchEngine.DEFAULT_OPTIONS, ...options };
  }

  /**
   * Fetches and decodes the HTML at the specified URL.
   *
   * @param url The URL to fetch.
   * @returns A Promise resolving to an HTMLFetchResult object.
   * @throws {FetchEngineHttpError} If the HTTP response status is not ok (e.g., 404, 500).
   * @throws {FetchError} On timeout (ERR_TIMEOUT), non-HTML content (ERR_NON_HTML_CONTENT) or any other failure.
   */
  async fetchHTML(url: string, options?: FetchEngineOptions): Promise<HTMLFetchResult> {
    const effectiveOptions = { ...this.options, ...options }; // Combine constructor and call options
    try {
      const finalHeaders: Record<string, string> = {
        ...COMMON_HEADERS,
        ...this.options.headers,
        ...options?.headers, // call headers override constructor headers, which override the base ones
      };
      if (effectiveOptions.userAgent) {
        finalHeaders["User-Agent"] = effectiveOptions.userAgent;
      }

      const response = await fetch(url, {
        redirect: "follow",
        headers: finalHeaders,
        signal: AbortSignal.timeout(effectiveOptions.timeout),
      });

      if (!response.ok) {
        throw new FetchEngineHttpError(`HTTP error! status: ${response.status}`, response.status);
      }

      const contentTypeHeader = response.headers.get("content-type");
      if (!contentTypeHeader || !contentTypeHeader.toLowerCase().includes("html")) {
        throw new FetchError(
          `Content-Type is not HTML: ${contentTypeHeader ?? "missing"}`,
          "ERR_NON_HTML_CONTENT",
          undefined,
          response.status
        );
      }

      const bytes = new Uint8Array(await response.arrayBuffer());
      const html = decodeHtml(bytes, contentTypeHeader);
      const titleMatch = html.match(REGEX_TITLE_TAG);
      const title = titleMatch ? titleMatch[1].trim() : null;

      return {
        content: html,
        title: title,
        url: response.url || url, // Use the final URL after redirects
        statusCode: response.status,
      };
    } catch (error: unknown) {
      // Re-throw specific known errors directly
      if (error instanceof FetchError) {
        throw error;
      }
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new FetchError(`Request timed out after ${effectiveOptions.timeout}ms`, "ERR_TIMEOUT", error);
      }
      // Wrap other/unexpected errors
      const message = error instanceof Error ? error.message : "Unknown fetch error";
      throw new FetchError(`Fetch failed: ${message}`, "ERR_FETCH_FAILED", error instanceof Error ? error : undefined);
    }
  }
}

/**
 * Charset label from the Content-Type header, else from a `<meta>` in the first bytes of the body.
 */
export function detectCharset(bytes: Uint8Array, contentType: string | null): string | null {
  const headerMatch = contentType?.match(REGEX_CONTENT_TYPE_CHARSET);
  if (headerMatch) {
    return headerMatch[1].toLowerCase();
  }
  // byte-for-byte view of the head; meta declarations are ASCII
  const head = new TextDecoder("latin1").decode(bytes.subarray(0, CHARSET_SNIFF_BYTES));
  const metaMatch = head.match(REGEX_META_CHARSET);
  return metaMatch ? metaMatch[1].toLowerCase() : null;
}

export function decodeHtml(bytes: Uint8Array, contentType: string | null): string {
  const charset = detectCharset(bytes, contentType) ?? "utf-8";
  try {
    return new TextDecoder(charset).decode(bytes);
  } catch (error: unknown) {
    if (!(error instanceof RangeError)) {
      throw error;
    }
    console.warn(`FetchEngine: unknown charset "${charset}", decoding as utf-8`);
    return new TextDecoder("utf-8").decode(bytes);
  }
}
