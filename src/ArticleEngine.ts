import PQueue from "p-queue";
import type { ArticleResult, FetchEngineOptions, HtmlFetcher } from "./types.js";
import { DEFAULT_CONCURRENCY } from "./constants.js";
import { HtmlDocument } from "./dom/HtmlDocument.js";
import { ContentExtractor, type ContentExtractorOptions } from "./extraction/ContentExtractor.js";
import { FetchEngine } from "./FetchEngine.js";
import { MarkdownConverter } from "./utils/markdown-converter.js";
import { slugify } from "./utils/slug.js";

/**
 * Configuration options for the ArticleEngine.
 */
export interface ArticleEngineOptions {
  /** Downloads pages. Default: a FetchEngine built from `fetchOptions` */
  fetcher?: HtmlFetcher;
  /** Options for the default FetchEngine; ignored when `fetcher` is given. */
  fetchOptions?: FetchEngineOptions;
  /** Options forwarded to the ContentExtractor. */
  extraction?: ContentExtractorOptions;
  /** Maximum number of pages converted at once by `convertMany`. Default: 2 */
  concurrency?: number;
}

/**
 * ArticleEngine - Turns a blog post URL (or its HTML) into a clean article HTML fragment and Markdown.
 */
export class ArticleEngine {
  private readonly fetcher: HtmlFetcher;
  private readonly extractor: ContentExtractor;
  private readonly converter = new MarkdownConverter();
  private readonly concurrency: number;

  private static readonly DEFAULT_OPTIONS = {
    concurrency: DEFAULT_CONCURRENCY,
  };

  constructor(options: ArticleEngineOptions = {}) {
    const merged = { ...ArticleEngine.DEFAULT_OPTIONS, ...options };
    this.fetcher = merged.fetcher ?? new FetchEngine(merged.fetchOptions);
    this.extractor = new ContentExtractor(merged.extraction);
    this.concurrency = merged.concurrency;
  }

  /**
   * Fetches `url` and converts the page.
   * @throws {FetchError} If the page cannot be downloaded.
   * @throws {ContentNotFoundError} If no article body can be located.
   */
  async convert(url: string): Promise<ArticleResult> {
    const page = await this.fetcher.fetchHTML(url);
    return this.convertHtml(page.content, url);
  }

  /**
   * Converts every URL, at most `concurrency` at a time. Results keep the input order.
   */
  async convertMany(urls: string[]): Promise<PromiseSettledResult<ArticleResult>[]> {
    const queue = new PQueue({ concurrency: this.concurrency });
    const tasks = urls.map((url) => queue.add(() => this.convert(url), { throwOnTimeout: true }));
    return Promise.allSettled(tasks);
  }

  /**
   * Extracts the article from already downloaded HTML.
   * @param url Source URL; selects the domain-specific selectors.
   * @throws {ContentNotFoundError}
   */
  convertHtml(html: string, url: string): ArticleResult {
    const document = new HtmlDocument(html);
    const title = document.title();
    const slug = slugify(title);
    const { element, method } = this.extractor.extract(document, url);

    const serialized = element.toHtml();
    const articleHtml = element.tagName === "article" ? serialized : `<article>\n${serialized}\n</article>`;

    const body = this.converter.convert(articleHtml);
    const markdown = title ? `# ${title}\n\n${body}` : body;

    return {
      url,
      title,
      slug,
      html: articleHtml,
      markdown,
      method,
      approximateCharacters: element.getText({ strip: true }).length,
    };
  }
}
