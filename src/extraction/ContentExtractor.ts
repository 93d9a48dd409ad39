import type { DocumentLike, ElementLike } from "../dom/ElementLike.js";
import type { ExtractionMethod, ExtractionResult } from "../types.js";
import { MIN_HEURISTIC_SCORE, MIN_SELECTOR_TEXT_LENGTH } from "../constants.js";
import { ContentNotFoundError } from "../errors.js";
import { CodeBlockNormalizer } from "./CodeBlockNormalizer.js";
import { ContentCleaner } from "./ContentCleaner.js";
import { HeuristicPicker } from "./HeuristicPicker.js";
import { SelectorRegistry, type SelectorSource } from "./SelectorRegistry.js";
import { selectOne } from "./selectors.js";
import { textLength } from "./noise.js";

/**
 * Configuration options for the ContentExtractor.
 */
export interface ContentExtractorOptions {
  /** Where selectors come from. Default: a SelectorRegistry with the built-in lists */
  registry?: SelectorSource;
  /** A selector match must carry more text than this. Default: 150 */
  minSelectorTextLength?: number;
  /** Minimum score of the heuristic fallback. Default: 200 */
  minHeuristicScore?: number;
}

/**
 * Lower-cased host (port included) of a URL, or "" when it cannot be parsed.
 */
export function domainOf(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return "";
  }
}

/**
 * Locates the article body of a blog page: domain selectors, then generic selectors, then the
 * heuristic picker. The winner is cleaned and its code blocks normalized in place.
 */
export class ContentExtractor {
  private readonly registry: SelectorSource;
  private readonly minSelectorTextLength: number;
  private readonly picker: HeuristicPicker;
  private readonly cleaner = new ContentCleaner();
  private readonly normalizer = new CodeBlockNormalizer();

  private static readonly DEFAULT_OPTIONS = {
    minSelectorTextLength: MIN_SELECTOR_TEXT_LENGTH,
    minHeuristicScore: MIN_HEURISTIC_SCORE,
  };

  constructor(options: ContentExtractorOptions = {}) {
    const merged = { ...ContentExtractor.DEFAULT_OPTIONS, ...options };
    this.registry = merged.registry ?? new SelectorRegistry();
    this.minSelectorTextLength = merged.minSelectorTextLength;
    this.picker = new HeuristicPicker({ minScore: merged.minHeuristicScore });
  }

  /**
   * @throws {ContentNotFoundError} When no selector and no heuristic candidate qualifies.
   */
  extract(document: DocumentLike, url: string): ExtractionResult {
    const found = this.locate(document.root, domainOf(url));
    if (!found) {
      throw new ContentNotFoundError();
    }
    this.cleaner.clean(found.element);
    this.normalizer.normalize(found.element, document);
    return found;
  }

  private locate(root: ElementLike, domain: string): ExtractionResult | null {
    for (const selector of this.registry.selectorsFor(domain)) {
      const element = selectOne(root, selector);
      if (element && textLength(element) > this.minSelectorTextLength) {
        const method: ExtractionMethod = `selector:${selector}`;
        return { element, method };
      }
    }

    const element = this.picker.pick(root);
    return element ? { element, method: "heuristic" } : null;
  }
}

/**
 * Finds, cleans and normalizes the main content node of `document`.
 * @param url Source URL of the page; its host picks the domain-specific selectors.
 * @throws {ContentNotFoundError}
 */
export function extractMainContent(
  document: DocumentLike,
  url: string,
  options?: ContentExtractorOptions
): ExtractionResult {
  return new ContentExtractor(options).extract(document, url);
}
