export type {
  ExtractionMethod,
  ExtractionResult,
  Candidate,
  HTMLFetchResult,
  FetchEngineOptions,
  HtmlFetcher,
  ArticleResult,
} from "./types.js";
export type { DocumentLike, ElementLike, TextOptions } from "./dom/ElementLike.js";
export { HtmlDocument, HtmlElement } from "./dom/HtmlDocument.js";

export { ContentExtractor, extractMainContent, domainOf } from "./extraction/ContentExtractor.js";
export type { ContentExtractorOptions } from "./extraction/ContentExtractor.js";
export { SelectorRegistry } from "./extraction/SelectorRegistry.js";
export type { SelectorSource, DomainSelectors } from "./extraction/SelectorRegistry.js";
export { parseSelector, selectOne, selectAll } from "./extraction/selectors.js";
export type { Selector } from "./extraction/selectors.js";
export { HeuristicPicker } from "./extraction/HeuristicPicker.js";
export type { HeuristicPickerOptions } from "./extraction/HeuristicPicker.js";
export { ContentCleaner } from "./extraction/ContentCleaner.js";
export { CodeBlockNormalizer, cleanCodeText } from "./extraction/CodeBlockNormalizer.js";

export { FetchEngine } from "./FetchEngine.js";
export { ArticleEngine } from "./ArticleEngine.js";
export type { ArticleEngineOptions } from "./ArticleEngine.js";
export { MarkdownConverter } from "./utils/markdown-converter.js";
export { slugify } from "./utils/slug.js";
export { resolveOutputPaths, writeOutput } from "./utils/output.js";
export type { OutputPathOptions, OutputPaths } from "./utils/output.js";

export {
  BlogmarkError,
  ContentNotFoundError,
  FetchError,
  FetchEngineHttpError,
  UsageError,
} from "./errors.js";
export type { ErrorDetails } from "./errors.js";
