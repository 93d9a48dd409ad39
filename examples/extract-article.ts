import { ArticleEngine, HtmlDocument, extractMainContent } from "../src/index.js";

/**
 * Article extraction with ArticleEngine
 *
 * Perfect for: Hexo/Hugo/WordPress blogs, CSDN posts, technical write-ups with code blocks
 */

async function main() {
  // Straight from the network to Markdown
  const engine = new ArticleEngine({ fetchOptions: { timeout: 20000 } });

  console.log("Fetching blog post...");
  const article = await engine.convert("https://example.com/blog/some-post");

  console.log(`Title: ${article.title}`);
  console.log(`Found by: ${article.method}`);
  console.log(`Markdown:\n${article.markdown}`);

  // Or work on HTML you already have
  const document = new HtmlDocument(`<main><article><p>${"Some paragraph text. ".repeat(10)}</p></article></main>`);
  const { element, method } = extractMainContent(document, "https://example.com/local");
  console.log(`${method}: ${element.toHtml()}`);
}

main().catch(console.error);
