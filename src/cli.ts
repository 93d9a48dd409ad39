import { parseArgs } from "node:util";
import { z } from "zod";
import type { ArticleResult, HtmlFetcher } from "./types.js";
import { DEFAULT_CONCURRENCY, DEFAULT_HTTP_TIMEOUT, DEFAULT_OUTPUT_DIR } from "./constants.js";
import { ArticleEngine } from "./ArticleEngine.js";
import { UsageError, formatError } from "./errors.js";
import { resolveOutputPaths, writeOutput } from "./utils/output.js";

export const USAGE = `Usage: blogmark <url...> [options]

Fetch blog posts and save the article body as HTML and Markdown.

Options:
  --html-out <path>     HTML output path (single URL only; default <out-dir>/<slug>/<slug>.html)
  --md-out <path>       Markdown output path (single URL only; default <out-dir>/<slug>/<slug>.md)
  --out-dir <dir>       Root directory of the default layout (default "${DEFAULT_OUTPUT_DIR}")
  --timeout <seconds>   Request timeout in seconds (default ${DEFAULT_HTTP_TIMEOUT / 1000})
  --user-agent <ua>     Override the default User-Agent
  --concurrency <n>     Pages fetched at once (default ${DEFAULT_CONCURRENCY})
  -h, --help            Show this help`;

const CliOptionsSchema = z
  .object({
    urls: z.array(z.string().url({ message: "invalid URL" })).min(1, { message: "at least one URL is required" }),
    htmlOut: z.string().min(1).optional(),
    mdOut: z.string().min(1).optional(),
    outDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
    timeout: z.coerce.number().positive().default(DEFAULT_HTTP_TIMEOUT / 1000),
    userAgent: z.string().min(1).optional(),
    concurrency: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
  })
  .refine((options) => options.urls.length === 1 || (!options.htmlOut && !options.mdOut), {
    message: "--html-out and --md-out can only be used with a single URL",
  });

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export type ParsedCommand = { kind: "help" } | { kind: "run"; options: CliOptions };

export interface CliDependencies {
  /** Replaces the default FetchEngine. */
  fetcher?: HtmlFetcher;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        "html-out": { type: "string" },
        "md-out": { type: "string" },
        "out-dir": { type: "string" },
        timeout: { type: "string" },
        "user-agent": { type: "string" },
        concurrency: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error: unknown) {
    throw new UsageError(formatError(error));
  }
}

/**
 * @throws {UsageError} On unknown flags, missing values or values that fail validation.
 */
export function parseCliArgs(argv: string[]): ParsedCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { kind: "help" };
  }

  const result = CliOptionsSchema.safeParse({
    urls: positionals,
    htmlOut: values["html-out"],
    mdOut: values["md-out"],
    outDir: values["out-dir"],
    timeout: values.timeout,
    userAgent: values["user-agent"],
    concurrency: values.concurrency,
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new UsageError(`${where}${issue.message}`);
  }
  return { kind: "run", options: result.data };
}

async function saveArticle(article: ArticleResult, options: CliOptions): Promise<void> {
  const { htmlPath, mdPath } = resolveOutputPaths(article.slug, {
    htmlOut: options.htmlOut,
    mdOut: options.mdOut,
    baseDir: options.outDir,
  });
  console.log(`[info] Extraction method: ${article.method}`);
  console.log(`[info] Approximate characters: ${article.approximateCharacters}`);
  await writeOutput(htmlPath, article.html);
  console.log(`[info] HTML written to: ${htmlPath}`);
  await writeOutput(mdPath, article.markdown);
  console.log(`[info] Markdown written to: ${mdPath}`);
}

/**
 * Runs the `blogmark` command.
 * @returns The process exit code: 0 on success, 1 when any URL failed, 2 on a usage error.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  let command: ParsedCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error: unknown) {
    if (!(error instanceof UsageError)) throw error;
    console.error(`Error: ${error.message}`);
    console.error(USAGE);
    return 2;
  }

  if (command.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  const { options } = command;
  const engine = new ArticleEngine({
    fetcher: deps.fetcher,
    fetchOptions: { timeout: Math.round(options.timeout * 1000), userAgent: options.userAgent },
    concurrency: options.concurrency,
  });

  const results = await engine.convertMany(options.urls);

  let exitCode = 0;
  for (const [index, result] of results.entries()) {
    const url = options.urls[index];
    if (result.status === "rejected") {
      const prefix = options.urls.length > 1 ? `${url}: ` : "";
      console.error(`Error: ${prefix}${formatError(result.reason)}`);
      exitCode = 1;
      continue;
    }
    try {
      await saveArticle(result.value, options);
    } catch (error: unknown) {
      console.error(`Error: failed to save ${url}: ${formatError(error)}`);
      exitCode = 1;
    }
  }
  return exitCode;
}
