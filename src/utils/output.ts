import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { DEFAULT_OUTPUT_DIR } from "../constants.js";

export interface OutputPathOptions {
  /** Explicit HTML path; wins over the default layout. */
  htmlOut?: string;
  /** Explicit Markdown path; wins over the default layout. */
  mdOut?: string;
  /** Root of the default `<baseDir>/<slug>/<slug>.{html,md}` layout. Default: "example" */
  baseDir?: string;
}

export interface OutputPaths {
  htmlPath: string;
  mdPath: string;
}

export function resolveOutputPaths(slug: string, options: OutputPathOptions = {}): OutputPaths {
  const baseDir = path.join(options.baseDir ?? DEFAULT_OUTPUT_DIR, slug);
  return {
    htmlPath: options.htmlOut || path.join(baseDir, `${slug}.html`),
    mdPath: options.mdOut || path.join(baseDir, `${slug}.md`),
  };
}

/**
 * Writes UTF-8 text, creating missing parent directories.
 */
export async function writeOutput(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await writeFile(filePath, content, "utf8");
}
