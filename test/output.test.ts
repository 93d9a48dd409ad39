import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { resolveOutputPaths, writeOutput } from "../src/utils/output.js";

describe("resolveOutputPaths", () => {
  it("defaults to <baseDir>/<slug>/<slug>.{html,md}", () => {
    expect(resolveOutputPaths("my-post")).toEqual({
      htmlPath: path.join("example", "my-post", "my-post.html"),
      mdPath: path.join("example", "my-post", "my-post.md"),
    });
    expect(resolveOutputPaths("my-post", { baseDir: "out" }).mdPath).toBe(path.join("out", "my-post", "my-post.md"));
  });

  it("lets explicit paths win", () => {
    expect(resolveOutputPaths("my-post", { htmlOut: "a.html", mdOut: "b.md" })).toEqual({
      htmlPath: "a.html",
      mdPath: "b.md",
    });
  });
});

describe("writeOutput", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("creates missing directories and writes UTF-8", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "blogmark-output-"));
    const target = path.join(dir, "nested", "deeper", "post.md");

    await writeOutput(target, "# Título\n");

    expect(await readFile(target, "utf8")).toBe("# Título\n");
  });
});
