import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import glob from "fast-glob";
import { writeSite } from "./write-site";
import { pagesOf } from "./testing";

async function readTree(root: string): Promise<Record<string, string>> {
  const files = (await glob("**/*", { cwd: root, onlyFiles: true })).sort();
  const tree: Record<string, string> = {};
  for (const file of files) {
    tree[file] = await readFile(join(root, file), "utf-8");
  }
  return tree;
}

describe("writeSite", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkdtemp(join(tmpdir(), "repodoc-write-"));
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  const pages = pagesOf({
    CCM: { "fetch::download.md": "# NAME\n\nEDG::WP4::CC" },
    components: {
      "fmonagent.md": "Hello",
      "profile::functions.md": "\n### Functions\n",
    },
  });

  it("writes one directory per section", async () => {
    await writeSite(pages, tmp, "docs");

    expect(await readTree(tmp)).toEqual({
      "docs/CCM/fetch::download.md": "# NAME\n\nEDG::WP4::CC",
      "docs/components/fmonagent.md": "Hello",
      "docs/components/profile::functions.md": "\n### Functions\n",
    });
  });

  it("returns the sorted table of contents", async () => {
    const toc = await writeSite(pages, tmp, "docs");

    expect(Object.fromEntries(toc)).toEqual({
      CCM: ["fetch::download.md"],
      components: ["fmonagent.md", "profile::functions.md"],
    });
  });

  it("reports every written file", async () => {
    const written: string[] = [];
    await writeSite(pages, tmp, "docs", (path) => written.push(path));

    expect(written).toEqual([
      join(tmp, "docs", "CCM", "fetch::download.md"),
      join(tmp, "docs", "components", "fmonagent.md"),
      join(tmp, "docs", "components", "profile::functions.md"),
    ]);
  });

  it("produces identical trees for identical pages", async () => {
    const first = join(tmp, "first");
    const second = join(tmp, "second");

    await writeSite(pages, first, "docs");
    await writeSite(pages, second, "docs");

    expect(await readTree(first)).toEqual(await readTree(second));
  });

  it("overwrites existing pages", async () => {
    await writeSite(pagesOf({ CCM: { "a.md": "old" } }), tmp, "docs");
    await writeSite(pagesOf({ CCM: { "a.md": "new" } }), tmp, "docs");

    expect(await readFile(join(tmp, "docs", "CCM", "a.md"), "utf-8")).toBe(
      "new",
    );
  });
});
