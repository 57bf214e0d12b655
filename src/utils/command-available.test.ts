import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { delimiter, join } from "node:path";
import { commandAvailable } from "./command-available";

describe("commandAvailable", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkdtemp(join(tmpdir(), "repodoc-path-"));
    await writeFile(join(tmp, "pod2markdown"), "", "utf-8");
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it("finds a command in the search path", async () => {
    expect(await commandAvailable("pod2markdown", tmp)).toBe(true);
  });

  it("searches every directory of the path", async () => {
    const searchPath = [join(tmp, "missing"), tmp].join(delimiter);
    expect(await commandAvailable("pod2markdown", searchPath)).toBe(true);
  });

  it("reports a missing command", async () => {
    expect(await commandAvailable("testtest1234", tmp)).toBe(false);
  });

  it("reports nothing available for an empty path", async () => {
    expect(await commandAvailable("pod2markdown", "")).toBe(false);
  });
});
