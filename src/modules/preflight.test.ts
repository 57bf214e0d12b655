import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  checkCommands,
  checkInput,
  preflight,
  selectRepositories,
} from "./preflight";
import { createContext } from "../builder";
import { PreconditionError } from "../utils/errors";
import type { BuildConfig, CommandsConfig } from "../types";

const commands: CommandsConfig = {
  build: "mvn",
  buildArgs: ["-q", "clean", "compile"],
  markdown: "pod2markdown",
};

describe("checkInput", () => {
  let tmp: string;
  let input: string;
  let output: string;

  beforeEach(async () => {
    tmp = await mkdtemp(join(tmpdir(), "repodoc-preflight-"));
    input = join(tmp, "src");
    output = join(tmp, "site");
    await mkdir(input);
    await mkdir(output);
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it("passes for an existing input and an empty output", async () => {
    const checks = await checkInput(input, output);
    expect(checks.every((check) => check.ok)).toBe(true);
  });

  it("requires an input location", async () => {
    expect(await checkInput("", output)).toEqual([
      { name: "input", ok: false, message: "Repository location not specified." },
    ]);
  });

  it("requires an output location", async () => {
    expect(await checkInput(input, "")).toEqual([
      { name: "output", ok: false, message: "Output location not specified." },
    ]);
  });

  it("rejects a missing input", async () => {
    const missing = join(tmp, "missing");
    expect(await checkInput(missing, output)).toEqual([
      {
        name: "input",
        ok: false,
        message: `Repository location ${missing} does not exist.`,
      },
    ]);
  });

  it("rejects a missing output", async () => {
    const missing = join(tmp, "missing");
    expect((await checkInput(input, missing))[0].message).toBe(
      `Output location ${missing} does not exist.`,
    );
  });

  it("rejects an output that is a file", async () => {
    const file = join(tmp, "file.txt");
    await writeFile(file, "x", "utf-8");
    expect((await checkInput(input, file))[0].message).toBe(
      `Output location ${file} is not a directory.`,
    );
  });

  it("rejects an output with hidden entries", async () => {
    await writeFile(join(output, ".keep"), "", "utf-8");
    expect((await checkInput(input, output))[0].message).toBe(
      `Output location ${output} is not empty.`,
    );
  });
});

describe("checkCommands", () => {
  it("only needs the converter without compilation", async () => {
    const isAvailable = vi.fn(async () => true);
    const checks = await checkCommands(false, commands, isAvailable);

    expect(checks.map((check) => check.name)).toEqual(["pod2markdown"]);
    expect(isAvailable).toHaveBeenCalledTimes(1);
  });

  it("reports every missing command", async () => {
    const checks = await checkCommands(true, commands, async () => false);

    expect(checks.map((check) => check.message)).toEqual([
      "The command mvn is not available on this system, please install it.",
      "The command pod2markdown is not available on this system, please install it.",
    ]);
  });
});

describe("selectRepositories", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkdtemp(join(tmpdir(), "repodoc-repos-"));
    await mkdir(join(tmp, "CCM"));
    await mkdir(join(tmp, "maven-tools", "build-scripts"), { recursive: true });
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it("keeps repositories present on disk, subdirectory included", async () => {
    const { selected, missing } = await selectRepositories(tmp, {
      CCM: { sitesection: "CCM", targets: ["EDG/WP4/CCM/"], subdir: null },
      "maven-tools": {
        sitesection: "Unittest",
        targets: ["Test/"],
        subdir: "build-scripts",
      },
      aii: { sitesection: "AII", targets: ["NCM/"], subdir: null },
    });

    expect(Object.keys(selected)).toEqual(["CCM", "maven-tools"]);
    expect(missing).toEqual(["aii"]);
  });
});

describe("preflight", () => {
  let tmp: string;
  let config: BuildConfig;

  beforeEach(async () => {
    tmp = await mkdtemp(join(tmpdir(), "repodoc-ctx-"));
    await mkdir(join(tmp, "src", "CCM"), { recursive: true });
    await mkdir(join(tmp, "site"));
    config = {
      input: join(tmp, "src"),
      output: join(tmp, "site"),
      compile: false,
      cleanup: [],
      sources: { patterns: ["**/*.pod"], ignore: [] },
      commands,
      site: {
        name: "Test Docs",
        docsDir: "docs",
        navFile: "mkdocs.yml",
        navTemplate: null,
      },
      repositories: {
        CCM: { sitesection: "CCM", targets: ["EDG/WP4/CCM/"], subdir: null },
        aii: { sitesection: "AII", targets: ["NCM/"], subdir: null },
      },
      logging: { level: "error" },
    };
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it("stores the repositories found and tracks the missing ones", async () => {
    const ctx = createContext(config, {
      collaborators: { commandAvailable: async () => true },
    });

    await preflight(ctx);

    expect(Object.keys(ctx.repositories ?? {})).toEqual(["CCM"]);
    expect(ctx.tracker.getIssues("repository")).toEqual([
      { type: "repository", path: join(tmp, "src", "aii"), repository: "aii" },
    ]);
    expect(ctx.tracker.getStats().repositories).toBe(1);
  });

  it("fails when the converter is missing", async () => {
    const ctx = createContext(config, {
      collaborators: { commandAvailable: async () => false },
    });

    const error = await preflight(ctx).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PreconditionError);
    expect(error).toMatchObject({
      message:
        "Preconditions failed: The command pod2markdown is not available on this system, please install it.",
    });
    expect(ctx.repositories).toBeUndefined();
  });

  it("fails when no configured repository exists", async () => {
    const ctx = createContext(
      { ...config, repositories: { aii: config.repositories.aii } },
      { collaborators: { commandAvailable: async () => true } },
    );

    await expect(preflight(ctx)).rejects.toThrow(
      `Preconditions failed: None of the configured repositories exist in ${config.input}.`,
    );
  });
});
