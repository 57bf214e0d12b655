import { describe, it, expect } from "vitest";
import { scan } from "./scanner";
import { createContext } from "../builder";
import type { BuildConfig } from "../types";

const config: BuildConfig = {
  input: "/src",
  output: "/site",
  compile: true,
  cleanup: ["remove-whitespace"],
  sources: { patterns: ["**/*.pod"], ignore: [] },
  commands: { build: "mvn", buildArgs: [], markdown: "pod2markdown" },
  site: {
    name: "Test Docs",
    docsDir: "docs",
    navFile: "mkdocs.yml",
    navTemplate: null,
  },
  repositories: {},
  logging: { level: "error" },
};

describe("scan", () => {
  it("requires preflight", async () => {
    const ctx = createContext(config);
    await expect(scan(ctx)).rejects.toThrow(
      "Preflight must run before scanner",
    );
  });

  it("catalogs cleaned markdown per repository in name order", async () => {
    const scanned: Array<[string, boolean]> = [];
    const ctx = createContext(config, {
      collaborators: {
        scanSources: async (repositoryPath, compile) => {
          scanned.push([repositoryPath, compile]);
          return [`${repositoryPath}/a.pod`];
        },
        generateMarkdown: async (sourcePath) => `${sourcePath}   \n\n\n`,
      },
    });
    ctx.repositories = {
      "maven-tools": {
        sitesection: "Unittest",
        targets: ["Test/"],
        subdir: "build-scripts",
      },
      CCM: { sitesection: "CCM", targets: ["EDG/WP4/CCM/"], subdir: null },
    };

    await scan(ctx);

    expect(scanned).toEqual([
      ["/src/CCM", true],
      ["/src/maven-tools/build-scripts", true],
    ]);
    expect([...(ctx.catalog ?? [])]).toEqual([
      ["CCM", new Map([["/src/CCM/a.pod", "/src/CCM/a.pod\n"]])],
      [
        "maven-tools",
        new Map([
          [
            "/src/maven-tools/build-scripts/a.pod",
            "/src/maven-tools/build-scripts/a.pod\n",
          ],
        ]),
      ],
    ]);
  });

  it("skips sources that fail to convert", async () => {
    const ctx = createContext(config, {
      collaborators: {
        scanSources: async () => ["/src/CCM/bad.pod", "/src/CCM/good.pod"],
        generateMarkdown: async (sourcePath) => {
          if (sourcePath.endsWith("bad.pod")) {
            throw new Error("pod2markdown exited with code 1");
          }
          return "# Good\n";
        },
      },
    });
    ctx.repositories = {
      CCM: { sitesection: "CCM", targets: ["EDG/WP4/CCM/"], subdir: null },
    };

    await scan(ctx);

    expect(ctx.catalog?.get("CCM")).toEqual(
      new Map([["/src/CCM/good.pod", "# Good\n"]]),
    );
    expect(ctx.tracker.getIssues("file")).toEqual([
      {
        type: "file",
        path: "/src/CCM/bad.pod",
        reason: "convert-error",
        details: "pod2markdown exited with code 1",
      },
    ]);
    expect(ctx.tracker.getStats().sources).toBe(2);
  });
});
