import { describe, it, expect } from "vitest";
import {
  buildTableOfContents,
  compareIgnoreCase,
  sortPageNames,
} from "./build-table-of-contents";
import { pagesOf } from "./testing";

describe("compareIgnoreCase", () => {
  it("orders ignoring case", () => {
    expect(["b.md", "C.md", "a.md"].sort(compareIgnoreCase)).toEqual([
      "a.md",
      "b.md",
      "C.md",
    ]);
  });

  it("breaks ties between case variants by code point", () => {
    expect(["fetch.md", "Fetch.md"].sort(compareIgnoreCase)).toEqual([
      "Fetch.md",
      "fetch.md",
    ]);
  });
});

describe("sortPageNames", () => {
  it("removes duplicates", () => {
    expect(sortPageNames(["b.md", "a.md", "b.md"])).toEqual(["a.md", "b.md"]);
  });
});

describe("buildTableOfContents", () => {
  it("sorts every section regardless of insertion order", () => {
    const toc = buildTableOfContents(
      pagesOf({
        components: {
          "profile::functions.md": "",
          "Fmonagent.md": "",
          "aii::freeipa::schema.md": "",
        },
        CCM: { "Fetch::Download.md": "" },
      }),
    );

    expect(Object.fromEntries(toc)).toEqual({
      components: [
        "aii::freeipa::schema.md",
        "Fmonagent.md",
        "profile::functions.md",
      ],
      CCM: ["Fetch::Download.md"],
    });
  });

  it("keeps empty sections", () => {
    const toc = buildTableOfContents(pagesOf({ CAF: {} }));
    expect(toc.get("CAF")).toEqual([]);
  });
});
