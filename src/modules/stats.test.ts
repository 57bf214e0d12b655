import { describe, it, expect } from "vitest";
import { formatDuration } from "./stats";

describe("formatDuration", () => {
  it("keeps short durations in milliseconds", () => {
    expect(formatDuration(250)).toBe("250ms");
  });

  it("shows seconds with two decimals", () => {
    expect(formatDuration(1500)).toBe("1.50s");
  });

  it("splits long durations into minutes and seconds", () => {
    expect(formatDuration(125000)).toBe("2m 5s");
  });
});
