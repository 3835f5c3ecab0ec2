import { describe, it, expect } from "vitest";
import { EXIT_CANCELLED, exitCodeFor } from "./run-build";
import { overridesFromFlags } from "./commands/build";
import { Tracker } from "../utils/tracker";
import type { BuildResult, BuildStatus } from "../builder";

function result(status: BuildStatus, errorCount: number): BuildResult {
  return { status, errorCount, stats: new Tracker().getStats() };
}

describe("exitCodeFor", () => {
  it("maps build status to an exit code", () => {
    expect(exitCodeFor(result("success", 0))).toBe(0);
    expect(exitCodeFor(result("failed", 0))).toBe(1);
    expect(exitCodeFor(result("cancelled", 0))).toBe(EXIT_CANCELLED);
  });

  it("fails on per-item errors only under strict", () => {
    expect(exitCodeFor(result("success", 2))).toBe(0);
    expect(exitCodeFor(result("success", 2), true)).toBe(1);
  });
});

describe("overridesFromFlags", () => {
  it("only includes flags that were given", () => {
    expect(overridesFromFlags({})).toEqual({});
    expect(overridesFromFlags({ drafts: true, baseUrl: "https://example.com" })).toEqual({
      buildDrafts: true,
      baseUrl: "https://example.com",
    });
  });
});
