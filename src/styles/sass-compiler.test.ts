import { describe, it, expect } from "vitest";
import { SassCompiler, candidatePaths } from "./sass-compiler";
import { MemoryStorage } from "../storage/memory";

describe("candidatePaths", () => {
  it("tries partials, plain files and index files", () => {
    expect(candidatePaths("styles/vars")).toEqual([
      "styles/_vars.scss",
      "styles/vars.scss",
      "styles/_vars.sass",
      "styles/vars.sass",
      "styles/vars/_index.scss",
      "styles/vars/index.scss",
      "styles/vars.css",
    ]);
  });

  it("keeps explicit extensions", () => {
    expect(candidatePaths("styles/reset.css")).toEqual([
      "styles/reset.css",
      "styles/_reset.css",
    ]);
  });
});

describe("SassCompiler", () => {
  const compiler = new SassCompiler();

  it("resolves @use against the storage", async () => {
    const storage = new MemoryStorage({
      "styles/_vars.scss": "$text: #333;",
    });

    const css = await compiler.compile(
      '@use "vars" as *;\nbody { color: $text; }',
      "styles/main.scss",
      storage,
      "compressed",
    );

    expect(css.trim()).toBe("body{color:#333}");
  });

  it("resolves nested loads relative to the importing file", async () => {
    const storage = new MemoryStorage({
      "styles/base/_index.scss": '@use "colors";\na { color: colors.$link; }',
      "styles/base/_colors.scss": "$link: blue;",
    });

    const css = await compiler.compile(
      '@use "base";',
      "styles/main.scss",
      storage,
      "expanded",
    );

    expect(css).toBe("a {\n  color: blue;\n}");
  });

  it("rejects unresolvable imports", async () => {
    await expect(
      compiler.compile('@use "missing";', "styles/main.scss", new MemoryStorage(), "compressed"),
    ).rejects.toThrow();
  });
});
