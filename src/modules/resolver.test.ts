import { describe, it, expect } from "vitest";
import { applyPermalink, deriveSlug, resolve } from "./resolver";
import type { Metadata } from "../types";

const config = { contentDirectory: "content" };

function meta(overrides: Partial<Metadata> = {}): Metadata {
  return { categories: [], tags: [], draft: false, extra: {}, ...overrides };
}

describe("resolve", () => {
  it("builds post URLs from the permalink template", () => {
    const result = resolve(
      {
        kind: "post",
        sourcePath: "content/posts/hello.md",
        metadata: meta({ title: "Hello, Go!" }),
        date: new Date("2024-03-05T00:00:00Z"),
      },
      "/blog/:year/:month/:day/:slug/",
      config,
    );

    expect(result).toEqual({
      url: "/blog/2024/03/05/hello-go/",
      destinationPath: "blog/2024/03/05/hello-go/index.html",
    });
  });

  it("uses metadata.url regardless of the template", () => {
    const result = resolve(
      {
        kind: "post",
        sourcePath: "content/posts/custom.md",
        metadata: meta({ url: "/custom/", title: "Ignored" }),
        date: new Date("2024-01-01T00:00:00Z"),
      },
      "/blog/:year/:slug/",
      config,
    );

    expect(result.destinationPath).toBe("custom/index.html");
    expect(result.url).toBe("/custom/");
  });

  it("normalizes a URL override without slashes", () => {
    const result = resolve(
      { kind: "page", sourcePath: "content/x.md", metadata: meta({ url: "about//me" }) },
      "/:slug/",
      config,
    );
    expect(result.url).toBe("/about/me/");
  });

  it("keeps file-style URLs as they are", () => {
    const result = resolve(
      { kind: "page", sourcePath: "content/404.md", metadata: meta({ url: "/404.html" }) },
      "/:slug/",
      config,
    );
    expect(result).toEqual({ url: "/404.html", destinationPath: "404.html" });
  });

  it("keeps an override's trailing slash even when the last segment has a dot", () => {
    const result = resolve(
      { kind: "page", sourcePath: "content/notes.md", metadata: meta({ url: "/release-1.0/" }) },
      "/:slug/",
      config,
    );
    expect(result).toEqual({ url: "/release-1.0/", destinationPath: "release-1.0/index.html" });
  });

  it("maps the root index file to /", () => {
    const result = resolve(
      { kind: "page", sourcePath: "content/index.md", metadata: meta({ title: "Home" }) },
      "/:slug/",
      config,
    );
    expect(result).toEqual({ url: "/", destinationPath: "index.html" });
  });

  it("does not treat nested index files as the root", () => {
    const result = resolve(
      { kind: "page", sourcePath: "content/docs/index.md", metadata: meta() },
      "/:slug/",
      config,
    );
    expect(result.url).toBe("/docs/");
  });
});

describe("deriveSlug", () => {
  it("prefers an explicit slug, then the title, then the file name", () => {
    expect(
      deriveSlug({ sourcePath: "content/a.md", metadata: meta({ slug: "My Slug", title: "T" }) }),
    ).toBe("my-slug");
    expect(deriveSlug({ sourcePath: "content/a.md", metadata: meta({ title: "The Title" }) })).toBe(
      "the-title",
    );
    expect(deriveSlug({ sourcePath: "content/Some File.md", metadata: meta() })).toBe("some-file");
  });

  it("falls back to untitled when nothing usable remains", () => {
    expect(deriveSlug({ sourcePath: "content/!!!.md", metadata: meta() })).toBe("untitled");
  });
});

describe("applyPermalink", () => {
  const date = new Date("2023-11-02T23:00:00Z");

  it("matches placeholders case-insensitively", () => {
    expect(applyPermalink("/:YEAR/:Month/:slug", "post", date)).toBe("/2023/11/post/");
  });

  it("treats :title as the slug", () => {
    expect(applyPermalink("/notes/:title/", "a-b", date)).toBe("/notes/a-b/");
  });

  it("zero-pads month and day", () => {
    expect(applyPermalink("/:year/:month/:day/", "x", new Date("2024-01-09T00:00:00Z"))).toBe(
      "/2024/01/09/",
    );
  });

  it("collapses duplicate slashes", () => {
    expect(applyPermalink("//posts///:slug", "x")).toBe("/posts/x/");
  });
});
