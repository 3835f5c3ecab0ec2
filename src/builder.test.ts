import { describe, it, expect } from "vitest";
import { build, type BuildOptions } from "./builder";
import { MemoryStorage } from "./storage/memory";
import type { TemplateRenderer } from "./types";

const NOW = new Date("2024-06-01T00:00:00Z");

const options = (overrides: BuildOptions = {}): BuildOptions => ({
  now: () => NOW,
  userConfigPath: null,
  ...overrides,
});

const blog = {
  "config.json": JSON.stringify({ baseUrl: "https://example.com/", title: "Notes", postsPerPage: 1 }),
  "templates/post.html":
    "{{page.metadata.title}}|{{page.readingTime}}|{{#if page.previous}}{{page.previous.url}}{{/if}}",
  "templates/default.html": "{{page.metadata.title}}",
  "templates/list.html":
    "{{page.metadata.title}}:{{#each page.posts}}{{url}};{{/each}}{{page.pager.nextPageUrl}}",
  "content/index.md": "---\ntitle: Home\n---\nHi",
  "content/posts/one.md": "---\ntitle: One\ndate: 2024-01-01\ntags: [Go]\n---\nFirst",
  "content/posts/two.md": "---\ntitle: Two\ndate: 2024-02-01\ntags: [go]\n---\nSecond",
  "content/posts/undated.md": "---\ntitle: Undated\n---\nNo date",
  "static/favicon.ico": "ico",
  "styles/main.scss": "a { b: c; }",
};

describe("build", () => {
  it("builds a complete site", async () => {
    const output = new MemoryStorage();
    const result = await build("config.json", new MemoryStorage(blog), output, options());

    expect(result.status).toBe("success");
    expect(output.paths()).toEqual([
      "blog/2024/01/01/one/index.html",
      "blog/2024/02/01/two/index.html",
      "blog/index.html",
      "blog/page/2/index.html",
      "css/main.css",
      "favicon.ico",
      "feed.xml",
      "index.html",
      "robots.txt",
      "sitemap.xml",
      "tags/go/index.html",
      "tags/go/page/2/index.html",
    ]);

    expect(await output.readText("index.html")).toBe("Home");
    expect(await output.readText("blog/2024/02/01/two/index.html")).toBe(
      "Two|1|/blog/2024/01/01/one/",
    );
    expect(await output.readText("blog/2024/01/01/one/index.html")).toBe("One|1|");
    expect(await output.readText("blog/index.html")).toBe(
      "Blog:/blog/2024/02/01/two/;/blog/page/2/",
    );
    expect(await output.readText("blog/page/2/index.html")).toBe(
      "Blog (page 2):/blog/2024/01/01/one/;",
    );
    expect(await output.readText("tags/go/index.html")).toBe(
      "Tag: go:/blog/2024/02/01/two/;/tags/go/page/2/",
    );
    expect((await output.readText("css/main.css")).trim()).toBe("a{b:c}");
    expect(await output.readText("robots.txt")).toBe(
      "User-agent: *\nAllow: /\nSitemap: https://example.com/sitemap.xml\n",
    );

    expect(result.context?.posts[0].seo?.canonicalUrl).toBe(
      "https://example.com/blog/2024/02/01/two/",
    );
  });

  it("completes when a post has no date, reporting one error", async () => {
    const result = await build("config.json", new MemoryStorage(blog), new MemoryStorage(), options());

    expect(result.status).toBe("success");
    expect(result.errorCount).toBe(1);
    expect(result.stats.issues).toEqual([
      {
        type: "file",
        path: "content/posts/undated.md",
        reason: "missing-date",
        details: "Posts require a date",
      },
    ]);
    expect(result.context?.posts.map((p) => p.sourcePath)).toEqual([
      "content/posts/two.md",
      "content/posts/one.md",
    ]);
    expect(result.stats.posts).toBe(2);
    expect(result.stats.pages).toBe(1);
    expect(result.stats.listPages).toBe(4);
    expect(result.stats.renderedItems).toBe(7);
  });

  it("uses defaults when the site config is missing", async () => {
    const output = new MemoryStorage();
    const result = await build(
      "config.json",
      new MemoryStorage({
        "templates/default.html": "{{site.title}}",
        "content/index.md": "Hi",
      }),
      output,
      options(),
    );

    expect(result.status).toBe("success");
    expect(result.errorCount).toBe(0);
    expect(output.paths()).toEqual(["index.html", "robots.txt"]);
    expect(await output.readText("index.html")).toBe("My Blog");
  });

  it("records an unparseable site config and continues with defaults", async () => {
    const result = await build(
      "config.json",
      new MemoryStorage({ "config.json": "{ nope" }),
      new MemoryStorage(),
      options(),
    );

    expect(result.status).toBe("success");
    expect(result.context?.config.title).toBe("My Blog");
    expect(result.stats.issues.map((i) => i.type === "resource" && i.reason)).toEqual([
      "invalid-json",
    ]);
  });

  it("applies overrides over the site config", async () => {
    const result = await build(
      "config.json",
      new MemoryStorage(blog),
      new MemoryStorage(),
      options({ overrides: { buildDrafts: true, title: "Override" } }),
    );

    expect(result.context?.config.title).toBe("Override");
    expect(result.context?.config.buildDrafts).toBe(true);
  });

  it("reports cancelled and runs no further stages", async () => {
    const controller = new AbortController();
    const output = new MemoryStorage();
    const steps: string[] = [];

    const result = await build(
      "config.json",
      new MemoryStorage(blog),
      output,
      options({
        signal: controller.signal,
        plugins: [
          { name: "stop", hooks: { postContentProcessing: () => controller.abort() } },
        ],
        onStep: (step) => steps.push(step),
      }),
    );

    expect(result.status).toBe("cancelled");
    expect(steps.at(-1)).toBe("postContentProcessing");
    expect(output.paths()).toEqual([]);
  });

  it("fails when an orchestration step throws", async () => {
    const renderer: TemplateRenderer = {
      initialize: async () => {
        throw new Error("templates unavailable");
      },
      render: async () => "",
    };

    const result = await build(
      "config.json",
      new MemoryStorage(blog),
      new MemoryStorage(),
      options({ renderer }),
    );

    expect(result.status).toBe("failed");
    expect(result.error).toBeInstanceOf(Error);
    expect(result.stats.posts).toBe(0);
  });

  it("isolates plugin failures", async () => {
    const result = await build(
      "config.json",
      new MemoryStorage(blog),
      new MemoryStorage(),
      options({
        plugins: [
          {
            name: "flaky",
            hooks: {
              postRender: () => {
                throw new Error("flaky failed");
              },
            },
          },
        ],
      }),
    );

    expect(result.status).toBe("success");
    expect(result.stats.issues).toContainEqual({
      type: "plugin",
      plugin: "flaky",
      stage: "postRender",
      details: "flaky failed",
    });
  });
});
