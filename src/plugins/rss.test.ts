import { describe, it, expect } from "vitest";
import { renderRss, rssChannel, rssPlugin } from "./rss";
import { BUILD_TIME, makeContext, makePost, makeRuntime } from "../modules/test-helpers";
import type { FeedConfig } from "../types";

const feed = (overrides: Partial<FeedConfig> = {}): FeedConfig => ({
  enabled: true,
  path: "feed.xml",
  maxItems: 20,
  ...overrides,
});

describe("rssChannel", () => {
  it("takes the newest posts up to maxItems", async () => {
    const ctx = await makeContext({
      baseUrl: "https://example.com",
      title: "Notes",
      description: "Things",
      feed: feed({ maxItems: 1 }),
    });
    ctx.posts.push(
      makePost("new", "2024-03-01T00:00:00Z", {
        categories: ["Dev"],
        tags: ["dev", "Go"],
        extra: { author: "Sam" },
      }),
      makePost("old", "2024-01-01T00:00:00Z"),
    );

    const channel = rssChannel(ctx);

    expect(channel.link).toBe("https://example.com/");
    expect(channel.lastBuildDate).toEqual(new Date("2024-03-01T00:00:00Z"));
    expect(channel.items).toEqual([
      {
        title: "new",
        link: "https://example.com/blog/new/",
        description: "new",
        pubDate: new Date("2024-03-01T00:00:00Z"),
        categories: ["Dev", "Go"],
        author: "Sam",
      },
    ]);
  });

  it("includes every post when maxItems is 0 and uses the build time without posts", async () => {
    const ctx = await makeContext({ feed: feed({ maxItems: 0 }) });
    expect(rssChannel(ctx).lastBuildDate).toBe(BUILD_TIME);

    ctx.posts.push(makePost("a", "2024-02-01"), makePost("b", "2024-01-01"));
    expect(rssChannel(ctx).items.map((item) => item.title)).toEqual(["a", "b"]);
  });
});

describe("renderRss", () => {
  it("wraps descriptions in CDATA and lists categories", () => {
    const xml = renderRss({
      title: "Notes",
      link: "https://example.com/",
      description: "Things",
      language: "en-US",
      lastBuildDate: new Date("2024-03-01T00:00:00Z"),
      items: [
        {
          title: "Fish & chips",
          link: "https://example.com/blog/fish/",
          description: "<p>Tasty]]></p>",
          pubDate: new Date("2024-03-01T00:00:00Z"),
          categories: ["Food"],
        },
      ],
    });

    expect(xml).toContain("<lastBuildDate>Fri, 01 Mar 2024 00:00:00 GMT</lastBuildDate>");
    expect(xml).toContain("<title>Fish &amp; chips</title>");
    expect(xml).toContain(
      "<description><![CDATA[<p>Tasty]]]]><![CDATA[></p>]]></description>",
    );
    expect(xml).toContain("      <category>Food</category>\n");
    expect(xml).not.toContain("<author>");
  });
});

describe("rssPlugin", () => {
  it("writes the feed at the configured path", async () => {
    const ctx = await makeContext({
      baseUrl: "https://example.com",
      feed: feed({ path: "/rss/index.xml" }),
    });
    ctx.posts.push(makePost("a", "2024-02-01"));
    const runtime = makeRuntime();

    await rssPlugin.hooks.postBuild?.({ stage: "postBuild", context: ctx, ...runtime });

    expect(runtime.output.paths()).toEqual(["rss/index.xml"]);
  });

  it("does nothing when the feed is disabled", async () => {
    const ctx = await makeContext({
      baseUrl: "https://example.com",
      feed: feed({ enabled: false }),
    });
    const runtime = makeRuntime();

    await rssPlugin.hooks.postBuild?.({ stage: "postBuild", context: ctx, ...runtime });

    expect(runtime.output.paths()).toEqual([]);
  });
});
