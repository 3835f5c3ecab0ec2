import { describe, it, expect } from "vitest";
import { render, resolveLayout } from "./render";
import { makeContext, makePage, makePost, makeRuntime } from "./test-helpers";
import { HandlebarsRenderer } from "../templates";
import { MemoryStorage } from "../storage/memory";

describe("resolveLayout", () => {
  it("prefers metadata.layout and adds .html when it has no extension", async () => {
    const { config } = await makeContext();

    expect(resolveLayout(makePage("a", { layout: "wide" }), config)).toBe("wide.html");
    expect(resolveLayout(makePage("a", { layout: "wide.hbs" }), config)).toBe("wide.hbs");
    expect(resolveLayout(makePage("a"), config)).toBe("default.html");
    expect(resolveLayout(makePost("a", "2024-01-01"), config)).toBe("post.html");
  });
});

describe("render", () => {
  it("writes each item to its destination and skips missing layouts", async () => {
    const ctx = await makeContext({ title: "Notes" });
    ctx.posts.push(makePost("hello", "2024-01-01"));
    ctx.pages.push(makePage("about"), makePage("odd", { layout: "missing" }));

    const runtime = makeRuntime(
      new MemoryStorage({
        "templates/post.html": "<h1>{{page.metadata.title}}</h1>{{{content}}}",
        "templates/default.html": "{{site.title}}: {{{content}}}",
      }),
    );
    const renderer = new HandlebarsRenderer();
    await renderer.initialize(ctx.config, runtime.source);

    await render(ctx, runtime, renderer);

    expect(runtime.output.paths()).toEqual(["about/index.html", "blog/hello/index.html"]);
    expect(await runtime.output.readText("blog/hello/index.html")).toBe(
      "<h1>hello</h1><p>hello</p>",
    );
    expect(await runtime.output.readText("about/index.html")).toBe("Notes: <p>about</p>");

    expect(ctx.tracker.getIssues("file").map((i) => [i.path, i.reason])).toEqual([
      ["content/odd.md", "template-not-found"],
    ]);
    const stats = ctx.tracker.getStats();
    expect(stats.renderedItems).toBe(2);
    expect(stats.failedRenders).toBe(1);
  });

  it("renders plugin-contributed content after everything else", async () => {
    const ctx = await makeContext();
    ctx.otherContent.push({ ...makePage("extra"), url: "/404.html", destinationPath: "404.html" });
    const runtime = makeRuntime(new MemoryStorage({ "templates/default.html": "{{page.url}}" }));
    const renderer = new HandlebarsRenderer();
    await renderer.initialize(ctx.config, runtime.source);

    await render(ctx, runtime, renderer);

    expect(await runtime.output.readText("404.html")).toBe("/404.html");
  });
});
