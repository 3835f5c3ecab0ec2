import { describe, it, expect } from "vitest";
import { assignUniqueSlugs, generateListPages, pageUrl, paginate } from "./paginate";
import { postProcess } from "./post-process";
import { createSiteContext } from "./context";
import { loadDefaultConfig } from "../utils/load-config";
import { Tracker } from "../utils/tracker";
import { makePage, makePost } from "./test-helpers";

const posts = (count: number) =>
  Array.from({ length: count }, (_, i) =>
    makePost(`p${i + 1}`, `2024-01-${String(28 - i).padStart(2, "0")}`),
  );

const blog = (pageSize: number) => ({
  listType: "blog" as const,
  term: null,
  title: "Blog",
  firstPageUrl: "/blog/",
  pageSize,
});

describe("pageUrl", () => {
  it("omits the page segment on page 1", () => {
    expect(pageUrl("/blog/", 1)).toBe("/blog/");
    expect(pageUrl("/blog/", 2)).toBe("/blog/page/2/");
    expect(pageUrl("/", 2)).toBe("/page/2/");
  });
});

describe("generateListPages", () => {
  it("splits three posts into two pages of two (scenario A)", () => {
    const [d1, d2, d3] = posts(3);
    const pages = generateListPages([d1, d2, d3], blog(2));

    expect(pages).toHaveLength(2);

    expect(pages[0].posts).toEqual([d1, d2]);
    expect(pages[0].url).toBe("/blog/");
    expect(pages[0].destinationPath).toBe("blog/index.html");
    expect(pages[0].pager.previousPageUrl).toBeNull();
    expect(pages[0].pager.nextPageUrl).toBe("/blog/page/2/");

    expect(pages[1].posts).toEqual([d3]);
    expect(pages[1].url).toBe("/blog/page/2/");
    expect(pages[1].destinationPath).toBe("blog/page/2/index.html");
    expect(pages[1].pager.previousPageUrl).toBe(pages[0].url);
    expect(pages[1].pager.nextPageUrl).toBeNull();
  });

  it("fills the pager", () => {
    const pages = generateListPages(posts(5), blog(2));

    expect(pages[1].pager).toEqual({
      currentPage: 2,
      totalPages: 3,
      totalItems: 5,
      itemsPerPage: 2,
      previousPageUrl: "/blog/",
      nextPageUrl: "/blog/page/3/",
      firstPageUrl: "/blog/",
      pageUrlTemplate: "/blog/page/:num/",
      hasPreviousPage: true,
      hasNextPage: true,
    });
  });

  it.each([
    [1, 1],
    [7, 3],
    [9, 3],
    [10, 3],
    [25, 10],
  ])("covers %i posts with page size %i exactly once", (count, size) => {
    const pages = generateListPages(posts(count), blog(size));

    expect(pages).toHaveLength(Math.ceil(count / size));
    expect(pages.reduce((sum, page) => sum + page.posts.length, 0)).toBe(count);
    pages.forEach((page, i) => {
      expect(page.posts.length).toBeLessThanOrEqual(size);
      expect(page.pager.currentPage).toBe(i + 1);
      expect(page.url.includes("/page/")).toBe(i > 0);
    });
  });

  it("puts everything on one page when the page size is 0", () => {
    const pages = generateListPages(posts(12), blog(0));
    expect(pages).toHaveLength(1);
    expect(pages[0].posts).toHaveLength(12);
    expect(pages[0].pager.nextPageUrl).toBeNull();
  });

  it("generates nothing for an empty list", () => {
    expect(generateListPages([], blog(2))).toEqual([]);
  });
});

describe("paginate", () => {
  it("generates blog and taxonomy pages", async () => {
    const config = { ...(await loadDefaultConfig()), postsPerPage: 1 };
    const ctx = createSiteContext(config, new Tracker(), new Date());
    ctx.posts.push(
      makePost("a", "2024-01-02", { tags: ["Go"], categories: ["Dev"] }),
      makePost("b", "2024-01-01", { tags: ["go"] }),
    );
    postProcess(ctx);

    paginate(ctx);

    expect(ctx.listPages.map((page) => page.url)).toEqual([
      "/blog/",
      "/blog/page/2/",
      "/categories/dev/",
      "/tags/go/",
      "/tags/go/page/2/",
    ]);
    expect(ctx.listPages[3].metadata.title).toBe("Tag: Go");
    expect(ctx.listPages[2].term?.name).toBe("Dev");
    expect(ctx.tracker.getStats().listPages).toBe(5);
  });

  it("gives terms that slugify alike distinct archives", async () => {
    const config = { ...(await loadDefaultConfig()), postsPerPage: 10 };
    const ctx = createSiteContext(config, new Tracker(), new Date());
    ctx.posts.push(
      makePost("a", "2024-01-02", { tags: ["C++"] }),
      makePost("b", "2024-01-01", { tags: ["C#"] }),
    );
    postProcess(ctx);

    paginate(ctx);

    const tagPages = ctx.listPages.filter((page) => page.listType === "tag");
    expect(tagPages.map((page) => [page.term?.name, page.destinationPath])).toEqual([
      ["C++", "tags/c/index.html"],
      ["C#", "tags/c-2/index.html"],
    ]);
    expect(ctx.taxonomies.get("tag")?.get("c#")?.slug).toBe("c-2");
    expect(ctx.tracker.getIssues()).toEqual([]);
  });

  it("skips list pages whose destination already belongs to content", async () => {
    const config = { ...(await loadDefaultConfig()), postsPerPage: 10 };
    const ctx = createSiteContext(config, new Tracker(), new Date());
    ctx.posts.push(makePost("a", "2024-01-02", { tags: ["Go"] }));
    ctx.pages.push(makePage("blog"));
    postProcess(ctx);

    paginate(ctx);

    expect(ctx.listPages.map((page) => page.url)).toEqual(["/tags/go/"]);
    expect(ctx.tracker.getIssues("file")).toEqual([
      {
        type: "file",
        path: "_generated/blog/index/1",
        reason: "duplicate-url",
        details: "/blog/ is already produced by content/blog.md",
      },
    ]);
    expect(ctx.tracker.getStats().listPages).toBe(1);
  });
});

describe("assignUniqueSlugs", () => {
  it("suffixes repeated slugs in order", () => {
    const term = (slug: string) => ({
      taxonomy: "tag" as const,
      key: slug,
      name: slug,
      slug,
      posts: [],
    });
    const terms = [term("c"), term("c"), term("go"), term("c")];

    assignUniqueSlugs(terms);

    expect(terms.map((t) => t.slug)).toEqual(["c", "c-2", "go", "c-3"]);
  });
});
