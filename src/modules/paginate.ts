/**
 * Pagination Module
 * Synthesizes the paginated blog index and one paginated archive per taxonomy term
 */

import { normalizeUrl, urlToDestinationPath } from "../utils/url";
import { TAXONOMY_TYPES } from "../types";
import type {
  ListPageItem,
  ListType,
  Metadata,
  Pager,
  PostItem,
  SiteContext,
  TaxonomyTerm,
} from "../types";

export interface ListDefinition {
  listType: ListType;
  term: TaxonomyTerm | null;
  title: string;
  firstPageUrl: string; // Pretty URL, e.g. "/blog/"
  pageSize: number; // 0 = everything on one page
}

const LIST_LABELS: Record<ListType, string> = {
  blog: "Blog",
  category: "Category",
  tag: "Tag",
};

/**
 * URL of page `n`; page 1 has no "page" segment
 *
 * @example
 * pageUrl("/blog/", 1) // "/blog/"
 * pageUrl("/blog/", 3) // "/blog/page/3/"
 */
export function pageUrl(firstPageUrl: string, n: number): string {
  return n === 1 ? firstPageUrl : normalizeUrl(`${firstPageUrl}/page/${n}`);
}

/**
 * Slice posts into list pages with a linked pager
 * Returns no pages for an empty post list.
 */
export function generateListPages(posts: PostItem[], list: ListDefinition): ListPageItem[] {
  if (posts.length === 0) return [];

  const pageSize = list.pageSize > 0 ? list.pageSize : posts.length;
  const totalPages = Math.ceil(posts.length / pageSize);
  const slug = list.term?.slug ?? "index";
  const pages: ListPageItem[] = [];

  for (let n = 1; n <= totalPages; n++) {
    const url = pageUrl(list.firstPageUrl, n);
    const previousPageUrl = n > 1 ? pageUrl(list.firstPageUrl, n - 1) : null;
    const nextPageUrl = n < totalPages ? pageUrl(list.firstPageUrl, n + 1) : null;

    const pager: Pager = {
      currentPage: n,
      totalPages,
      totalItems: posts.length,
      itemsPerPage: pageSize,
      previousPageUrl,
      nextPageUrl,
      firstPageUrl: list.firstPageUrl,
      pageUrlTemplate: `${list.firstPageUrl}page/:num/`,
      hasPreviousPage: previousPageUrl !== null,
      hasNextPage: nextPageUrl !== null,
    };

    const metadata: Metadata = {
      title: n === 1 ? list.title : `${list.title} (page ${n})`,
      categories: [],
      tags: [],
      draft: false,
      extra: {},
    };

    pages.push({
      kind: "list",
      listType: list.listType,
      term: list.term,
      sourcePath: `_generated/${list.listType}/${slug}/${n}`,
      destinationPath: urlToDestinationPath(url),
      url,
      metadata,
      content: "",
      posts: posts.slice((n - 1) * pageSize, n * pageSize),
      pager,
    });
  }

  return pages;
}

/**
 * Give each term a slug no other term of the same taxonomy uses
 * ("C++" and "C#" both slugify to "c"; the later one becomes "c-2")
 */
export function assignUniqueSlugs(terms: Iterable<TaxonomyTerm>): void {
  const used = new Set<string>();

  for (const term of terms) {
    const base = term.slug;
    let slug = base;
    for (let n = 2; used.has(slug); n++) {
      slug = `${base}-${n}`;
    }
    used.add(slug);
    term.slug = slug;
  }
}

/**
 * Generate every list page for the site
 *
 * Writes to context:
 * - listPages: blog index pages, then category pages, then tag pages
 *
 * Posts, pages and plugin content keep their destinations; a list page
 * that would overwrite one is tracked as a duplicate and skipped.
 */
export function paginate(ctx: SiteContext): void {
  const { config, tracker } = ctx;
  const generated: ListPageItem[] = [];

  generated.push(
    ...generateListPages(ctx.posts, {
      listType: "blog",
      term: null,
      title: LIST_LABELS.blog,
      firstPageUrl: normalizeUrl(config.blogPath),
      pageSize: config.postsPerPage,
    }),
  );

  for (const taxonomy of TAXONOMY_TYPES) {
    const basePath = config.taxonomyPaths[taxonomy];
    const terms = [...(ctx.taxonomies.get(taxonomy)?.values() ?? [])];
    assignUniqueSlugs(terms);

    for (const term of terms) {
      generated.push(
        ...generateListPages(term.posts, {
          listType: taxonomy,
          term,
          title: `${LIST_LABELS[taxonomy]}: ${term.name}`,
          firstPageUrl: normalizeUrl(`${basePath}/${term.slug}`),
          pageSize: config.postsPerPage,
        }),
      );
    }
  }

  // destination path -> source path of the item that claimed it
  const claimed = new Map<string, string>();
  for (const item of [...ctx.posts, ...ctx.pages, ...ctx.otherContent]) {
    claimed.set(item.destinationPath, item.sourcePath);
  }

  const listPages: ListPageItem[] = [];
  for (const page of generated) {
    const owner = claimed.get(page.destinationPath);
    if (owner !== undefined) {
      tracker.trackIssue({
        type: "file",
        path: page.sourcePath,
        reason: "duplicate-url",
        details: `${page.url} is already produced by ${owner}`,
      });
      continue;
    }
    claimed.set(page.destinationPath, page.sourcePath);
    listPages.push(page);
  }

  ctx.listPages = listPages;
  tracker.setListPages(listPages.length);
}
