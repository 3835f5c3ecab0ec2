/**
 * Post-Processing Module
 * Orders posts, links neighbours and aggregates taxonomies
 */

import { slugify } from "../utils/slugify";
import type { PostItem, SiteContext, TaxonomyTerms, TaxonomyType } from "../types";

/**
 * Date descending; equal dates fall back to source path ascending
 */
export function comparePosts(a: PostItem, b: PostItem): number {
  const byDate = b.date.getTime() - a.date.getTime();
  if (byDate !== 0) return byDate;
  return a.sourcePath < b.sourcePath ? -1 : a.sourcePath > b.sourcePath ? 1 : 0;
}

/**
 * Link each post to its neighbours in the (sorted) list
 * `previous` is the older post, `next` the newer one.
 */
export function linkPosts(posts: PostItem[]): void {
  posts.forEach((post, i) => {
    post.previous = posts[i + 1] ?? null;
    post.next = i > 0 ? posts[i - 1] : null;
  });
}

/**
 * Group posts by trimmed, case-folded term; the first casing seen is the display name
 */
export function aggregateTaxonomy(
  posts: PostItem[],
  taxonomy: TaxonomyType,
  termsOf: (post: PostItem) => string[],
): TaxonomyTerms {
  const terms: TaxonomyTerms = new Map();

  for (const post of posts) {
    const seen = new Set<string>();

    for (const raw of termsOf(post)) {
      const name = raw.trim();
      if (!name) continue;

      const key = name.toLowerCase();
      // A post listing the same term twice is counted once
      if (seen.has(key)) continue;
      seen.add(key);

      const term = terms.get(key);
      if (term) {
        term.posts.push(post);
      } else {
        terms.set(key, { taxonomy, key, name, slug: slugify(name), posts: [post] });
      }
    }
  }

  return terms;
}

/**
 * Sort, link and aggregate the context's posts
 *
 * Writes to context:
 * - posts: sorted date descending, previous/next set
 * - taxonomies: category and tag terms, each with at least one post
 */
export function postProcess(ctx: SiteContext): void {
  ctx.posts.sort(comparePosts);
  linkPosts(ctx.posts);

  ctx.taxonomies.set(
    "category",
    aggregateTaxonomy(ctx.posts, "category", (post) => post.metadata.categories),
  );
  ctx.taxonomies.set(
    "tag",
    aggregateTaxonomy(ctx.posts, "tag", (post) => post.metadata.tags),
  );
}
