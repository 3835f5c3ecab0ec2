/**
 * RSS Plugin
 * Writes an RSS 2.0 feed of the newest posts
 */

import { createTemplateEnvironment, RSS_TEMPLATE } from "../templates";
import { absoluteUrl } from "../utils/url";
import type { Plugin, PostItem, SiteContext } from "../types";

export interface RssItem {
  title: string;
  link: string;
  description: string;
  pubDate: Date;
  categories: string[];
  author?: string;
}

export interface RssChannel {
  title: string;
  link: string;
  description: string;
  language: string;
  lastBuildDate: Date;
  items: RssItem[];
}

/**
 * Categories then tags, first casing wins
 */
function distinctTerms(post: PostItem): string[] {
  const seen = new Set<string>();
  const terms: string[] = [];

  for (const term of [...post.metadata.categories, ...post.metadata.tags]) {
    const key = term.trim().toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    terms.push(term.trim());
  }

  return terms;
}

export function rssChannel(ctx: SiteContext): RssChannel {
  const { config } = ctx;
  // ctx.posts is newest first after post-processing
  const posts =
    config.feed.maxItems > 0 ? ctx.posts.slice(0, config.feed.maxItems) : ctx.posts;

  const items = posts.map((post): RssItem => {
    const author = post.metadata.extra.author;
    return {
      title: post.metadata.title ?? "",
      link: absoluteUrl(config.baseUrl, post.url),
      description: post.summary,
      pubDate: post.date,
      categories: distinctTerms(post),
      author: typeof author === "string" && author.trim() ? author.trim() : undefined,
    };
  });

  return {
    title: config.title,
    link: absoluteUrl(config.baseUrl, "/"),
    description: config.description,
    language: config.language,
    lastBuildDate: posts[0]?.date ?? ctx.buildTime,
    items,
  };
}

const template = createTemplateEnvironment().compile(RSS_TEMPLATE);

export function renderRss(channel: RssChannel): string {
  return template(channel);
}

export const rssPlugin: Plugin = {
  name: "rss",
  hooks: {
    async postBuild({ context, output, logger }) {
      const { feed, baseUrl } = context.config;
      if (!feed.enabled) return;

      if (!baseUrl) {
        logger.warn(`rss: baseUrl is not set, skipping ${feed.path}`);
        return;
      }

      const path = feed.path.replace(/^\/+/, "");
      const channel = rssChannel(context);
      await output.writeText(path, renderRss(channel));
      logger.debug(`rss: wrote ${channel.items.length} items to ${path}`);
    },
  },
};
