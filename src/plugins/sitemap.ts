/**
 * Sitemap Plugin
 * Writes sitemap.xml for every published post and page
 */

import { createTemplateEnvironment, SITEMAP_TEMPLATE } from "../templates";
import { absoluteUrl } from "../utils/url";
import type { PageItem, Plugin, PostItem, SiteContext } from "../types";

export interface SitemapEntry {
  loc: string;
  lastmod: Date;
  changefreq: string;
  priority: string; // One decimal, e.g. "0.8"
}

function priorityOf(item: PostItem | PageItem): number {
  const override = Number(item.metadata.extra.sitemapPriority);
  if (item.metadata.extra.sitemapPriority !== undefined && Number.isFinite(override)) {
    return Math.min(1, Math.max(0, override));
  }
  if (item.url === "/") return 1;
  return item.kind === "post" ? 0.8 : 0.5;
}

export function sitemapEntries(ctx: SiteContext): SitemapEntry[] {
  const { baseUrl } = ctx.config;
  const items: (PostItem | PageItem)[] = [...ctx.posts, ...ctx.pages];

  return items
    .filter((item) => !item.metadata.draft)
    .map((item) => {
      const changefreq = item.metadata.extra.sitemapChangeFreq;
      return {
        loc: absoluteUrl(baseUrl, item.url),
        lastmod:
          item.metadata.lastModified ??
          (item.kind === "post" ? item.date : ctx.buildTime),
        changefreq:
          typeof changefreq === "string"
            ? changefreq
            : item.kind === "post"
              ? "monthly"
              : "weekly",
        priority: priorityOf(item).toFixed(1),
      };
    });
}

const template = createTemplateEnvironment().compile(SITEMAP_TEMPLATE);

export function renderSitemap(entries: SitemapEntry[]): string {
  return template({ entries });
}

export const sitemapPlugin: Plugin = {
  name: "sitemap",
  hooks: {
    async postBuild({ context, output, logger }) {
      if (!context.config.baseUrl) {
        logger.warn("sitemap: baseUrl is not set, skipping sitemap.xml");
        return;
      }

      const entries = sitemapEntries(context);
      if (entries.length === 0) {
        logger.warn("sitemap: no published content, skipping sitemap.xml");
        return;
      }

      await output.writeText("sitemap.xml", renderSitemap(entries));
      logger.debug(`sitemap: wrote ${entries.length} entries`);
    },
  },
};
