/**
 * SEO Plugin
 * Fills each post's and page's SeoData: title, descriptions, canonical URL,
 * Open Graph and Twitter card fields. Frontmatter keys override the defaults.
 */

import * as cheerio from "cheerio";
import { checkCancelled } from "../utils/errors";
import { absoluteUrl } from "../utils/url";
import type { PageItem, Plugin, PostItem, SeoData, SiteConfig } from "../types";

const MAX_META_DESCRIPTION = 160;
const MAX_OG_DESCRIPTION = 200;
const MAX_TWITTER_DESCRIPTION = 200;

// ============================================================================
// Helpers
// ============================================================================

function stringValue(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/**
 * Strip markup, decode entities and collapse whitespace
 */
export function cleanText(text: string): string {
  if (!text.trim()) return "";
  return cheerio.load(text, null, false).text().replace(/\s+/g, " ").trim();
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}

function twitterHandle(handle: string | undefined): string | undefined {
  if (!handle) return undefined;
  return handle.startsWith("@") ? handle : `@${handle}`;
}

function firstImage(html: string): string | undefined {
  if (!html) return undefined;
  return cheerio.load(html)("img[src]").first().attr("src") || undefined;
}

function optionalUrl(baseUrl: string, path: string | undefined): string | undefined {
  return path ? absoluteUrl(baseUrl, path) : undefined;
}

// ============================================================================
// SEO data
// ============================================================================

export function buildSeoData(item: PostItem | PageItem, config: SiteConfig): SeoData {
  const { metadata } = item;
  const extra = metadata.extra;
  const extensions = config.extensions;
  const isPost = item.kind === "post";

  const canonicalUrl = absoluteUrl(config.baseUrl, item.url);
  const pageTitle = metadata.title ?? config.title;
  const title =
    stringValue(extra, "seoTitle") ??
    (item.url === "/" ? config.title : `${pageTitle} | ${config.title}`);
  const ogTitle = stringValue(extra, "ogTitle") ?? pageTitle;

  const summary = isPost ? item.summary : undefined;
  const description =
    stringValue(extra, "metaDescription") ||
    summary ||
    metadata.summary ||
    config.description;

  const image =
    stringValue(extra, "ogImage") ??
    stringValue(extra, "twitterImage") ??
    stringValue(extra, "image") ??
    firstImage(item.content) ??
    stringValue(extensions, "defaultOgImage");
  const ogImage = optionalUrl(config.baseUrl, image);
  const twitterImage = optionalUrl(
    config.baseUrl,
    stringValue(extra, "twitterImage") ?? image,
  );

  const twitterSite = twitterHandle(stringValue(extensions, "twitterHandle"));
  const twitterCreator =
    twitterHandle(
      stringValue(extra, "authorTwitter") ??
        stringValue(extensions, "defaultAuthorTwitter"),
    ) ?? twitterSite;

  const seo: SeoData = {
    title,
    metaDescription: truncate(cleanText(description), MAX_META_DESCRIPTION),
    canonicalUrl,
    ogType: stringValue(extra, "ogType") ?? (isPost ? "article" : "website"),
    ogUrl: canonicalUrl,
    ogTitle,
    ogDescription: truncate(
      cleanText(stringValue(extra, "ogDescription") ?? description),
      MAX_OG_DESCRIPTION,
    ),
    ogImage,
    ogLocale: config.language ? config.language.replace(/-/g, "_") : undefined,
    twitterCard:
      stringValue(extra, "twitterCard") ??
      (twitterImage ? "summary_large_image" : "summary"),
    twitterSite,
    twitterCreator,
    twitterTitle: stringValue(extra, "twitterTitle") ?? ogTitle,
    twitterDescription: truncate(
      cleanText(stringValue(extra, "twitterDescription") ?? description),
      MAX_TWITTER_DESCRIPTION,
    ),
    twitterImage,
  };

  if (item.kind === "post") {
    seo.articlePublishedTime = item.date.toISOString();
    const modified = metadata.lastModified;
    if (modified && modified.getTime() !== item.date.getTime()) {
      seo.articleModifiedTime = modified.toISOString();
    }
    seo.articleTags = metadata.tags.map((tag) => tag.trim()).filter(Boolean);
  }

  return seo;
}

export const seoPlugin: Plugin = {
  name: "seo",
  hooks: {
    postContentProcessing({ context, signal, logger }) {
      const { config } = context;
      if (!config.baseUrl) {
        logger.warn("seo: baseUrl is not set, canonical URLs will be relative");
      }

      for (const item of [...context.posts, ...context.pages]) {
        checkCancelled(signal);
        item.seo = buildSeoData(item, config);
      }
    },
  },
};
