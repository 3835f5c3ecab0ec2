import { sitemapEntries } from "./sitemap";
import type { Plugin, SiteContext } from "../types";

export function robotsTxt(baseUrl: string, withSitemap: boolean = true): string {
  const lines = ["User-agent: *", "Allow: /"];
  if (baseUrl && withSitemap) {
    lines.push(`Sitemap: ${baseUrl.replace(/\/+$/, "")}/sitemap.xml`);
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Same conditions under which the sitemap plugin writes sitemap.xml
 */
export function hasSitemap(ctx: SiteContext): boolean {
  return (
    ctx.config.plugins.includes("sitemap") &&
    Boolean(ctx.config.baseUrl) &&
    sitemapEntries(ctx).length > 0
  );
}

/**
 * Writes robots.txt, pointing crawlers at the sitemap when one is written
 */
export const robotsPlugin: Plugin = {
  name: "robots",
  hooks: {
    async postBuild({ context, output }) {
      await output.writeText(
        "robots.txt",
        robotsTxt(context.config.baseUrl, hasSitemap(context)),
      );
    },
  },
};
