/**
 * Built-in plugins, addressable by name from the site config's `plugins` list
 */

import type { Plugin } from "../types";
import type { Logger } from "../utils/logger";
import { readingTimePlugin } from "./reading-time";
import { robotsPlugin } from "./robots";
import { rssPlugin } from "./rss";
import { seoPlugin } from "./seo";
import { sitemapPlugin } from "./sitemap";

export { PluginDispatcher } from "./dispatcher";
export { readingTime, readingTimePlugin } from "./reading-time";
export { hasSitemap, robotsPlugin, robotsTxt } from "./robots";
export { rssChannel, rssPlugin, renderRss } from "./rss";
export { buildSeoData, seoPlugin } from "./seo";
export { renderSitemap, sitemapEntries, sitemapPlugin } from "./sitemap";

export const BUILTIN_PLUGINS: Record<string, Plugin> = {
  [readingTimePlugin.name]: readingTimePlugin,
  [seoPlugin.name]: seoPlugin,
  [sitemapPlugin.name]: sitemapPlugin,
  [rssPlugin.name]: rssPlugin,
  [robotsPlugin.name]: robotsPlugin,
};

/**
 * Resolve plugin names in order; unknown and repeated names are skipped with a warning
 */
export function createPlugins(names: string[], logger: Logger): Plugin[] {
  const plugins: Plugin[] = [];
  const seen = new Set<string>();

  for (const name of names) {
    const plugin = BUILTIN_PLUGINS[name];
    if (!plugin) {
      logger.warn(`Unknown plugin "${name}", skipping`);
      continue;
    }
    if (seen.has(name)) {
      logger.warn(`Plugin "${name}" listed twice, registering once`);
      continue;
    }
    seen.add(name);
    plugins.push(plugin);
  }

  return plugins;
}
