/**
 * Render Module
 * Renders every content item through its layout and writes the result
 */

import { checkCancelled, errorMessage } from "../utils/errors";
import type { FileErrorContext } from "../utils/tracker";
import type {
  BuildRuntime,
  ContentItem,
  SiteConfig,
  SiteContext,
  TaxonomyTerm,
  TemplateRenderer,
} from "../types";

/**
 * Site-wide values exposed to templates as `site`
 */
export interface SiteView {
  title: string;
  description: string;
  baseUrl: string;
  language: string;
  buildTime: Date;
  posts: SiteContext["posts"];
  pages: SiteContext["pages"];
  categories: TaxonomyTerm[];
  tags: TaxonomyTerm[];
}

export interface TemplateModel {
  page: ContentItem;
  content: string;
  site: SiteView;
  config: SiteConfig;
}

function termsByName(ctx: SiteContext, taxonomy: "category" | "tag"): TaxonomyTerm[] {
  const terms = [...(ctx.taxonomies.get(taxonomy)?.values() ?? [])];
  return terms.sort((a, b) => a.name.localeCompare(b.name));
}

export function createSiteView(ctx: SiteContext): SiteView {
  const { config } = ctx;
  return {
    title: config.title,
    description: config.description,
    baseUrl: config.baseUrl,
    language: config.language,
    buildTime: ctx.buildTime,
    posts: ctx.posts,
    pages: ctx.pages,
    categories: termsByName(ctx, "category"),
    tags: termsByName(ctx, "tag"),
  };
}

/**
 * Layout for an item: metadata.layout (".html" added when it has no
 * extension), else the default for its kind
 */
export function resolveLayout(item: ContentItem, config: SiteConfig): string {
  const explicit = item.metadata.layout?.trim();
  if (explicit) {
    return /\.[a-z0-9]+$/i.test(explicit) ? explicit : `${explicit}.html`;
  }

  switch (item.kind) {
    case "post":
      return config.layouts.post;
    case "page":
      return config.layouts.page;
    case "list":
      return item.listType === "blog" ? config.layouts.list : config.layouts.taxonomy;
  }
}

/**
 * Render posts, pages, list pages and plugin-contributed content, in that order
 *
 * A missing layout or failing render/write is tracked and the item skipped.
 */
export async function render(
  ctx: SiteContext,
  runtime: BuildRuntime,
  renderer: TemplateRenderer,
): Promise<void> {
  const { config, tracker } = ctx;
  const { output, logger, signal } = runtime;
  const site = createSiteView(ctx);

  const items: ContentItem[] = [
    ...ctx.posts,
    ...ctx.pages,
    ...ctx.listPages,
    ...ctx.otherContent,
  ];

  for (const item of items) {
    checkCancelled(signal);

    const layout = resolveLayout(item, config);
    let step: FileErrorContext = "render";

    try {
      const model: TemplateModel = { page: item, content: item.content, site, config };
      const html = await renderer.render(layout, model);
      step = "write";
      await output.writeText(item.destinationPath, html);
      tracker.incrementRendered();
    } catch (error) {
      tracker.trackError(item.sourcePath, error, "file", step);
      tracker.incrementRenderFailed();
      logger.error(
        `Failed to ${step} ${item.sourcePath} (${layout}): ${errorMessage(error)}`,
        error,
      );
    }
  }

  logger.debug(`Rendered ${items.length} items`);
}
