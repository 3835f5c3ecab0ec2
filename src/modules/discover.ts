/**
 * Discovery Module
 * Reads and parses content files, filters drafts and future posts,
 * classifies posts vs pages and resolves their URLs
 */

import { getParser, type ParserRegistry } from "../parsers";
import { checkCancelled, errorMessage } from "../utils/errors";
import { joinPath } from "../utils/storage-path";
import { generateSummary } from "../utils/summary";
import type { FileErrorContext } from "../utils/tracker";
import type {
  BuildRuntime,
  ContentItem,
  ContentParser,
  PageItem,
  ParsedContent,
  PostItem,
  SiteContext,
} from "../types";
import { resolve } from "./resolver";

/**
 * Discover content and add posts and pages to the context
 *
 * Writes to context:
 * - posts: in discovery (path) order; post-processing sorts them
 * - pages: in discovery order
 *
 * Per-file failures are tracked and skipped; cancellation propagates.
 */
export async function discover(
  ctx: SiteContext,
  runtime: BuildRuntime,
  parsers: ParserRegistry,
): Promise<void> {
  const { config, tracker } = ctx;
  const { source, logger, signal } = runtime;

  const files = (
    await source.listFiles(config.contentDirectory, "*", true)
  ).filter((path) => getParser(parsers, path) !== undefined);
  tracker.setDiscoveredFiles(files.length);

  const postsPrefix = `${joinPath(config.contentDirectory, config.postsDirectory)}/`;

  // destination path -> source path of the item that claimed it
  const claimed = new Map<string, string>();
  for (const item of [...ctx.posts, ...ctx.pages, ...ctx.otherContent]) {
    claimed.set(item.destinationPath, item.sourcePath);
  }

  /**
   * Read and parse one file; failures are tracked and yield null
   */
  async function readContent(
    path: string,
    parser: ContentParser,
  ): Promise<ParsedContent | null> {
    let step: FileErrorContext = "read";
    try {
      const raw = await source.readText(path);
      step = "parse";
      return await parser.parse(raw, path);
    } catch (error) {
      tracker.trackError(path, error, "file", step);
      tracker.incrementFailed();
      logger.error(`Failed to ${step} ${path}: ${errorMessage(error)}`, error);
      return null;
    }
  }

  for (const path of files) {
    checkCancelled(signal);

    const parser = getParser(parsers, path);
    if (!parser) continue;

    const parsed = await readContent(path, parser);
    if (!parsed) continue;

    const { metadata, html } = parsed;

    if (metadata.draft && !config.buildDrafts) {
      tracker.incrementSkippedDrafts();
      logger.debug(`Skipping draft ${path}`);
      continue;
    }

    if (
      metadata.date &&
      metadata.date.getTime() > ctx.buildTime.getTime() &&
      !config.buildFutureDated
    ) {
      tracker.incrementSkippedFuture();
      logger.debug(`Skipping future-dated ${path}`);
      continue;
    }

    const isPost = path.startsWith(postsPrefix);
    let item: ContentItem;

    if (isPost) {
      if (!metadata.date) {
        tracker.trackIssue({
          type: "file",
          path,
          reason: "missing-date",
          details: "Posts require a date",
        });
        tracker.incrementFailed();
        logger.error(`Post ${path} has no date, skipping`);
        continue;
      }

      const { url, destinationPath } = resolve(
        { kind: "post", sourcePath: path, metadata, date: metadata.date },
        config.postPermalink,
        config,
      );
      const post: PostItem = {
        kind: "post",
        sourcePath: path,
        destinationPath,
        url,
        metadata,
        content: html,
        date: metadata.date,
        readingTime: 0,
        summary: metadata.summary?.trim() || generateSummary(html),
        previous: null,
        next: null,
      };
      item = post;
    } else {
      const { url, destinationPath } = resolve(
        { kind: "page", sourcePath: path, metadata },
        config.pagePermalink,
        config,
      );
      const page: PageItem = {
        kind: "page",
        sourcePath: path,
        destinationPath,
        url,
        metadata,
        content: html,
      };
      item = page;
    }

    const owner = claimed.get(item.destinationPath);
    if (owner !== undefined) {
      tracker.trackIssue({
        type: "file",
        path,
        reason: "duplicate-url",
        details: `${item.url} is already produced by ${owner}`,
      });
      tracker.incrementFailed();
      logger.error(`${path} resolves to ${item.url}, already used by ${owner}`);
      continue;
    }
    claimed.set(item.destinationPath, path);

    if (item.kind === "post") {
      ctx.posts.push(item);
      tracker.incrementPosts();
    } else if (item.kind === "page") {
      ctx.pages.push(item);
      tracker.incrementPages();
    }
  }

  logger.debug(
    `Discovered ${ctx.posts.length} posts and ${ctx.pages.length} pages from ${files.length} files`,
  );
}
